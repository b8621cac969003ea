/**
 * KubeQuery Data Layer
 */

export * from './types';
export { SupabaseConversationStore } from './conversationLog';
