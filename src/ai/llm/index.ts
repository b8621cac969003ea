/**
 * KubeQuery AI - LLM Module Index
 * ===============================
 * Centralized exports for the LLM abstraction.
 */

// Types
export * from './types';

// Base client
export { LLMClient } from './LLMClient';

// Providers
export { OpenAIClient, OPENAI_API_URL } from './providers';

// Gateway & cost
export { LLMCompletionGateway } from './CompletionGateway';
export type { Completion, CompletionGateway } from './CompletionGateway';
export { CostAccountant, loadPricingTable } from './cost';
