/**
 * KubeQuery AI - Module Index
 * ===========================
 */

// LLM Module
export * from './llm';

// RAG Module
export * from './rag';
