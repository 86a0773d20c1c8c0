/**
 * Embedding implementations
 */

export { default as TeiEmbedding } from './tei';
export type { TeiEmbeddingConfig } from './tei';
export { default as OpenAIEmbedding } from './openai';
export type { OpenAIEmbeddingConfig } from './openai';
