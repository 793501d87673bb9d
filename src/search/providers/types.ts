/**
 * Provider Types and Configurations
 */

/**
 * Embedding Provider Type
 */
export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProvider[] = [
  'ollama',
  'openai',
  'google',
];

export function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return EMBEDDING_PROVIDERS.some((provider) => provider === value);
}

/**
 * Resolved embedding model settings
 */
export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
  timeoutMs: number;
}
