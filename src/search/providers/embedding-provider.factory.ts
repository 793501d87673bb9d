/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI (or any OpenAI-compatible server
 * such as LM Studio), Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  isEmbeddingProvider,
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
} from './types';

// Dimension mapping for all supported models
const DIMENSION_MAP: Record<string, number> = {
  // Ollama models
  'nomic-embed-text': 768,
  'bge-m3:567m': 1024,
  'bge-m3': 1024,
  // OpenAI and compatible servers
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'text-embedding-nomic-embed-text-v1.5': 768,
  'nomic-embed-text-v1.5': 768,
  // Google
  'text-embedding-004': 768,
  'embedding-001': 768,
};

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const MODEL_ENV_VARS: Record<EmbeddingProvider, string> = {
  ollama: 'OLLAMA_EMBEDDING_MODEL',
  openai: 'OPENAI_EMBEDDING_MODEL',
  google: 'GOOGLE_EMBEDDING_MODEL',
};

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create embedding model based on configuration
   */
  createEmbeddingModel(): Embeddings {
    const { provider, model, dimensions } = this.getConfig();

    this.logger.log(
      `Creating embedding model: ${provider}/${model} (${dimensions}D)`,
    );

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  getConfig(): EmbeddingProviderConfig {
    const provider = this.getProvider();
    const model = this.getModel(provider);

    return {
      provider,
      model,
      dimensions: this.getEmbeddingDimensions(model),
      timeoutMs: this.configService.get<number>('EMBEDDING_TIMEOUT_MS', 5000),
    };
  }

  /**
   * EMBEDDING_DIMENSION wins over the model table; unknown models default
   * to 768D
   */
  getEmbeddingDimensions(model: string): number {
    const configured = this.configService.get<number>('EMBEDDING_DIMENSION');
    if (configured !== undefined && configured > 0) {
      return configured;
    }

    return DIMENSION_MAP[model] ?? 768;
  }

  /**
   * Get provider from config (default: openai)
   */
  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'openai',
    );

    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to openai`,
      );
      return 'openai';
    }

    return provider;
  }

  private getModel(provider: EmbeddingProvider): string {
    return this.configService.get<string>(
      MODEL_ENV_VARS[provider],
      DEFAULT_MODELS[provider],
    );
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({
      model,
      baseUrl,
    });
  }

  /**
   * OPENAI_BASE_URL points the client at an OpenAI-compatible server, which
   * usually accepts any API key
   */
  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    const baseURL = this.configService.get<string>('OPENAI_BASE_URL');

    if (!apiKey && !baseURL) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({
      model,
      openAIApiKey: apiKey ?? 'not-needed',
      maxRetries: 0,
      timeout: this.configService.get<number>('EMBEDDING_TIMEOUT_MS', 5000),
      ...(baseURL ? { configuration: { baseURL } } : {}),
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey,
      maxRetries: 0,
    });
  }
}
