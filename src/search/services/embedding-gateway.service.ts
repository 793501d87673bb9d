/**
 * Embedding Gateway Service
 * Wraps the embedding model behind a Result-returning boundary: every
 * failure comes back as a value so the workflow can take the keyword-only
 * branch. Vectors are cached by normalized query text.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { CacheCoordinatorService } from '../cache/cache-coordinator.service';
import { normalizeQuery } from '../parser/filter-parser.service';
import type { EmbeddingVector } from '../types/search.types';
import { errorMessage } from '../errors/search.errors';
import { withTimeout } from '../../common/utils/with-timeout';

export const EMBEDDINGS_MODEL = Symbol('EMBEDDINGS_MODEL');

export type EmbeddingFailureReason =
  | 'EmptyInput'
  | 'DimensionMismatch'
  | 'UpstreamError';

export type EmbeddingOutcome =
  | { ok: true; vector: EmbeddingVector; fromCache: boolean }
  | { ok: false; reason: EmbeddingFailureReason; message: string };

@Injectable()
export class EmbeddingGatewayService {
  private readonly logger = new Logger(EmbeddingGatewayService.name);

  private readonly dimensions: number;
  private readonly timeoutMs: number;

  // Concurrent misses for the same text share one upstream call
  private readonly inFlight = new Map<string, Promise<EmbeddingOutcome>>();

  constructor(
    @Inject(EMBEDDINGS_MODEL) private readonly embeddings: Embeddings,
    providerFactory: EmbeddingProviderFactory,
    private readonly cache: CacheCoordinatorService,
  ) {
    const config = providerFactory.getConfig();
    this.dimensions = config.dimensions;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Calls the embedding model once, without the cache
   */
  async embed(text: string): Promise<EmbeddingOutcome> {
    const input = text.trim();
    if (!input) {
      return { ok: false, reason: 'EmptyInput', message: 'Query text is empty' };
    }

    let raw: number[];
    try {
      raw = await withTimeout(
        this.embeddings.embedQuery(input),
        this.timeoutMs,
        'Embedding request',
      );
    } catch (error) {
      return {
        ok: false,
        reason: 'UpstreamError',
        message: errorMessage(error),
      };
    }

    if (
      !Array.isArray(raw) ||
      !raw.every((n) => typeof n === 'number' && Number.isFinite(n))
    ) {
      return {
        ok: false,
        reason: 'UpstreamError',
        message: 'Embedding response is not a numeric vector',
      };
    }

    if (raw.length !== this.dimensions) {
      return {
        ok: false,
        reason: 'DimensionMismatch',
        message: `Expected ${this.dimensions} dimensions, got ${raw.length}`,
      };
    }

    return { ok: true, vector: raw, fromCache: false };
  }

  /**
   * Cache-or-compute. The cache is keyed by normalized text while the model
   * sees the trimmed original text.
   */
  async embedQuery(text: string): Promise<EmbeddingOutcome> {
    const normalized = normalizeQuery(text);
    if (!normalized) {
      return this.embed(text);
    }

    const cached = await this.cache.getEmbedding(normalized);
    if (cached.hit && cached.value.length === this.dimensions) {
      return { ok: true, vector: cached.value, fromCache: true };
    }

    const pending = this.inFlight.get(normalized);
    if (pending) {
      this.logger.debug(
        `[EmbeddingGateway] stage=embedding substage=single_flight status=joined`,
      );
      return pending;
    }

    const computation = this.computeAndStore(text, normalized).finally(() => {
      this.inFlight.delete(normalized);
    });
    this.inFlight.set(normalized, computation);
    return computation;
  }

  private async computeAndStore(
    text: string,
    normalized: string,
  ): Promise<EmbeddingOutcome> {
    const startTime = Date.now();
    const outcome = await this.embed(text);
    const duration = Date.now() - startTime;

    if (!outcome.ok) {
      this.logger.warn(
        `[EmbeddingGateway] stage=embedding substage=compute status=failed reason=${outcome.reason} duration=${duration}ms error=${outcome.message}`,
      );
      return outcome;
    }

    this.logger.log(
      `[EmbeddingGateway] stage=embedding substage=compute status=completed duration=${duration}ms dimensions=${outcome.vector.length}`,
    );
    await this.cache.setEmbedding(normalized, outcome.vector);
    return outcome;
  }
}
