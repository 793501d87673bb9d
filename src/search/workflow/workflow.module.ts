/**
 * Workflow Module
 * Provides SearchWorkflowService with all required dependencies
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SearchWorkflowService } from './search-workflow.service';
import { FilterParserService } from '../parser/filter-parser.service';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import {
  EMBEDDINGS_MODEL,
  EmbeddingGatewayService,
} from '../services/embedding-gateway.service';
import { SEARCH_ENGINE } from '../engine/search-engine.interface';
import { QdrantSearchEngine } from '../engine/qdrant-search.engine';

@Module({
  imports: [ConfigModule],
  providers: [
    // Workflow service
    SearchWorkflowService,

    // Factories
    EmbeddingProviderFactory,
    {
      provide: EMBEDDINGS_MODEL,
      inject: [EmbeddingProviderFactory],
      useFactory: (factory: EmbeddingProviderFactory) =>
        factory.createEmbeddingModel(),
    },

    // Services
    FilterParserService,
    EmbeddingGatewayService,
    { provide: SEARCH_ENGINE, useClass: QdrantSearchEngine },
  ],
  exports: [SearchWorkflowService, SEARCH_ENGINE],
})
export class WorkflowModule {}
