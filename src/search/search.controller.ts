/**
 * Search HTTP Controller
 *
 * Request:
 * {
 *   "query": "3+ bed under 500k in Austin, TX",
 *   "page": 1,        // optional, default: 1
 *   "size": 20,       // optional, 1..100, default: 20
 *   "useCache": true  // optional, default: true
 * }
 *
 * Response: SearchResult (hits, totalMatches, filterPlan, servedFrom,
 * performance)
 */

import {
  BadGatewayException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { SearchRequestDto } from './dto/search-request.dto';
import { SearchWorkflowService } from './workflow/search-workflow.service';
import { SearchEngineError } from './errors/search.errors';
import type { SearchResult } from './types/search.types';

@Controller('search')
export class SearchController {
  private readonly logger = new Logger(SearchController.name);

  constructor(private readonly workflowService: SearchWorkflowService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async search(@Body() body: SearchRequestDto): Promise<SearchResult> {
    try {
      return await this.workflowService.search(
        body.query,
        body.page ?? 1,
        body.size,
        body.useCache ?? true,
      );
    } catch (error) {
      if (error instanceof SearchEngineError) {
        this.logger.error(`Search failed for "${body.query}": ${error.message}`);
        throw new BadGatewayException('Search failed');
      }
      throw error;
    }
  }
}
