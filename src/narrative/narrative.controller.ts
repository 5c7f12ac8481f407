import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { LIST_MAX_LIMIT } from './config/narrative.constants';
import { NarrativeNotFoundError } from './errors/narrative.errors';
import { AdminTokenGuard } from './guards/admin-token.guard';
import { asRecord } from './services/llm-client.service';
import { normalizeExtractionPayload } from './services/entity-extraction.service';
import { NarrativeDedupeService } from './services/narrative-dedupe.service';
import { NarrativePipelineService } from './services/narrative-pipeline.service';
import {
  ACTIVE_STATES,
  NarrativeQueryService,
} from './services/narrative-query.service';
import { NarrativeSummaryService } from './services/narrative-summary.service';
import {
  Article,
  CycleReport,
  DedupeReport,
  LifecycleState,
  NarrativeDetail,
  NarrativeListItem,
  ResurrectionListItem,
  SummaryRunReport,
} from './types/narrative.types';
import { parseDateToIso } from './utils/date.util';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

@Controller('narratives')
export class NarrativeController {
  constructor(
    private readonly queryService: NarrativeQueryService,
    private readonly pipelineService: NarrativePipelineService,
    private readonly dedupeService: NarrativeDedupeService,
    private readonly summaryService: NarrativeSummaryService,
  ) {}

  @Get('active')
  async getActive(
    @Query('state') stateRaw?: string,
    @Query('limit') limitRaw?: string,
  ): Promise<NarrativeListItem[]> {
    return this.queryService.listActive({
      state: this.parseState(stateRaw),
      limit: this.parsePositive(limitRaw, 'limit', LIST_MAX_LIMIT),
    });
  }

  @Get('archive')
  async getArchive(
    @Query('days') daysRaw?: string,
    @Query('limit') limitRaw?: string,
  ): Promise<NarrativeListItem[]> {
    return this.queryService.listArchived({
      days: this.parsePositive(daysRaw, 'days'),
      limit: this.parsePositive(limitRaw, 'limit', LIST_MAX_LIMIT),
    });
  }

  @Get('resurrections')
  async getResurrections(
    @Query('days') daysRaw?: string,
    @Query('limit') limitRaw?: string,
  ): Promise<ResurrectionListItem[]> {
    return this.queryService.listResurrections({
      days: this.parsePositive(daysRaw, 'days'),
      limit: this.parsePositive(limitRaw, 'limit', LIST_MAX_LIMIT),
    });
  }

  @Get(':id')
  async getDetail(@Param('id') id: string): Promise<NarrativeDetail> {
    try {
      return await this.queryService.getDetail(id);
    } catch (error) {
      if (error instanceof NarrativeNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }

  @Post('cycle')
  @UseGuards(AdminTokenGuard)
  async runCycle(@Body('articles') articlesRaw?: unknown): Promise<CycleReport> {
    return this.pipelineService.runCycle(this.parseArticles(articlesRaw));
  }

  @Post('dedupe')
  @UseGuards(AdminTokenGuard)
  async runDedupe(): Promise<DedupeReport> {
    return this.dedupeService.run();
  }

  @Post('summaries')
  @UseGuards(AdminTokenGuard)
  async processSummaries(
    @Body('limit') limitRaw?: unknown,
  ): Promise<SummaryRunReport> {
    const limit = this.parsePositive(limitRaw, 'limit', LIST_MAX_LIMIT);
    return limit == null
      ? this.summaryService.processOutbox()
      : this.summaryService.processOutbox(limit);
  }

  private parseState(value: unknown): LifecycleState | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const state = ACTIVE_STATES.find((candidate) => candidate === value);
    if (!state) {
      throw new BadRequestException(
        `state must be one of ${ACTIVE_STATES.join(', ')}`,
      );
    }
    return state;
  }

  private parsePositive(
    value: unknown,
    fieldName: string,
    max?: number,
  ): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 1) {
      throw new BadRequestException(`${fieldName} must be a positive number`);
    }
    const floored = Math.floor(parsed);
    return max == null ? floored : Math.min(max, floored);
  }

  private parseArticles(value: unknown): Article[] {
    if (!Array.isArray(value)) {
      throw new BadRequestException('articles must be an array');
    }

    return value.map((item, index) => {
      const record = asRecord(item);
      if (!record) {
        throw new BadRequestException(`articles[${index}] must be an object`);
      }
      const id = typeof record.id === 'string' ? record.id.trim() : '';
      if (!id) {
        throw new BadRequestException(`articles[${index}].id is required`);
      }
      const publishedAt = parseDateToIso(optionalString(record.publishedAt) ?? '');
      if (!publishedAt) {
        throw new BadRequestException(
          `articles[${index}].publishedAt must be a date`,
        );
      }

      const extraction = asRecord(record.extraction);
      return {
        id,
        publishedAt,
        source: optionalString(record.source) ?? '',
        title: optionalString(record.title),
        text: optionalString(record.text),
        extraction: extraction
          ? normalizeExtractionPayload(extraction)
          : undefined,
      };
    });
  }
}
