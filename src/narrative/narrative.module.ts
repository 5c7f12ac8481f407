import { Logger, Module } from '@nestjs/common';
import {
  NARRATIVE_STORE_DRIVER,
  NARRATIVES_JSON,
} from './config/narrative.constants';
import {
  buildNarrativeConfig,
  NARRATIVE_CONFIG,
} from './config/narrative.config';
import { AdminTokenGuard } from './guards/admin-token.guard';
import { NarrativeController } from './narrative.controller';
import { ClusterBuilderService } from './services/cluster-builder.service';
import { EntityExtractionService } from './services/entity-extraction.service';
import { FingerprintService } from './services/fingerprint.service';
import { LlmClientService } from './services/llm-client.service';
import { NarrativeDedupeService } from './services/narrative-dedupe.service';
import { NarrativeLifecycleService } from './services/narrative-lifecycle.service';
import { NarrativeMatcherService } from './services/narrative-matcher.service';
import { NarrativeMergeService } from './services/narrative-merge.service';
import { NarrativePipelineService } from './services/narrative-pipeline.service';
import { NarrativeQueryService } from './services/narrative-query.service';
import { NarrativeSummaryService } from './services/narrative-summary.service';
import { InMemoryNarrativeStore } from './store/in-memory-narrative.store';
import { JsonFileNarrativeStore } from './store/json-file-narrative.store';
import { NarrativeStore } from './store/narrative.store';

@Module({
  controllers: [NarrativeController],
  providers: [
    {
      provide: NARRATIVE_CONFIG,
      useFactory: () => buildNarrativeConfig(),
    },
    {
      provide: NarrativeStore,
      useFactory: (): NarrativeStore => {
        const logger = new Logger('NarrativeStore');
        if (NARRATIVE_STORE_DRIVER === 'memory') {
          logger.log('store driver=memory');
          return new InMemoryNarrativeStore();
        }
        logger.log(`store driver=file path=${NARRATIVES_JSON}`);
        return new JsonFileNarrativeStore(NARRATIVES_JSON);
      },
    },
    AdminTokenGuard,
    LlmClientService,
    EntityExtractionService,
    ClusterBuilderService,
    FingerprintService,
    NarrativeMatcherService,
    NarrativeLifecycleService,
    NarrativeMergeService,
    NarrativeSummaryService,
    NarrativeDedupeService,
    NarrativeQueryService,
    NarrativePipelineService,
  ],
  exports: [NarrativeQueryService, NarrativePipelineService, NarrativeStore],
})
export class NarrativeModule {}
