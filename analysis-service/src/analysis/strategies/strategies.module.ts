import { Module } from '@nestjs/common';
import { ChunkModule } from '../stages/chunk/chunk.module';
import { EmbedModule } from '../stages/embed/embed.module';
import { ProvidersModule } from '../providers/providers.module';
import { RetrievalAnalyzerService } from './retrieval/retrieval-analyzer.service';
import { HeuristicAnalyzerService } from './heuristic/heuristic-analyzer.service';
import {
  DEFAULT_HEURISTIC_RULES,
  HEURISTIC_RULES,
} from './heuristic/heuristic-rules';
import {
  HEURISTIC_ANALYZER,
  RETRIEVAL_ANALYZER,
} from './analysis-strategy.interface';
import { ANALYSIS_CLOCK, monotonicClock } from '../../common/utils/clock';

/**
 * Strategies Module
 * Model-backed analyzer plus its rule-based fallback
 */
@Module({
  imports: [ProvidersModule, ChunkModule, EmbedModule],
  providers: [
    { provide: HEURISTIC_RULES, useValue: DEFAULT_HEURISTIC_RULES },
    { provide: ANALYSIS_CLOCK, useValue: monotonicClock },
    RetrievalAnalyzerService,
    HeuristicAnalyzerService,
    { provide: RETRIEVAL_ANALYZER, useExisting: RetrievalAnalyzerService },
    { provide: HEURISTIC_ANALYZER, useExisting: HeuristicAnalyzerService },
  ],
  exports: [RETRIEVAL_ANALYZER, HEURISTIC_ANALYZER],
})
export class StrategiesModule {}
