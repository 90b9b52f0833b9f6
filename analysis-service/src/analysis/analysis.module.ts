import { Module } from '@nestjs/common';
import { StrategiesModule } from './strategies/strategies.module';
import { AnalysisOrchestratorService } from './analysis-orchestrator.service';
import { AnalysisController } from './analysis.controller';
import { AnalysisTcpController } from './analysis-tcp.controller';
import { HealthController } from './health.controller';
import { ANALYSIS_REPOSITORY } from './repositories/analysis.repository';
import { DOCUMENT_REPOSITORY } from './repositories/document.repository';
import { MySQLAnalysisRepository } from './repositories/mysql-analysis.repository';
import { MySQLDocumentRepository } from './repositories/mysql-document.repository';

/**
 * Analysis Module
 * Use case, repositories and the HTTP/TCP surfaces
 */
@Module({
  imports: [StrategiesModule],
  controllers: [AnalysisController, AnalysisTcpController, HealthController],
  providers: [
    AnalysisOrchestratorService,
    { provide: ANALYSIS_REPOSITORY, useClass: MySQLAnalysisRepository },
    { provide: DOCUMENT_REPOSITORY, useClass: MySQLDocumentRepository },
  ],
  exports: [AnalysisOrchestratorService],
})
export class AnalysisModule {}
