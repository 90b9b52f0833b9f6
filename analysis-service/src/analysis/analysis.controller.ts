/**
 * Analysis HTTP Controller
 *
 * POST /documents/:documentId/analysis  - analyze (or return cached) result
 * GET  /documents/:documentId/analysis  - latest stored result
 */

import { Body, Controller, Get, HttpCode, Logger, Param, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { AnalysisOrchestratorService } from './analysis-orchestrator.service';
import { AnalyzeDocumentDto, DocumentIdParamDto } from './dto/analyze-document.dto';
import { toAnalysisResponse, type AnalysisResponseDto } from './dto/analysis-response.dto';
import { abortSignalOnClose } from '../common/utils/async.utils';

@Controller('documents/:documentId/analysis')
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(private readonly orchestrator: AnalysisOrchestratorService) {}

  @Post()
  @HttpCode(200)
  async analyze(
    @Param() params: DocumentIdParamDto,
    @Body() body: AnalyzeDocumentDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<AnalysisResponseDto> {
    this.logger.log(
      `Analyze request for document ${params.documentId} (force=${body.forceReanalysis ?? false})`,
    );

    const result = await this.orchestrator.execute(params.documentId, {
      forceReanalysis: body.forceReanalysis ?? false,
      // Nothing is stored if the client hangs up mid-analysis
      signal: abortSignalOnClose(res),
    });

    return toAnalysisResponse(result);
  }

  @Get()
  async getLatest(
    @Param() params: DocumentIdParamDto,
  ): Promise<AnalysisResponseDto> {
    return toAnalysisResponse(
      await this.orchestrator.getLatest(params.documentId),
    );
  }
}
