/**
 * Analysis TCP Controller
 * Handles inter-service communication via TCP microservice
 *
 * TCP Endpoints:
 * 1. analyze_document - Run (or return cached) analysis
 * 2. get_document_analysis - Latest stored analysis
 */

import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { AnalysisOrchestratorService } from './analysis-orchestrator.service';
import { AnalysisError } from './errors/analysis-errors';
import {
  AnalyzeDocumentPayloadDto,
  DocumentIdParamDto,
} from './dto/analyze-document.dto';
import { toAnalysisResponse, type AnalysisResponseDto } from './dto/analysis-response.dto';
import { validatePayload } from '../common/validation/validation.utils';

interface AnalysisTcpResponse {
  success: boolean;
  analysis?: AnalysisResponseDto;
  error?: string;
  errorCode?: string;
}

@Controller()
export class AnalysisTcpController {
  private readonly logger = new Logger(AnalysisTcpController.name);

  constructor(private readonly orchestrator: AnalysisOrchestratorService) {}

  /**
   * Input: { documentId, forceReanalysis? }
   * Output: { success, analysis?, error?, errorCode? }
   */
  @MessagePattern({ cmd: 'analyze_document' })
  async analyzeDocument(@Payload() payload: unknown): Promise<AnalysisTcpResponse> {
    try {
      const { documentId, forceReanalysis } = await validatePayload(
        AnalyzeDocumentPayloadDto,
        payload,
      );

      this.logger.log(`TCP analyze_document request for document ${documentId}`);

      const result = await this.orchestrator.execute(documentId, {
        forceReanalysis: forceReanalysis ?? false,
      });

      return { success: true, analysis: toAnalysisResponse(result) };
    } catch (error: unknown) {
      return this.toErrorResponse('analyze_document', error);
    }
  }

  @MessagePattern({ cmd: 'get_document_analysis' })
  async getDocumentAnalysis(
    @Payload() payload: unknown,
  ): Promise<AnalysisTcpResponse> {
    try {
      const { documentId } = await validatePayload(DocumentIdParamDto, payload);
      const result = await this.orchestrator.getLatest(documentId);

      return { success: true, analysis: toAnalysisResponse(result) };
    } catch (error: unknown) {
      return this.toErrorResponse('get_document_analysis', error);
    }
  }

  private toErrorResponse(cmd: string, error: unknown): AnalysisTcpResponse {
    if (error instanceof AnalysisError) {
      this.logger.warn(`TCP ${cmd} rejected: [${error.code}] ${error.message}`);
      return { success: false, error: error.message, errorCode: error.code };
    }

    this.logger.error(
      `TCP ${cmd} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error occurred',
      errorCode: 'INTERNAL_ERROR',
    };
  }
}
