/**
 * Analyze Document DTOs
 */

import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class DocumentIdParamDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(36)
  declare documentId: string;
}

export class AnalyzeDocumentDto {
  @IsOptional()
  @IsBoolean()
  declare forceReanalysis?: boolean;
}

/**
 * TCP payload: { documentId, forceReanalysis? }
 */
export class AnalyzeDocumentPayloadDto extends DocumentIdParamDto {
  @IsOptional()
  @IsBoolean()
  declare forceReanalysis?: boolean;
}
