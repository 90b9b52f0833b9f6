import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { DATABASE_CONNECTION, type Database } from '../../database/database.module';
import { analysisResults, type AnalysisResultRow } from '../../database/schema';
import { AnalysisResult } from '../entities/analysis-result.entity';
import { getInteger } from '../../common/config/config.utils';
import { sleep } from '../../common/utils/async.utils';
import type { AnalysisRepository } from './analysis.repository';

const LOCK_CONFLICT_CODES = new Set(['ER_LOCK_DEADLOCK', 'ER_LOCK_WAIT_TIMEOUT']);

/**
 * Drizzle/MySQL analysis store.
 * A unique key on document_id keeps one row per document; writes upsert
 * over it, so a newer analysis replaces the older one.
 */
@Injectable()
export class MySQLAnalysisRepository implements AnalysisRepository {
  private readonly logger = new Logger(MySQLAnalysisRepository.name);
  private readonly maxAttempts: number;

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
    private readonly configService: ConfigService,
  ) {
    this.maxAttempts = getInteger(
      this.configService,
      'ANALYSIS_SAVE_MAX_ATTEMPTS',
      3,
    );
  }

  async findByDocumentId(documentId: string): Promise<AnalysisResult | null> {
    const [row] = await this.db
      .select()
      .from(analysisResults)
      .where(eq(analysisResults.documentId, documentId))
      .limit(1);

    return row ? toAnalysisResult(row) : null;
  }

  async save(result: AnalysisResult): Promise<AnalysisResult> {
    const row = {
      id: result.id ?? uuidv4(),
      documentId: result.documentId,
      missingTopics: [...result.missingTopics],
      summary: result.summary,
      insights: [...result.insights],
      source: result.source,
      analyzedAt: result.analyzedAt,
    };

    for (let attempt = 1; ; attempt++) {
      try {
        await this.db
          .insert(analysisResults)
          .values(row)
          .onDuplicateKeyUpdate({
            set: {
              id: row.id,
              missingTopics: row.missingTopics,
              summary: row.summary,
              insights: row.insights,
              source: row.source,
              analyzedAt: row.analyzedAt,
            },
          });
        break;
      } catch (error) {
        if (!isLockConflict(error) || attempt >= this.maxAttempts) {
          throw error;
        }

        this.logger.warn(
          `Lock conflict saving analysis for document ${row.documentId} (attempt ${attempt}/${this.maxAttempts}), retrying...`,
        );
        await sleep(50 * attempt);
      }
    }

    // A concurrent write may already have replaced the row; return our own
    return result.withId(row.id);
  }
}

function toAnalysisResult(row: AnalysisResultRow): AnalysisResult {
  return new AnalysisResult({
    id: row.id,
    documentId: row.documentId,
    missingTopics: row.missingTopics,
    summary: row.summary,
    insights: row.insights,
    source: row.source,
    analyzedAt: row.analyzedAt,
  });
}

/**
 * Deadlock or lock-wait timeout, either raw from mysql2 or wrapped by Drizzle
 */
export function isLockConflict(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if (
    'code' in error &&
    typeof error.code === 'string' &&
    LOCK_CONFLICT_CODES.has(error.code)
  ) {
    return true;
  }

  return 'cause' in error ? isLockConflict(error.cause) : false;
}
