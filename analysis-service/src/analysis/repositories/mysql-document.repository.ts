import { Inject, Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DATABASE_CONNECTION, type Database } from '../../database/database.module';
import { documents, type DocumentRow } from '../../database/schema';
import { Document } from '../entities/document.entity';
import type { DocumentRepository } from './document.repository';

/**
 * Read-only view of the document subsystem's table
 */
@Injectable()
export class MySQLDocumentRepository implements DocumentRepository {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {}

  async findById(id: string): Promise<Document | null> {
    const [row] = await this.db
      .select()
      .from(documents)
      .where(eq(documents.id, id))
      .limit(1);

    return row ? toDocument(row) : null;
  }
}

function toDocument(row: DocumentRow): Document {
  return new Document({
    id: row.id,
    name: row.name,
    status: row.status,
    content: row.content ?? '',
    deletedAt: row.deletedAt,
  });
}
