import type { Document } from '../entities/document.entity';

export const DOCUMENT_REPOSITORY = 'DOCUMENT_REPOSITORY';

export interface DocumentRepository {
  findById(id: string): Promise<Document | null>;
}
