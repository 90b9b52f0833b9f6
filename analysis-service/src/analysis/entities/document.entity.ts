/**
 * Document as seen by the analysis pipeline.
 * Owned by the document subsystem; this service only reads it.
 */
export interface DocumentProps {
  id: string;
  name: string;
  status: string;
  content: string;
  deletedAt?: Date | null;
}

export class Document {
  readonly id: string;
  readonly name: string;
  readonly status: string;
  readonly content: string;
  readonly deletedAt: Date | null;

  constructor(props: DocumentProps) {
    this.id = props.id;
    this.name = props.name;
    this.status = props.status;
    this.content = props.content;
    this.deletedAt = props.deletedAt ?? null;
  }

  isDeleted(): boolean {
    return this.deletedAt !== null;
  }

  /**
   * True when the document is live and carries non-blank text
   */
  canBeAnalyzed(): boolean {
    return !this.isDeleted() && this.content.trim().length > 0;
  }
}
