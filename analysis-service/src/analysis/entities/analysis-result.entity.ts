import { monotonicClock, type Clock } from '../../common/utils/clock';

export type AnalysisSource = 'retrieval' | 'heuristic';

export interface AnalysisResultProps {
  id?: string;
  documentId: string;
  missingTopics: string[];
  summary: string;
  insights: string[];
  analyzedAt: Date;
  source: AnalysisSource;
}

/**
 * Outcome of one analysis run.
 * Immutable: a new analysis is a new record, never an update.
 */
export class AnalysisResult {
  readonly id?: string;
  readonly documentId: string;
  readonly missingTopics: readonly string[];
  readonly summary: string;
  readonly insights: readonly string[];
  readonly analyzedAt: Date;
  readonly source: AnalysisSource;

  constructor(props: AnalysisResultProps) {
    if (!props.documentId) {
      throw new Error('AnalysisResult.documentId is required');
    }

    this.id = props.id;
    this.documentId = props.documentId;
    this.missingTopics = Object.freeze(cleanList(props.missingTopics));
    this.summary = props.summary.trim();
    this.insights = Object.freeze(cleanList(props.insights));
    this.analyzedAt = new Date(props.analyzedAt.getTime());
    this.source = props.source;
    Object.freeze(this);
  }

  /**
   * Build a fresh result stamped with the clock's current time
   */
  static create(
    props: Omit<AnalysisResultProps, 'id' | 'analyzedAt'>,
    clock: Clock = monotonicClock,
  ): AnalysisResult {
    return new AnalysisResult({ ...props, analyzedAt: clock.now() });
  }

  /**
   * Copy carrying the identifier assigned by the store
   */
  withId(id: string): AnalysisResult {
    return new AnalysisResult({ ...this.toProps(), id });
  }

  hasMeaningfulAnalysis(): boolean {
    return (
      this.summary.length > 0 &&
      (this.missingTopics.length > 0 || this.insights.length > 0)
    );
  }

  isComplete(): boolean {
    return (
      this.summary.length > 0 &&
      this.missingTopics.length > 0 &&
      this.insights.length > 0
    );
  }

  toProps(): AnalysisResultProps {
    return {
      id: this.id,
      documentId: this.documentId,
      missingTopics: [...this.missingTopics],
      summary: this.summary,
      insights: [...this.insights],
      analyzedAt: new Date(this.analyzedAt.getTime()),
      source: this.source,
    };
  }
}

// Trimmed, non-empty, first occurrence wins
function cleanList(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];

  for (const item of items) {
    const value = item.trim();
    if (value && !seen.has(value)) {
      seen.add(value);
      cleaned.push(value);
    }
  }

  return cleaned;
}
