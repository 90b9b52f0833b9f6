import { AnalysisResult } from './analysis-result.entity';
import { Document } from './document.entity';

const base = {
  documentId: 'doc-1',
  missingTopics: ['Termination clauses'],
  summary: 'A service agreement.',
  insights: ['Add a termination clause'],
  analyzedAt: new Date('2025-06-01T10:00:00Z'),
  source: 'retrieval' as const,
};

describe('AnalysisResult', () => {
  it('trims, drops empty entries and de-duplicates lists', () => {
    const result = new AnalysisResult({
      ...base,
      missingTopics: [' Termination clauses ', '', 'Termination clauses', 'Governing law'],
      summary: '  A service agreement.  ',
    });

    expect(result.missingTopics).toEqual(['Termination clauses', 'Governing law']);
    expect(result.summary).toBe('A service agreement.');
  });

  it('is immutable', () => {
    const result = new AnalysisResult(base);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.insights)).toBe(true);
  });

  it('requires a document id', () => {
    expect(() => new AnalysisResult({ ...base, documentId: '' })).toThrow(
      'AnalysisResult.documentId is required',
    );
  });

  it('stamps the creation time', () => {
    const before = Date.now();
    const result = AnalysisResult.create({
      documentId: 'doc-1',
      missingTopics: [],
      summary: 'Summary',
      insights: ['One'],
      source: 'heuristic',
    });

    expect(result.analyzedAt.getTime()).toBeGreaterThanOrEqual(before);
    expect(result.id).toBeUndefined();
  });

  it('copies with an id without touching the timestamp', () => {
    const result = new AnalysisResult(base).withId('result-1');

    expect(result.id).toBe('result-1');
    expect(result.analyzedAt).toEqual(base.analyzedAt);
  });

  it.each([
    { missingTopics: ['a'], insights: ['b'], summary: 'S', meaningful: true, complete: true },
    { missingTopics: [], insights: ['b'], summary: 'S', meaningful: true, complete: false },
    { missingTopics: ['a'], insights: [], summary: 'S', meaningful: true, complete: false },
    { missingTopics: [], insights: [], summary: 'S', meaningful: false, complete: false },
    { missingTopics: ['a'], insights: ['b'], summary: ' ', meaningful: false, complete: false },
  ])(
    'topics=$missingTopics insights=$insights summary="$summary"',
    ({ missingTopics, insights, summary, meaningful, complete }) => {
      const result = new AnalysisResult({ ...base, missingTopics, insights, summary });

      expect(result.hasMeaningfulAnalysis()).toBe(meaningful);
      expect(result.isComplete()).toBe(complete);
    },
  );
});

describe('Document', () => {
  const props = { id: 'doc-1', name: 'Contract', status: 'draft', content: 'Text' };

  it('can be analyzed when live and non-blank', () => {
    expect(new Document(props).canBeAnalyzed()).toBe(true);
  });

  it('cannot be analyzed when blank', () => {
    expect(new Document({ ...props, content: '\n  ' }).canBeAnalyzed()).toBe(false);
  });

  it('cannot be analyzed when deleted', () => {
    const document = new Document({ ...props, deletedAt: new Date() });

    expect(document.isDeleted()).toBe(true);
    expect(document.canBeAnalyzed()).toBe(false);
  });
});
