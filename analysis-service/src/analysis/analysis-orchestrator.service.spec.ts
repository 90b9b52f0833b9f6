import { Test } from '@nestjs/testing';
import { AnalysisOrchestratorService } from './analysis-orchestrator.service';
import { AnalysisResult } from './entities/analysis-result.entity';
import {
  AIServiceError,
  AnalysisNotFoundError,
  DocumentAnalysisError,
  DocumentNotFoundError,
} from './errors/analysis-errors';
import { ANALYSIS_REPOSITORY } from './repositories/analysis.repository';
import { DOCUMENT_REPOSITORY } from './repositories/document.repository';
import {
  HEURISTIC_ANALYZER,
  RETRIEVAL_ANALYZER,
  type AnalysisStrategy,
} from './strategies/analysis-strategy.interface';
import { HeuristicAnalyzerService } from './strategies/heuristic/heuristic-analyzer.service';
import { DEFAULT_HEURISTIC_RULES } from './strategies/heuristic/heuristic-rules';
import { InMemoryAnalysisRepository } from '../testing/in-memory-analysis.repository';
import { InMemoryDocumentRepository } from '../testing/in-memory-document.repository';

const CONTRACT_TEXT = [
  'This Service Agreement sets out the services the Service Provider performs for the Client.',
  'The Client pays a fixed monthly fee. Payment is due within 30 days of each invoice.',
  'The liability of the Service Provider is limited to the fees paid.',
].join('\n\n');

function retrievalResult(documentId: string, analyzedAt: Date): AnalysisResult {
  return new AnalysisResult({
    documentId,
    missingTopics: ['Termination clauses'],
    summary: 'A monthly service agreement.',
    insights: ['Add a termination clause'],
    analyzedAt,
    source: 'retrieval',
  });
}

describe('AnalysisOrchestratorService', () => {
  let orchestrator: AnalysisOrchestratorService;
  let documents: InMemoryDocumentRepository;
  let analyses: InMemoryAnalysisRepository;
  let retrieval: { analyze: jest.Mock<Promise<AnalysisResult>, Parameters<AnalysisStrategy['analyze']>> };
  let heuristic: HeuristicAnalyzerService;

  beforeEach(async () => {
    documents = new InMemoryDocumentRepository();
    analyses = new InMemoryAnalysisRepository();
    retrieval = { analyze: jest.fn() };
    heuristic = new HeuristicAnalyzerService(DEFAULT_HEURISTIC_RULES);

    const moduleRef = await Test.createTestingModule({
      providers: [
        AnalysisOrchestratorService,
        { provide: DOCUMENT_REPOSITORY, useValue: documents },
        { provide: ANALYSIS_REPOSITORY, useValue: analyses },
        { provide: RETRIEVAL_ANALYZER, useValue: retrieval },
        { provide: HEURISTIC_ANALYZER, useValue: heuristic },
      ],
    }).compile();

    orchestrator = moduleRef.get(AnalysisOrchestratorService);

    documents.add({ id: 'doc-1', name: 'Service agreement', status: 'signed', content: CONTRACT_TEXT });
  });

  it('rejects an unknown document', async () => {
    await expect(orchestrator.execute('missing')).rejects.toBeInstanceOf(
      DocumentNotFoundError,
    );
  });

  it('rejects whitespace-only content before any analysis runs', async () => {
    documents.add({ id: 'doc-blank', name: 'Blank', status: 'draft', content: ' \n\t ' });

    await expect(orchestrator.execute('doc-blank')).rejects.toBeInstanceOf(
      DocumentAnalysisError,
    );
    expect(retrieval.analyze).not.toHaveBeenCalled();
    expect(analyses.saved).toHaveLength(0);
  });

  it('rejects a deleted document', async () => {
    documents.add({
      id: 'doc-deleted',
      name: 'Old',
      status: 'signed',
      content: CONTRACT_TEXT,
      deletedAt: new Date('2025-01-01T00:00:00Z'),
    });

    await expect(orchestrator.execute('doc-deleted')).rejects.toThrow(
      'Document doc-deleted cannot be analyzed: document has been deleted',
    );
  });

  it('returns the stored result on repeated calls', async () => {
    retrieval.analyze.mockResolvedValue(
      retrievalResult('doc-1', new Date('2025-06-01T10:00:00Z')),
    );

    const first = await orchestrator.execute('doc-1');
    const second = await orchestrator.execute('doc-1');

    expect(first.id).toBeDefined();
    expect(second.id).toBe(first.id);
    expect(second.analyzedAt).toEqual(first.analyzedAt);
    expect(retrieval.analyze).toHaveBeenCalledTimes(1);
    expect(analyses.saved).toHaveLength(1);
  });

  it('creates a new result each time re-analysis is forced', async () => {
    retrieval.analyze
      .mockResolvedValueOnce(retrievalResult('doc-1', new Date('2025-06-01T10:00:00Z')))
      .mockResolvedValueOnce(retrievalResult('doc-1', new Date('2025-06-01T10:00:05Z')));

    const first = await orchestrator.execute('doc-1', { forceReanalysis: true });
    const second = await orchestrator.execute('doc-1', { forceReanalysis: true });

    expect(second.id).not.toBe(first.id);
    expect(second.analyzedAt.getTime()).toBeGreaterThan(first.analyzedAt.getTime());
    await expect(orchestrator.getLatest('doc-1')).resolves.toBe(second);
  });

  it('falls back to heuristics when the model-backed analysis fails', async () => {
    retrieval.analyze.mockRejectedValue(new AIServiceError('model timed out'));

    const result = await orchestrator.execute('doc-1');

    expect(result.source).toBe('heuristic');
    expect(result.hasMeaningfulAnalysis()).toBe(true);
    expect(result.missingTopics).toContain('Termination clauses');
    expect(analyses.saved).toEqual([result]);
  });

  it('stamps every forced heuristic run later than the one before', async () => {
    retrieval.analyze.mockRejectedValue(new AIServiceError('model unavailable'));

    const stamps: number[] = [];
    for (let run = 0; run < 20; run++) {
      const result = await orchestrator.execute('doc-1', { forceReanalysis: true });
      stamps.push(result.analyzedAt.getTime());
    }

    for (let i = 1; i < stamps.length; i++) {
      expect(stamps[i]).toBeGreaterThan(stamps[i - 1]);
    }
    expect(new Set(analyses.saved.map((r) => r.id)).size).toBe(20);
  });

  it('does not fall back on other errors', async () => {
    const analyzeSpy = jest.spyOn(heuristic, 'analyze');
    retrieval.analyze.mockRejectedValue(new Error('unexpected bug'));

    await expect(orchestrator.execute('doc-1')).rejects.toThrow('unexpected bug');
    expect(analyzeSpy).not.toHaveBeenCalled();
  });

  it('writes nothing when the request is aborted before persisting', async () => {
    const controller = new AbortController();
    retrieval.analyze.mockImplementation(async (document) => {
      controller.abort();
      return retrievalResult(document.id, new Date());
    });

    await expect(
      orchestrator.execute('doc-1', { signal: controller.signal }),
    ).rejects.toThrow();
    expect(analyses.saved).toHaveLength(0);
  });

  describe('getLatest', () => {
    it('rejects a document that was never analyzed', async () => {
      await expect(orchestrator.getLatest('doc-1')).rejects.toBeInstanceOf(
        AnalysisNotFoundError,
      );
    });
  });
});
