/**
 * Heuristic Analyzer
 * Rule-based fallback: keyword classification, topic checklist, extractive
 * summary and templated insights. No network calls.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { AnalysisResult } from '../../entities/analysis-result.entity';
import type { Document } from '../../entities/document.entity';
import type { AnalysisStrategy } from '../analysis-strategy.interface';
import {
  ANALYSIS_CLOCK,
  monotonicClock,
  type Clock,
} from '../../../common/utils/clock';
import {
  HEURISTIC_RULES,
  renderTemplate,
  type DocumentTypeRule,
  type HeuristicRules,
} from './heuristic-rules';

const MONTH =
  '(?:january|february|march|april|may|june|july|august|september|october|november|december)';

// Month names only count next to a day or year ("may" alone is a verb)
const DATE_PATTERNS: readonly RegExp[] = [
  /\b\d{4}-\d{2}-\d{2}\b/,
  /\b\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}\b/,
  new RegExp(`\\b${MONTH}\\s+\\d{1,2}(?:st|nd|rd|th)?\\b`, 'i'),
  new RegExp(`\\b${MONTH},?\\s+\\d{4}\\b`, 'i'),
  new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH}\\b`, 'i'),
];

@Injectable()
export class HeuristicAnalyzerService implements AnalysisStrategy {
  private readonly logger = new Logger(HeuristicAnalyzerService.name);

  constructor(
    @Inject(HEURISTIC_RULES) private readonly rules: HeuristicRules,
    @Optional()
    @Inject(ANALYSIS_CLOCK)
    private readonly clock: Clock = monotonicClock,
  ) {}

  async analyze(document: Document): Promise<AnalysisResult> {
    const text = document.content.toLowerCase();
    const normalized = document.content.replace(/\s+/g, ' ').trim();

    const typeRule = this.classify(`${document.name.toLowerCase()}\n${text}`);
    const label = typeRule?.label ?? this.rules.generic.label;

    const missingTopics = typeRule
      ? typeRule.topics
          .filter(({ patterns }) => !patterns.some((p) => text.includes(p)))
          .map(({ topic }) => topic)
      : [...this.rules.generic.reviewReminders];

    const insights = this.buildInsights(
      document,
      text,
      normalized,
      typeRule,
      missingTopics.length,
    );

    this.logger.log(
      `[HeuristicAnalyzer] documentId=${document.id} type=${typeRule?.type ?? 'generic'} missing=${missingTopics.length} insights=${insights.length}`,
    );

    return AnalysisResult.create(
      {
        documentId: document.id,
        missingTopics,
        summary: `${label}: ${this.summarize(normalized)}`,
        insights,
        source: 'heuristic',
      },
      this.clock,
    );
  }

  /**
   * Type with the most keyword hits; earlier rules win ties
   */
  private classify(text: string): DocumentTypeRule | undefined {
    let best: DocumentTypeRule | undefined;
    let bestScore = 0;

    for (const rule of this.rules.documentTypes) {
      const score = rule.keywords.reduce(
        (sum, keyword) => sum + countOccurrences(text, keyword),
        0,
      );
      if (score > bestScore) {
        best = rule;
        bestScore = score;
      }
    }

    return best;
  }

  /**
   * Leading sentences that fit the length cap
   */
  private summarize(normalized: string): string {
    const cap = this.rules.summaryMaxLength;
    let summary = '';

    for (const sentence of normalized.split(/(?<=[.!?])\s+/)) {
      const candidate = summary ? `${summary} ${sentence}` : sentence;
      if (candidate.length > cap) {
        break;
      }
      summary = candidate;
    }

    // First sentence alone is over the cap
    if (!summary) {
      summary = `${normalized.slice(0, cap - 1).trimEnd()}…`;
    }

    return summary;
  }

  private buildInsights(
    document: Document,
    text: string,
    normalized: string,
    typeRule: DocumentTypeRule | undefined,
    missingCount: number,
  ): string[] {
    const templates = this.rules.insightTemplates;
    const insights: string[] = [];

    if (!typeRule) {
      insights.push(templates.unknownType);
    } else if (missingCount > 0) {
      insights.push(
        renderTemplate(templates.missingTopics, {
          label: typeRule.label,
          count: missingCount,
          total: typeRule.topics.length,
        }),
      );
    } else {
      insights.push(
        renderTemplate(templates.allTopicsCovered, { label: typeRule.label }),
      );
    }

    const status = document.status.toLowerCase();
    if (status === 'draft') {
      insights.push(templates.draftStatus);
    } else if (status === 'pending') {
      insights.push(templates.pendingStatus);
    }

    if (!DATE_PATTERNS.some((pattern) => pattern.test(normalized))) {
      insights.push(templates.noDates);
    }

    if (!this.rules.signaturePatterns.some((p) => text.includes(p))) {
      insights.push(templates.noSignatures);
    }

    const words = normalized.split(' ').filter(Boolean).length;
    if (words < this.rules.shortDocumentWords) {
      insights.push(renderTemplate(templates.shortDocument, { words }));
    } else if (words > this.rules.longDocumentWords) {
      insights.push(renderTemplate(templates.longDocument, { words }));
    }

    return insights.slice(0, this.rules.maxInsights);
  }
}

function countOccurrences(text: string, needle: string): number {
  let count = 0;
  let position = text.indexOf(needle);

  while (position !== -1) {
    count++;
    position = text.indexOf(needle, position + needle.length);
  }

  return count;
}
