import { z } from 'zod';
import rawRules from './heuristic-rules.json';

const topicRuleSchema = z.object({
  topic: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
});

const documentTypeRuleSchema = z.object({
  type: z.string().min(1),
  label: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  topics: z.array(topicRuleSchema).min(1),
});

export const heuristicRulesSchema = z.object({
  summaryMaxLength: z.number().int().positive(),
  maxInsights: z.number().int().positive(),
  shortDocumentWords: z.number().int().nonnegative(),
  longDocumentWords: z.number().int().positive(),
  signaturePatterns: z.array(z.string().min(1)),
  documentTypes: z.array(documentTypeRuleSchema),
  generic: z.object({
    label: z.string().min(1),
    reviewReminders: z.array(z.string().min(1)).min(1),
  }),
  insightTemplates: z.object({
    missingTopics: z.string(),
    allTopicsCovered: z.string(),
    unknownType: z.string(),
    noDates: z.string(),
    noSignatures: z.string(),
    shortDocument: z.string(),
    longDocument: z.string(),
    draftStatus: z.string(),
    pendingStatus: z.string(),
  }),
});

export type HeuristicRules = z.infer<typeof heuristicRulesSchema>;
export type DocumentTypeRule = z.infer<typeof documentTypeRuleSchema>;

/**
 * Bundled rule set, validated once at load
 */
export const DEFAULT_HEURISTIC_RULES: HeuristicRules =
  heuristicRulesSchema.parse(rawRules);

export const HEURISTIC_RULES = 'HEURISTIC_RULES';

/**
 * Fill `{name}` placeholders; unknown names are left as-is
 */
export function renderTemplate(
  template: string,
  values: Record<string, string | number>,
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match,
  );
}
