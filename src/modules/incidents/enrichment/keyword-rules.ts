import { z } from 'zod';
import { SEVERITY_NAMES, severityFromName, severityName, IncidentSeverity } from '../models/incident-severity';
import rawRules from './enrichment-rules.json';

/**
 * Keyword rules used by the mock enricher
 *
 * Loaded from enrichment-rules.json and validated once at module load.
 * Matching is a case-insensitive substring test, so "auth" also matches
 * "authorization".
 */
export const KeywordRulesSchema = z.object({
  severity: z.array(
    z.object({
      severity: z.enum(SEVERITY_NAMES),
      keywords: z.array(z.string().min(1)).min(1),
    }),
  ),
  defaultSeverity: z.enum(SEVERITY_NAMES),
  tags: z.array(
    z.object({
      tag: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
      /** Only the first matching tag of a group is applied */
      exclusiveGroup: z.string().optional(),
    }),
  ),
  defaultTag: z.string().min(1),
  summaryPrefix: z.string(),
  summaryMaxLength: z.number().int().positive(),
  confidenceScore: z.number().min(0).max(1),
});

export type KeywordRules = z.infer<typeof KeywordRulesSchema>;

export const KEYWORD_RULES: KeywordRules = KeywordRulesSchema.parse(rawRules);

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword.toLowerCase()));
}

/**
 * First severity rule (in file order) with a matching keyword wins
 */
export function classifySeverity(description: string, rules: KeywordRules = KEYWORD_RULES): IncidentSeverity {
  const text = description.toLowerCase();
  const match = rules.severity.find((rule) => containsAny(text, rule.keywords));
  return severityFromName(match?.severity ?? rules.defaultSeverity);
}

export function extractTags(description: string, rules: KeywordRules = KEYWORD_RULES): string[] {
  const text = description.toLowerCase();
  const tags: string[] = [];
  const claimedGroups = new Set<string>();

  for (const rule of rules.tags) {
    if (rule.exclusiveGroup !== undefined && claimedGroups.has(rule.exclusiveGroup)) {
      continue;
    }
    if (containsAny(text, rule.keywords)) {
      tags.push(rule.tag);
      if (rule.exclusiveGroup !== undefined) {
        claimedGroups.add(rule.exclusiveGroup);
      }
    }
  }

  return tags.length > 0 ? tags : [rules.defaultTag];
}

export function summarize(
  description: string,
  severity: IncidentSeverity,
  rules: KeywordRules = KEYWORD_RULES,
): string {
  const issue =
    description.length > rules.summaryMaxLength
      ? `${description.substring(0, rules.summaryMaxLength)}...`
      : description;

  return `${rules.summaryPrefix} Severity: ${severityName(severity)}. Issue: ${issue}`;
}
