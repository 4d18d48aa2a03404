import { z } from 'zod';
import { compileWordPattern } from '@toolscout/shared/src/utils/word-pattern.js';
import { QUERY_INTENTS, TOOL_DOMAINS } from '@toolscout/shared/src/types/query.types.js';

const PatternSourceSchema = z.string().min(1).refine(
  (source) => {
    try {
      compileWordPattern(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' },
);

const IntentRuleSchema = z.object({
  intent: z.enum(QUERY_INTENTS).exclude(['general']),
  patterns: z.array(PatternSourceSchema).min(1),
});

const DomainRuleSchema = z.object({
  domain: z.enum(TOOL_DOMAINS).exclude(['general']),
  patterns: z.array(PatternSourceSchema).min(1),
});

function hasUniqueLabels<T>(rules: readonly T[], label: (rule: T) => string): boolean {
  return new Set(rules.map(label)).size === rules.length;
}

export const ClassificationRulesSchema = z.object({
  $schema: z.string().optional(),
  intents: z
    .array(IntentRuleSchema)
    .min(1)
    .refine((rules) => hasUniqueLabels(rules, (r) => r.intent), {
      message: 'Each intent may only appear once',
    }),
  domains: z
    .array(DomainRuleSchema)
    .min(1)
    .refine((rules) => hasUniqueLabels(rules, (r) => r.domain), {
      message: 'Each domain may only appear once',
    }),
});

export type ClassificationRules = z.infer<typeof ClassificationRulesSchema>;
export type IntentRule = z.infer<typeof IntentRuleSchema>;
export type DomainRule = z.infer<typeof DomainRuleSchema>;
