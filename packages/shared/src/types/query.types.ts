export const QUERY_INTENTS = [
  'alternatives',
  'comparison',
  'features',
  'pricing',
  'tutorial',
  'integration',
  'general',
] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export const TOOL_DOMAINS = [
  'monitoring',
  'ci_cd',
  'database',
  'cloud',
  'machine_learning',
  'frontend',
  'backend',
  'devops',
  'security',
  'testing',
  'general',
] as const;

export type ToolDomain = (typeof TOOL_DOMAINS)[number];

export interface ClassifiedQuery {
  readonly originalQuery: string;
  readonly intent: QueryIntent;
  readonly domain: ToolDomain;
  readonly targetSubject: string | null;
  /** Only set for comparison queries with an explicit `a vs b` pair. */
  readonly comparisonSubjects: readonly [string, string] | null;
}

export interface SynthesizedQueries {
  readonly searchQuery: string;
  readonly articleQuery: string;
}

export interface QueryAnalysis {
  readonly originalQuery: string;
  readonly intent: QueryIntent;
  readonly domain: ToolDomain;
  readonly targetSubject: string | null;
  readonly comparisonSubjects: readonly [string, string] | null;
  readonly searchQuery: string | null;
  readonly articleQuery: string | null;
  readonly isValid: boolean;
}
