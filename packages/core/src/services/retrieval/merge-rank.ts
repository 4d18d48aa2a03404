import type { RankedDocument, RawHit } from '@toolscout/shared/src/types/retrieval.types.js';

const MAX_SCORE = 1.0;

/**
 * Identity of a hit for deduplication: protocol, host and path lower-cased,
 * trailing slashes dropped. Strings that do not parse as URLs are compared
 * trimmed and lower-cased.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim().toLowerCase().replace(/\/+$/, '');
  }

  const path = parsed.pathname.toLowerCase().replace(/\/+$/, '');
  return `${parsed.protocol.toLowerCase()}//${parsed.host.toLowerCase()}${path}${parsed.search}`;
}

function positionBonus(position: number): number {
  if (position <= 3) return 0.3;
  if (position <= 5) return 0.2;
  return 0.1;
}

function bodyBonus(length: number): number {
  if (length > 500) return 0.3;
  if (length > 200) return 0.2;
  return 0.1;
}

function titleBonus(length: number): number {
  return length >= 10 && length <= 100 ? 0.2 : 0.1;
}

export function scoreHit(hit: RawHit): number {
  const score =
    positionBonus(hit.position) +
    (hit.source === 'primary' ? 0.2 : 0) +
    bodyBonus(hit.body.length) +
    titleBonus(hit.title.length);
  return Math.min(score, MAX_SCORE);
}

/**
 * Deduplicates by normalized URL (primary hits first, first occurrence wins),
 * scores, sorts by score descending then position ascending, and truncates.
 */
export function mergeHits(hits: readonly RawHit[], limit: number): RankedDocument[] {
  const ordered = [
    ...hits.filter((hit) => hit.source === 'primary'),
    ...hits.filter((hit) => hit.source === 'secondary'),
  ];

  const seen = new Set<string>();
  const documents: RankedDocument[] = [];
  for (const hit of ordered) {
    const key = normalizeUrl(hit.url);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    documents.push(Object.freeze({ ...hit, score: scoreHit(hit) }));
  }

  documents.sort((a, b) => b.score - a.score || a.position - b.position);
  return documents.slice(0, Math.max(0, limit));
}
