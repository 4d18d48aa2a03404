import { describe, it, expect } from 'vitest';
import {
  classifyQuery,
  createQueryClassifier,
  extractComparisonSubjects,
  extractTargetSubject,
  validateQuery,
} from './classifier.js';

describe('classifyQuery', () => {
  it('should classify a two-tool comparison and keep the pair in order', () => {
    const result = classifyQuery('datadog vs newrelic');

    expect(result.intent).toBe('comparison');
    expect(result.domain).toBe('monitoring');
    expect(result.comparisonSubjects).toEqual(['datadog', 'newrelic']);
    expect(result.targetSubject).toBe('datadog newrelic');
  });

  it('should classify an alternatives query and extract its subject', () => {
    const result = classifyQuery('mlflow alternatives');

    expect(result.intent).toBe('alternatives');
    expect(result.domain).toBe('machine_learning');
    expect(result.targetSubject).toBe('mlflow');
    expect(result.comparisonSubjects).toBeNull();
  });

  it('should prefer alternatives over comparison when both match', () => {
    const result = classifyQuery('Datadog alternatives vs Grafana');

    expect(result.intent).toBe('alternatives');
    expect(result.comparisonSubjects).toBeNull();
  });

  it('should treat "compare" as an alternatives query', () => {
    expect(classifyQuery('compare ci tools')).toMatchObject({
      intent: 'alternatives',
      domain: 'ci_cd',
    });
    expect(classifyQuery('compare datadog and grafana')).toMatchObject({
      intent: 'alternatives',
      domain: 'monitoring',
      targetSubject: 'datadog and grafana',
    });
  });

  it('should keep the original casing of comparison subjects', () => {
    const result = classifyQuery('Jenkins vs GitHub Actions');

    expect(result.intent).toBe('comparison');
    expect(result.domain).toBe('ci_cd');
    expect(result.comparisonSubjects).toEqual(['Jenkins', 'GitHub Actions']);
  });

  it('should allow a comparison intent without a pair', () => {
    const result = classifyQuery('difference between datadog and grafana');

    expect(result.intent).toBe('comparison');
    expect(result.comparisonSubjects).toBeNull();
    expect(result.targetSubject).toBe('difference between datadog and grafana');
  });

  it('should keep non-ASCII tool names whole', () => {
    const result = classifyQuery('Müller vs Straße');

    expect(result.intent).toBe('comparison');
    expect(result.comparisonSubjects).toEqual(['Müller', 'Straße']);
    expect(result.targetSubject).toBe('müller straße');
  });

  it('should not match rule patterns inside non-ASCII words', () => {
    expect(classifyQuery('pricingé').intent).toBe('general');
    expect(classifyQuery('café pricing').intent).toBe('pricing');
  });

  it('should classify pricing, tutorial and integration intents', () => {
    expect(classifyQuery('redis pricing')).toMatchObject({
      intent: 'pricing',
      domain: 'database',
      targetSubject: 'redis',
    });
    expect(classifyQuery('how to deploy kubernetes')).toMatchObject({
      intent: 'tutorial',
      domain: 'cloud',
      targetSubject: 'deploy kubernetes',
    });
    expect(classifyQuery('stripe api')).toMatchObject({
      intent: 'integration',
      domain: 'backend',
      targetSubject: 'stripe api',
    });
  });

  it('should fall back to general for unmatched text', () => {
    const result = classifyQuery('postgres');

    expect(result.intent).toBe('general');
    expect(result.domain).toBe('general');
    expect(result.targetSubject).toBe('postgres');
  });

  it('should still classify text that fails validation', () => {
    const text = '###$$$%%%';

    expect(validateQuery(text)).toBe(false);
    const result = classifyQuery(text);
    expect(result.intent).toBe('general');
    expect(result.domain).toBe('general');
    expect(result.originalQuery).toBe(text);
  });

  it('should return a frozen value', () => {
    expect(Object.isFrozen(classifyQuery('mlflow alternatives'))).toBe(true);
  });
});

describe('createQueryClassifier', () => {
  it('should evaluate rules in table order', () => {
    const domains = [{ domain: 'testing' as const, patterns: ['\\bjest\\b'] }];
    const pricingFirst = createQueryClassifier({
      intents: [
        { intent: 'pricing', patterns: ['\\bfree\\b'] },
        { intent: 'tutorial', patterns: ['\\bfree\\b'] },
      ],
      domains,
    });
    const tutorialFirst = createQueryClassifier({
      intents: [
        { intent: 'tutorial', patterns: ['\\bfree\\b'] },
        { intent: 'pricing', patterns: ['\\bfree\\b'] },
      ],
      domains,
    });

    expect(pricingFirst.classify('free jest course').intent).toBe('pricing');
    expect(tutorialFirst.classify('free jest course').intent).toBe('tutorial');
    expect(tutorialFirst.classify('free jest course').domain).toBe('testing');
  });
});

describe('validateQuery', () => {
  it('should reject text shorter than two characters after trimming', () => {
    expect(validateQuery('')).toBe(false);
    expect(validateQuery('   ')).toBe(false);
    expect(validateQuery(' a ')).toBe(false);
    expect(validateQuery('ab')).toBe(true);
  });

  it('should reject text dominated by special characters', () => {
    expect(validateQuery('a!')).toBe(false);
    expect(validateQuery('###$$$%%%')).toBe(false);
  });

  it('should accept ordinary queries with some punctuation', () => {
    expect(validateQuery('c++ tools')).toBe(true);
    expect(validateQuery('node.js vs deno')).toBe(true);
    expect(validateQuery('café alternatives')).toBe(true);
  });
});

describe('extractTargetSubject', () => {
  it('should strip query words and collapse whitespace', () => {
    expect(extractTargetSubject('Best   Terraform  Alternatives')).toBe('terraform');
  });

  it('should leave stop words inside non-ASCII words alone', () => {
    expect(extractTargetSubject('toño alternatives')).toBe('toño');
    expect(extractTargetSubject('how to use ñtop')).toBe('use ñtop');
  });

  it('should return null when only query words remain', () => {
    expect(extractTargetSubject('best alternatives')).toBeNull();
  });
});

describe('extractComparisonSubjects', () => {
  it('should capture multi-word phrases on both sides', () => {
    expect(extractComparisonSubjects('github actions versus gitlab ci')).toEqual([
      'github actions',
      'gitlab ci',
    ]);
  });

  it('should capture non-ASCII names on both sides', () => {
    expect(extractComparisonSubjects('Müller vs Straße')).toEqual(['Müller', 'Straße']);
    expect(extractComparisonSubjects('Café Über VERSUS Ñandú')).toEqual(['Café Über', 'Ñandú']);
  });

  it('should return null without a vs/versus separator', () => {
    expect(extractComparisonSubjects('datadog and newrelic')).toBeNull();
  });
});
