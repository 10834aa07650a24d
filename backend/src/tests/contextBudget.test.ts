import { describe, expect, it } from 'vitest';
import { budgetSections, estimateTokens, truncateToTokens } from '../orchestrator/contextBudget.js';

describe('truncateToTokens', () => {
  it('returns text within budget unchanged', () => {
    expect(truncateToTokens('short text', 50)).toEqual({ text: 'short text', truncated: false });
  });

  it('cuts long text to the budget, marker included', () => {
    const long = Array.from({ length: 200 }, (_, index) => `linha ${index}`).join(' ');

    const result = truncateToTokens(long, 40);

    expect(result.truncated).toBe(true);
    expect(result.text.endsWith('\n…[truncated]')).toBe(true);
    expect(long.startsWith(result.text.slice(0, -'\n…[truncated]'.length))).toBe(true);
    expect(estimateTokens(result.text)).toBeLessThanOrEqual(45);
  });
});

describe('budgetSections', () => {
  it('drops the oldest lines of capped sections', () => {
    const evidence = Array.from({ length: 50 }, (_, index) => `obs-${index + 1}: casos em alta na semana`).join('\n');

    const packed = budgetSections({ sections: { evidence, draft: 'rascunho' }, caps: { evidence: 30 } });

    expect(packed.draft).toBe('rascunho');
    expect(estimateTokens(packed.evidence)).toBeLessThanOrEqual(30);
    expect(packed.evidence.endsWith('obs-50: casos em alta na semana')).toBe(true);
    expect(packed.evidence.startsWith('obs-1:')).toBe(false);
  });

  it('keeps sections without a cap', () => {
    expect(budgetSections({ sections: { a: 'x\ny' }, caps: {} })).toEqual({ a: 'x\ny' });
  });
});
