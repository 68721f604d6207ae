/**
 * Base-price reduction tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidReferenceError } from '../../../common/errors.js';
import { analyzeBaseReduction } from '../base_reduction.service.js';

describe('analyzeBaseReduction', () => {
  const series = [
    { date: '2024-01-01', close: 100 },
    { date: '2024-01-03', close: 80 },
    { date: '2024-01-05', close: 50 },
    { date: '2024-01-08', close: 40 },
  ];

  it('finds the first close at or past the threshold', () => {
    const result = analyzeBaseReduction(100, '2024-01-01', series, { thresholdPct: 50 });

    expect(result.tradingDaysAnalyzed).toBe(3);
    expect(result.reductionFound).toBe(true);
    expect(result.reductionDate).toBe('2024-01-05');
    expect(result.reducedPrice).toBe(50);
    expect(result.reductionPct).toBe(50);
    expect(result.daysToReduction).toBe(4);
    expect(result.maxReductionPct).toBe(60);
    expect(result.maxReductionDate).toBe('2024-01-08');
    expect(result.maxReductionPrice).toBe(40);
  });

  it('counts a close of exactly the threshold level as reached', () => {
    const result = analyzeBaseReduction(1.4, '2024-01-01', [{ date: '2024-01-03', close: 0.35 }], { thresholdPct: 75 });

    expect(result.reductionFound).toBe(true);
    expect(result.reductionDate).toBe('2024-01-03');
    expect(result.daysToReduction).toBe(2);
  });

  it('reports a negative max reduction when the price only rose', () => {
    const result = analyzeBaseReduction(100, '2024-01-01', [{ date: '2024-01-02', close: 110 }]);

    expect(result.reductionFound).toBe(false);
    expect(result.daysToReduction).toBeNull();
    expect(result.maxReductionPct).toBe(-10);
  });

  it('handles no subsequent closes', () => {
    const result = analyzeBaseReduction(100, '2024-01-08', series);

    expect(result.tradingDaysAnalyzed).toBe(0);
    expect(result.reductionFound).toBe(false);
    expect(result.maxReductionPct).toBeNull();
  });

  it('rejects an invalid base', () => {
    expect(() => analyzeBaseReduction(0, '2024-01-01', series)).toThrow(InvalidReferenceError);
    expect(() => analyzeBaseReduction(100, 'not-a-date', series)).toThrow(InvalidReferenceError);
  });
});
