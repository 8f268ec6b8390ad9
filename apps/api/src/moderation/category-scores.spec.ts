import { classifyScore, classifyScores, invalidCategories, mean, worstStatus } from './category-scores';

const thresholds = { warning: 0.3, reject: 0.7 };

describe('category scores', () => {
  it('classifies against inclusive thresholds', () => {
    expect(classifyScore(0.29, thresholds)).toBe('SAFE');
    expect(classifyScore(0.3, thresholds)).toBe('WARNING');
    expect(classifyScore(0.69, thresholds)).toBe('WARNING');
    expect(classifyScore(0.7, thresholds)).toBe('REJECTED');
  });

  it('takes the worst category and ignores absent ones', () => {
    expect(classifyScores({ nudity: 0.1, violence: 0.5, gore: null }, thresholds)).toBe('WARNING');
    expect(classifyScores({ nudity: null }, thresholds)).toBe('SAFE');
    expect(classifyScores({}, thresholds)).toBe('SAFE');
  });

  it('orders statuses by severity', () => {
    expect(worstStatus(['SAFE', 'REJECTED', 'WARNING'])).toBe('REJECTED');
    expect(worstStatus([])).toBe('SAFE');
  });

  it('flags non-numeric and out-of-range values but accepts null', () => {
    expect(invalidCategories({ a: 0, b: 1, c: null, d: 1.2, e: -0.1, f: 'x', g: Number.NaN })).toEqual([
      'd',
      'e',
      'f',
      'g',
    ]);
  });

  it('averages to four decimals and returns null for no values', () => {
    expect(mean([0.1, 0.2, 0.4])).toBe(0.2333);
    expect(mean([])).toBeNull();
  });
});
