import { allowedValues, checkGrounding, extractNumericTokens, maskLiterals } from '../src/grounding';
import type { ComputedResult, Intent } from '../src/types';

const intent: Intent = {
  operation: 'failure_rate',
  metric: 'failure_rate',
  filters: { device: { op: 'eq', value: 'Android' }, amount: { op: 'range', min: 500 } },
  groupBy: [],
  timeRange: { start: '2025-06-01', end: '2025-07-01' },
  confidence: 0.9,
  followUp: false,
  unresolved: [],
};

const result: ComputedResult = {
  operation: 'failure_rate',
  metric: 'failure_rate',
  schemaVersion: 'test',
  numbers: [
    {
      label: 'Failure rate',
      value: 3.45,
      display: '3.45%',
      unit: 'percent',
      status: 'ok',
      calculation: {
        formula: "COUNT(status = 'Failed') / COUNT(*) × 100",
        sampleSize: 10000,
        numerator: 345,
        denominator: 10000,
      },
    },
    {
      label: 'Failure rate: Web',
      value: null,
      display: 'insufficient data',
      unit: 'percent',
      status: 'insufficient_data',
      calculation: { formula: 'no transactions for Web', sampleSize: 0 },
    },
  ],
  timeRange: { start: '2025-06-01', end: '2025-07-01' },
  queryTrace: [],
  warnings: [],
};

describe('extractNumericTokens', () => {
  it('reads grouped, decimal and signed numbers', () => {
    expect(extractNumericTokens('₹1,234.5 fell by -0.4 in 7 days, or +2 overall')).toEqual([
      { text: '1,234.5', value: 1234.5, decimals: 1, signed: false },
      { text: '-0.4', value: -0.4, decimals: 1, signed: true },
      { text: '7', value: 7, decimals: 0, signed: false },
      { text: '+2', value: 2, decimals: 0, signed: true },
    ]);
  });

  it('does not read a hyphen between digits as a sign', () => {
    expect(extractNumericTokens('ages 25-34')).toEqual([
      { text: '25', value: 25, decimals: 0, signed: false },
      { text: '34', value: 34, decimals: 0, signed: false },
    ]);
  });
});

describe('checkGrounding', () => {
  it('accepts computed values, their inputs and literals from the query', () => {
    const text =
      'The Android failure rate for amounts above 500 was 3.45% (345 of 10,000 transactions) between 2025-06-01 and 2025-07-01.';
    expect(checkGrounding(text, result, intent)).toEqual({ ok: true, violations: [] });
  });

  it('accepts values rounded to fewer decimals', () => {
    expect(checkGrounding('Roughly 3.5% of payments failed.', result, intent).ok).toBe(true);
  });

  it('flags every number that is not derived from the result', () => {
    expect(checkGrounding('The failure rate was 3.47%, up 12% from May. 12 states were affected.', result, intent)).toEqual({
      ok: false,
      violations: ['3.47', '12'],
    });
  });

  it('does not let digits of the date range pass as figures', () => {
    expect(checkGrounding('The failure rate is 6% in June 2025.', result, intent)).toEqual({
      ok: false,
      violations: ['6'],
    });
    expect(checkGrounding('The failure rate is 2025.', result, intent).ok).toBe(false);
    expect(checkGrounding('About 100 payments failed.', result, intent).ok).toBe(false);
  });

  it('accepts dates inside the range in any common form', () => {
    const text = 'Between June 1 and 30 June 2025 (through 2025-07-01) the rate was 3.45%, i.e. 345 / 10,000 × 100.';
    expect(checkGrounding(text, result, intent)).toEqual({ ok: true, violations: [] });
  });

  it('does not admit a zero for a segment without data', () => {
    const compare: ComputedResult = {
      ...result,
      operation: 'compare_segments',
      numbers: [
        {
          label: 'Failure rate: Android',
          value: 25,
          display: '25.00%',
          unit: 'percent',
          status: 'ok',
          calculation: { formula: "COUNT(status = 'Failed') / COUNT(*) × 100", sampleSize: 4, numerator: 1, denominator: 4 },
        },
        {
          label: 'Failure rate: iOS',
          value: null,
          display: 'insufficient data',
          unit: 'percent',
          status: 'insufficient_data',
          calculation: { formula: 'no transactions for iOS', sampleSize: 0 },
        },
      ],
    };

    expect(
      checkGrounding('Android fails 25.00% of the time while iOS fails 0% of the time.', compare, intent)
    ).toEqual({ ok: false, violations: ['0'] });
    expect(checkGrounding('Android fails 25.00% of the time; iOS has no data.', compare, intent).ok).toBe(true);
  });

  it('matches the sign of a signed figure', () => {
    const difference: ComputedResult = {
      ...result,
      operation: 'compare_segments',
      numbers: [
        {
          label: 'Difference (Android − iOS)',
          value: -15,
          display: '-15.00%',
          unit: 'percent',
          status: 'ok',
          calculation: { formula: 'Android − iOS', sampleSize: 200 },
        },
      ],
    };

    expect(checkGrounding('Android is -15.00% against iOS.', difference, intent).ok).toBe(true);
    expect(checkGrounding('The gap is 15.00 points.', difference, intent).ok).toBe(true);
    expect(checkGrounding('Android is +15.00% against iOS.', difference, intent)).toEqual({
      ok: false,
      violations: ['+15.00'],
    });
  });
});

describe('allowedValues', () => {
  it('collects available values and their calculation inputs only', () => {
    expect(allowedValues(result)).toEqual([3.45, 10000, 345]);
  });
});

describe('maskLiterals', () => {
  it('blanks segment labels, filter values and the requested k', () => {
    const masked = maskLiterals('5G users beat 4G users; top 3 codes; network 5G', result, {
      ...intent,
      topK: 3,
      segments: [
        { label: '5G users', filters: { network: { op: 'eq', value: '5G' } } },
        { label: '4G users', filters: { network: { op: 'eq', value: '4G' } } },
      ],
    });
    expect(extractNumericTokens(masked)).toEqual([]);
  });

  it('leaves dates outside the range alone', () => {
    expect(extractNumericTokens(maskLiterals('compared with May 2025', result, intent))).toEqual([
      { text: '2025', value: 2025, decimals: 0, signed: false },
    ]);
  });
});
