import { AnalysisEngine } from '../src/analysisEngine';
import { renderSql, traceQuery } from '../src/dataset';
import { InsufficientDataError, InvalidFilterError, UnsupportedOperationError } from '../src/errors';
import type { Intent } from '../src/types';
import { datasetOf, juneRows, loadSchema, row } from './helpers';

const schema = loadSchema();
const june = { start: '2025-06-01', end: '2025-07-01' };

function intentFor(overrides: Partial<Intent>): Intent {
  return {
    operation: 'failure_rate',
    metric: 'failure_rate',
    filters: {},
    groupBy: [],
    confidence: 0.9,
    followUp: false,
    unresolved: [],
    ...overrides,
  };
}

describe('AnalysisEngine', () => {
  const engine = new AnalysisEngine(datasetOf(juneRows(), schema), { timeoutMs: 5000, defaultTopK: 5 });

  describe('failure_rate', () => {
    it('computes the share of failed transactions with its inputs', async () => {
      const intent = intentFor({ filters: { device: { op: 'eq', value: 'Android' } }, timeRange: june });
      const result = await engine.resolve(intent);

      expect(result.operation).toBe('failure_rate');
      expect(result.timeRange).toEqual(june);
      expect(result.numbers).toEqual([
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
      ]);
      expect(result.queryTrace).toEqual([
        traceQuery(renderSql(schema, { filters: intent.filters, groupBy: [], timeRange: june })),
      ]);
      expect(result.warnings).toEqual([]);
    });

    it('reports filters that match nothing', async () => {
      const intent = intentFor({ filters: { device: { op: 'eq', value: 'Web' } }, timeRange: june });
      await expect(engine.resolve(intent)).rejects.toThrow(
        new InvalidFilterError(['device = Web', 'date in [2025-06-01, 2025-07-01)'])
      );
    });

    it('is deterministic', async () => {
      const intent = intentFor({ groupBy: ['status'] });
      expect(await engine.resolve(intent)).toEqual(await engine.resolve(intent));
    });
  });

  describe('aggregate', () => {
    it('groups, orders by value and tabulates', async () => {
      const result = await engine.resolve(intentFor({ operation: 'aggregate', metric: 'count', groupBy: ['status'] }));

      expect(result.numbers.map((n) => [n.label, n.value, n.display])).toEqual([
        ['Transaction count', 10000, '10,000'],
        ['Transaction count: Success', 9655, '9,655'],
        ['Transaction count: Failed', 345, '345'],
      ]);
      expect(result.table).toEqual({
        columns: ['status', 'count', 'sample_size'],
        rows: [
          ['Success', 9655, 9655],
          ['Failed', 345, 345],
        ],
      });
      expect(result.chart?.title).toBe('Transaction count by status');
      expect(result.queryTrace).toHaveLength(2);
    });

    it('applies the amount reducer', async () => {
      const result = await engine.resolve(intentFor({ operation: 'aggregate', metric: 'amount', reducer: 'avg' }));
      expect(result.numbers[0]).toEqual({
        label: 'Average transaction amount',
        value: 125,
        display: '₹125.00',
        unit: 'currency',
        status: 'ok',
        calculation: { formula: 'SUM(amount) / COUNT(*)', sampleSize: 10000, numerator: 1250000, denominator: 10000 },
      });
    });

    it('caps the number of groups with a warning', async () => {
      const capped = new AnalysisEngine(datasetOf(juneRows(), schema), { timeoutMs: 5000, defaultTopK: 5, maxGroups: 1 });
      const result = await capped.resolve(intentFor({ operation: 'aggregate', metric: 'count', groupBy: ['status'] }));
      expect(result.numbers).toHaveLength(2);
      expect(result.warnings).toEqual(['Showing the first 1 of 2 groups']);
    });
  });

  describe('compare_segments', () => {
    const segments: Intent['segments'] = [
      { label: 'Android', filters: { device: { op: 'eq', value: 'Android' } } },
      { label: 'iOS', filters: { device: { op: 'eq', value: 'iOS' } } },
    ];

    it('computes both sides with absolute and relative differences', async () => {
      const mixed = new AnalysisEngine(
        datasetOf([
          row({ device: 'Android', status: 'Failed' }),
          row({ device: 'Android' }),
          row({ device: 'Android' }),
          row({ device: 'Android' }),
          row({ device: 'iOS', status: 'Failed' }),
          row({ device: 'iOS', status: 'Failed' }),
          row({ device: 'iOS' }),
          row({ device: 'iOS' }),
          row({ device: 'iOS' }),
        ]),
        { timeoutMs: 5000, defaultTopK: 5 }
      );
      const result = await mixed.resolve(intentFor({ operation: 'compare_segments', segments }));

      expect(result.numbers.map((n) => [n.label, n.value, n.display])).toEqual([
        ['Failure rate: Android', 25, '25.00%'],
        ['Failure rate: iOS', 40, '40.00%'],
        ['Difference (Android − iOS)', -15, '-15.00%'],
        ['Relative difference vs iOS', -37.5, '-37.50%'],
      ]);
      expect(result.chart?.data).toEqual([
        { x: 'Android', y: 25 },
        { x: 'iOS', y: 40 },
      ]);
    });

    it('reports an empty segment as unavailable rather than zero', async () => {
      const result = await engine.resolve(intentFor({ operation: 'compare_segments', segments, timeRange: june }));

      expect(result.numbers).toHaveLength(2);
      expect(result.numbers[0].value).toBe(3.45);
      expect(result.numbers[1]).toMatchObject({
        label: 'Failure rate: iOS',
        value: null,
        display: 'insufficient data',
        status: 'insufficient_data',
      });
      expect(result.warnings).toEqual(['No transactions for segment "iOS"; it is reported as unavailable']);
    });

    it('fails when neither segment has data', async () => {
      const empty: Intent['segments'] = [
        { label: 'Web', filters: { device: { op: 'eq', value: 'Web' } } },
        { label: 'iOS', filters: { device: { op: 'eq', value: 'iOS' } } },
      ];
      await expect(engine.resolve(intentFor({ operation: 'compare_segments', segments: empty }))).rejects.toBeInstanceOf(
        InsufficientDataError
      );
    });
  });

  describe('time_series', () => {
    const small = new AnalysisEngine(
      datasetOf([
        row({ timestamp: '2025-06-01T09:00:00Z', status: 'Failed' }),
        row({ timestamp: '2025-06-01T18:00:00Z' }),
        row({ timestamp: '2025-06-03T12:00:00Z' }),
      ]),
      { timeoutMs: 5000, defaultTopK: 5 }
    );

    it('emits every bucket in the range, including empty ones', async () => {
      const result = await small.resolve(
        intentFor({
          operation: 'time_series',
          timeRange: { start: '2025-06-01', end: '2025-06-04' },
          granularity: 'day',
        })
      );

      expect(result.series).toEqual({
        granularity: 'day',
        points: [
          { bucket: '2025-06-01', value: 50, sampleSize: 2 },
          { bucket: '2025-06-02', value: null, sampleSize: 0 },
          { bucket: '2025-06-03', value: 0, sampleSize: 1 },
        ],
      });
      expect(result.numbers.map((n) => n.label)).toEqual([
        'Failure rate',
        'Failure rate 2025-06-01',
        'Failure rate 2025-06-02',
        'Failure rate 2025-06-03',
      ]);
      expect(result.chart?.type).toBe('line');
    });

    it('counts empty buckets as zero', async () => {
      const result = await small.resolve(
        intentFor({
          operation: 'time_series',
          metric: 'count',
          timeRange: { start: '2025-06-01', end: '2025-06-04' },
          granularity: 'day',
        })
      );
      expect(result.series?.points.map((p) => p.value)).toEqual([2, 0, 1]);
    });

    it('infers the granularity and defaults the range to the data', async () => {
      const result = await engine.resolve(intentFor({ operation: 'time_series', metric: 'count', groupBy: ['device'] }));
      expect(result.timeRange).toEqual(june);
      expect(result.series?.granularity).toBe('day');
      expect(result.series?.points).toHaveLength(30);
      expect(result.warnings).toEqual(['Grouping by device is not applied to a time series']);
    });
  });

  describe('top_failure_codes', () => {
    it('ranks codes with their share of failures', async () => {
      const result = await engine.resolve(intentFor({ operation: 'top_failure_codes', metric: 'count', topK: 5 }));

      expect(result.metric).toBe('count');
      expect(result.numbers.map((n) => [n.label, n.value])).toEqual([
        ['Failed transactions', 345],
        ['Failures with TIMEOUT', 200],
        ['TIMEOUT share of failures', 57.97],
        ['Failures with BANK_DECLINED', 145],
        ['BANK_DECLINED share of failures', 42.03],
      ]);
      expect(result.table).toEqual({
        columns: ['failure_code', 'failures', 'share_of_failures'],
        rows: [
          ['TIMEOUT', 200, 57.97],
          ['BANK_DECLINED', 145, 42.03],
        ],
      });
    });

    it('honours k', async () => {
      const result = await engine.resolve(intentFor({ operation: 'top_failure_codes', metric: 'count', topK: 1 }));
      expect(result.table?.rows).toEqual([['TIMEOUT', 200, 57.97]]);
    });
  });

  describe('executive_summary', () => {
    it('reports the headline KPIs', async () => {
      const summary = new AnalysisEngine(
        datasetOf([
          row({ amount: 100, status: 'Failed', failure_code: 'TIMEOUT', review: true }),
          row({ amount: 200, fraud: true }),
          row({ amount: 300, review: true }),
          row({ amount: 400 }),
        ]),
        { timeoutMs: 5000, defaultTopK: 5 }
      );
      const result = await summary.resolve(intentFor({ operation: 'executive_summary', metric: 'count' }));

      expect(result.numbers.map((n) => [n.label, n.display])).toEqual([
        ['Total transactions', '4'],
        ['Total transaction amount', '₹1,000.00'],
        ['Average transaction amount', '₹250.00'],
        ['Failure rate', '25.00%'],
        ['Fraud rate', '25.0000%'],
        ['Review rate', '50.00%'],
        ['Failures with TIMEOUT', '1'],
        ['TIMEOUT share of failures', '100.00%'],
      ]);
      expect(result.table?.rows[0]).toEqual(['Total transactions', 4]);
    });
  });

  it('refuses unsupported intents', async () => {
    await expect(
      engine.resolve(intentFor({ operation: 'unsupported', unresolved: ['metric "nps"'] }))
    ).rejects.toBeInstanceOf(UnsupportedOperationError);
  });
});
