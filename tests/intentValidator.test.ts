import {
  assessIntent,
  buildIntentJsonSchema,
  describeFilters,
  rawIntentSchema,
  segmentsAreDisjoint,
  toIntent,
  type RawIntent,
} from '../src/intentValidator';
import type { Intent } from '../src/types';
import { loadSchema } from './helpers';

const schema = loadSchema();
const domain = { start: '2025-01-01', end: '2025-07-01' };

function validate(raw: Partial<RawIntent>, previous: Intent | null = null): Intent {
  return toIntent(rawIntentSchema.parse({ confidence: 0.9, ...raw }), { schema, domain, previous, defaultTopK: 5 });
}

describe('toIntent', () => {
  it('builds a failure-rate intent with canonical filter values', () => {
    const intent = validate({
      operation: 'failure_rate',
      filters: [{ column: 'device', values: ['android'], min: null, max: null }],
      time_range: { start: '2025-06-01', end: '2025-07-01', period: null },
    });
    expect(intent).toEqual({
      operation: 'failure_rate',
      metric: 'failure_rate',
      filters: { device: { op: 'eq', value: 'Android' } },
      groupBy: [],
      timeRange: { start: '2025-06-01', end: '2025-07-01' },
      confidence: 0.9,
      followUp: false,
      unresolved: [],
    });
  });

  it('marks unknown metrics unsupported instead of guessing', () => {
    const intent = validate({ operation: 'aggregate', metric: 'customer_satisfaction_score', reducer: 'avg' });
    expect(intent.operation).toBe('unsupported');
    expect(intent.unresolved).toEqual(['metric "customer_satisfaction_score"']);
  });

  it('marks unknown columns and values unsupported', () => {
    const intent = validate({
      operation: 'aggregate',
      filters: [
        { column: 'merchant', values: ['Acme'], min: null, max: null },
        { column: 'device', values: ['Blackberry'], min: null, max: null },
      ],
      group_by: ['city'],
    });
    expect(intent.operation).toBe('unsupported');
    expect(intent.unresolved).toEqual(['column "merchant"', 'device value "Blackberry"', 'group by "city"']);
  });

  it('rejects reducers a metric does not take', () => {
    const intent = validate({ operation: 'aggregate', metric: 'count', reducer: 'avg' });
    expect(intent.unresolved).toEqual(['avg of count']);
  });

  it('defaults the amount reducer and ignores reducers on rates', () => {
    expect(validate({ operation: 'aggregate', metric: 'amount' }).reducer).toBe('sum');
    expect(validate({ operation: 'aggregate', metric: 'fraud_rate', reducer: 'max' }).reducer).toBeUndefined();
  });

  it('accepts range filters only on range columns', () => {
    const intent = validate({
      operation: 'aggregate',
      metric: 'amount',
      filters: [{ column: 'amount', values: null, min: 500, max: null }],
    });
    expect(intent.filters).toEqual({ amount: { op: 'range', min: 500 } });

    const bad = validate({ operation: 'aggregate', filters: [{ column: 'state', values: null, min: 1, max: 2 }] });
    expect(bad.unresolved).toEqual(['range on column "state"']);
  });

  it('resolves relative periods and clamps ranges to the data', () => {
    expect(validate({ operation: 'aggregate', time_range: { period: 'last_7_days' } }).timeRange).toEqual({
      start: '2025-06-24',
      end: '2025-07-01',
    });
    expect(
      validate({ operation: 'aggregate', time_range: { start: '2024-11-01', end: '2025-02-01' } }).timeRange
    ).toEqual({ start: '2025-01-01', end: '2025-02-01' });
  });

  it('keeps a range outside the data as given', () => {
    expect(
      validate({ operation: 'aggregate', time_range: { start: '2023-01-01', end: '2023-02-01' } }).timeRange
    ).toEqual({ start: '2023-01-01', end: '2023-02-01' });
  });

  it('labels segments from their filters', () => {
    const intent = validate({
      operation: 'compare_segments',
      segments: [
        { label: null, filters: [{ column: 'device', values: ['Android'], min: null, max: null }] },
        { label: 'Apple users', filters: [{ column: 'device', values: ['iphone'], min: null, max: null }] },
      ],
    });
    expect(intent.segments).toEqual([
      { label: 'Android', filters: { device: { op: 'eq', value: 'Android' } } },
      { label: 'Apple users', filters: { device: { op: 'eq', value: 'iOS' } } },
    ]);
    expect(intent.metric).toBe('failure_rate');
  });

  it('caps top_k and applies the default', () => {
    expect(validate({ operation: 'top_failure_codes', top_k: 50 }).topK).toBe(20);
    expect(validate({ operation: 'top_failure_codes' }).topK).toBe(5);
  });

  describe('follow-ups', () => {
    const previous = validate({
      operation: 'failure_rate',
      filters: [{ column: 'device', values: ['Android'], min: null, max: null }],
      group_by: ['state'],
      time_range: { start: '2025-06-01', end: '2025-07-01' },
    });

    it('inherits what the question does not restate', () => {
      const intent = validate(
        { follow_up: true, filters: [{ column: 'device', values: ['iOS'], min: null, max: null }] },
        previous
      );
      expect(intent.operation).toBe('failure_rate');
      expect(intent.filters).toEqual({ device: { op: 'eq', value: 'iOS' } });
      expect(intent.groupBy).toEqual(['state']);
      expect(intent.timeRange).toEqual({ start: '2025-06-01', end: '2025-07-01' });
      expect(intent.followUp).toBe(true);
    });

    it('adds new filters to inherited ones', () => {
      const intent = validate(
        { follow_up: true, filters: [{ column: 'network', values: ['5G'], min: null, max: null }] },
        previous
      );
      expect(intent.filters).toEqual({
        device: { op: 'eq', value: 'Android' },
        network: { op: 'eq', value: '5G' },
      });
    });

    it('is a fresh question when there is nothing to inherit', () => {
      const intent = validate({ follow_up: true });
      expect(intent.followUp).toBe(false);
      expect(intent.operation).toBe('unsupported');
      expect(intent.unresolved).toEqual(['no recognisable analysis']);
    });
  });
});

describe('describeFilters', () => {
  it('renders constraints in column order', () => {
    expect(
      describeFilters({
        network: { op: 'in', values: ['4G', '5G'] },
        amount: { op: 'range', min: 100, max: 500 },
        device: { op: 'eq', value: 'iOS' },
      })
    ).toEqual(['amount between 100 and 500', 'device = iOS', 'network in (4G, 5G)']);
  });
});

describe('segmentsAreDisjoint', () => {
  it('is true when a shared column has no common value', () => {
    expect(segmentsAreDisjoint({ device: { op: 'eq', value: 'Android' } }, { device: { op: 'eq', value: 'iOS' } })).toBe(
      true
    );
  });

  it('is false for overlapping or unrelated segments', () => {
    expect(
      segmentsAreDisjoint(
        { device: { op: 'in', values: ['Android', 'iOS'] } },
        { device: { op: 'eq', value: 'iOS' } }
      )
    ).toBe(false);
    expect(segmentsAreDisjoint({ device: { op: 'eq', value: 'iOS' } }, { network: { op: 'eq', value: '5G' } })).toBe(
      false
    );
  });

  it('compares ranges', () => {
    expect(
      segmentsAreDisjoint({ amount: { op: 'range', max: 100 } }, { amount: { op: 'range', min: 100.01 } })
    ).toBe(true);
  });
});

describe('assessIntent', () => {
  const base: Intent = {
    operation: 'aggregate',
    metric: 'count',
    filters: {},
    groupBy: [],
    confidence: 0.9,
    followUp: false,
    unresolved: [],
  };

  it('accepts a confident, complete intent', () => {
    expect(assessIntent(base, 0.6)).toEqual({ verdict: 'valid' });
  });

  it('asks for clarification below the confidence threshold', () => {
    expect(assessIntent({ ...base, confidence: 0.4 }, 0.6)).toEqual({
      verdict: 'ambiguous',
      reason: 'low extraction confidence (0.40)',
      candidates: ['aggregate', 'failure_rate', 'time_series'],
    });
  });

  it('requires two disjoint segments for a comparison', () => {
    expect(assessIntent({ ...base, operation: 'compare_segments' }, 0.6)).toMatchObject({ verdict: 'ambiguous' });
    const overlapping: Intent = {
      ...base,
      operation: 'compare_segments',
      segments: [
        { label: 'All phones', filters: { device: { op: 'in', values: ['Android', 'iOS'] } } },
        { label: 'iOS', filters: { device: { op: 'eq', value: 'iOS' } } },
      ],
    };
    expect(assessIntent(overlapping, 0.6)).toEqual({
      verdict: 'ambiguous',
      reason: 'segments "All phones" and "iOS" overlap',
      candidates: ['compare_segments'],
    });
  });

  it('rejects unsupported intents with the unknown terms', () => {
    expect(
      assessIntent({ ...base, operation: 'unsupported', unresolved: ['metric "nps"'] }, 0.6)
    ).toEqual({ verdict: 'unsupported', reason: 'metric "nps"' });
  });
});

describe('buildIntentJsonSchema', () => {
  it('requires every field so strict mode accepts it', () => {
    const { schema: jsonSchema } = buildIntentJsonSchema();
    expect(jsonSchema.required).toEqual([
      'operation',
      'metric',
      'reducer',
      'filters',
      'group_by',
      'time_range',
      'granularity',
      'segments',
      'top_k',
      'confidence',
      'follow_up',
      'clarifying_question',
    ]);
    expect(jsonSchema.additionalProperties).toBe(false);
  });
});
