import type { DatasetSchema, MetricDefinition } from './datasetSchema.js';
import { emptyRow, MISSING_VALUE, type AggregateRequest, type AggregateRow, type TransactionDataset } from './dataset.js';
import {
  InsufficientDataError,
  InvalidFilterError,
  UnsupportedOperationError,
} from './errors.js';
import { formatSigned, formatValue, roundTo } from './format.js';
import { describeFilters } from './intentValidator.js';
import { enumerateBuckets, inferGranularity } from './timeRange.js';
import type {
  AnalyticOperation,
  ChartData,
  ComputedNumber,
  ComputedResult,
  Filters,
  Intent,
  NumberUnit,
  Reducer,
  ResultTable,
  TimeRange,
} from './types.js';

export interface AnalysisEngineOptions {
  /** Budget for each dataset request. */
  timeoutMs: number;
  defaultTopK: number;
  maxGroups?: number;
}

interface Measure {
  value: number | null;
  sampleSize: number;
  formula: string;
  numerator?: number;
  denominator?: number;
}

const REDUCER_LABELS: Record<Reducer, string> = {
  sum: 'Total',
  avg: 'Average',
  count: 'Count of',
  min: 'Minimum',
  max: 'Maximum',
};

const DEFAULT_MAX_GROUPS = 20;
const SUMMARY_TOP_CODES = 3;

/**
 * Runs the fixed operation catalog against a dataset. Nothing here
 * interprets text; the same intent over the same snapshot always yields
 * the same result.
 */
export class AnalysisEngine {
  private readonly maxGroups: number;

  constructor(
    private readonly dataset: TransactionDataset,
    private readonly options: AnalysisEngineOptions
  ) {
    this.maxGroups = options.maxGroups ?? DEFAULT_MAX_GROUPS;
  }

  get schema(): DatasetSchema {
    return this.dataset.schema;
  }

  async resolve(intent: Intent): Promise<ComputedResult> {
    if (intent.operation === 'unsupported') {
      throw new UnsupportedOperationError(intent.unresolved);
    }
    const run = new QueryRun(this.dataset, this.options.timeoutMs);

    switch (intent.operation) {
      case 'failure_rate':
        return this.grouped(run, { ...intent, metric: 'failure_rate' }, 'failure_rate');
      case 'aggregate':
        return this.grouped(run, intent, 'aggregate');
      case 'compare_segments':
        return this.compareSegments(run, intent);
      case 'time_series':
        return this.timeSeries(run, intent);
      case 'top_failure_codes':
        return this.topFailureCodes(run, intent);
      case 'executive_summary':
        return this.executiveSummary(run, intent);
    }
  }

  private metricDefinition(name: string): MetricDefinition {
    const definition = this.schema.metric(name);
    if (!definition) throw new UnsupportedOperationError([`metric "${name}"`]);
    return definition;
  }

  private measure(row: AggregateRow, metric: MetricDefinition, reducer: Reducer | undefined): Measure {
    const sampleSize = row.rowCount;
    if (metric.kind === 'rate') return this.rateMeasure(row, metric);
    if (metric.kind === 'count') return { value: row.rowCount, sampleSize, formula: 'COUNT(*)' };

    const column = metric.column ?? 'amount';
    switch (reducer ?? metric.defaultReducer) {
      case 'avg':
        return {
          value: sampleSize > 0 ? row.amountSum / sampleSize : null,
          sampleSize,
          numerator: roundTo(row.amountSum, metric.precision),
          denominator: sampleSize,
          formula: `SUM(${column}) / COUNT(*)`,
        };
      case 'min':
        return { value: row.amountMin, sampleSize, formula: `MIN(${column})` };
      case 'max':
        return { value: row.amountMax, sampleSize, formula: `MAX(${column})` };
      case 'count':
        return { value: row.rowCount, sampleSize, formula: 'COUNT(*)' };
      case 'sum':
        return { value: row.amountSum, sampleSize, formula: `SUM(${column})` };
    }
  }

  private rateMeasure(row: AggregateRow, metric: MetricDefinition): Measure {
    let numerator = row.failedCount;
    let condition = `status = '${this.schema.failedStatus}'`;
    if (metric.numerator === 'fraud') {
      numerator = row.fraudCount;
      condition = 'fraud_flag = 1';
    } else if (metric.numerator === 'review') {
      numerator = row.reviewCount;
      condition = 'review_flag = 1';
    }
    return {
      value: row.rowCount > 0 ? (numerator / row.rowCount) * 100 : null,
      sampleSize: row.rowCount,
      numerator,
      denominator: row.rowCount,
      formula: `COUNT(${condition}) / COUNT(*) × 100`,
    };
  }

  private toNumber(label: string, measure: Measure, metric: MetricDefinition): ComputedNumber {
    const unit = unitOf(metric);
    const decimals = metric.kind === 'count' ? 0 : metric.precision;
    const value = measure.value === null ? null : roundTo(measure.value, decimals);
    const number: ComputedNumber = {
      label,
      value,
      display: formatValue(value, unit, decimals),
      unit,
      status: value === null ? 'insufficient_data' : 'ok',
      calculation: { formula: measure.formula, sampleSize: measure.sampleSize },
    };
    if (measure.numerator !== undefined) number.calculation.numerator = measure.numerator;
    if (measure.denominator !== undefined) number.calculation.denominator = measure.denominator;
    return number;
  }

  private metricLabel(metric: MetricDefinition, reducer: Reducer | undefined): string {
    if (metric.kind !== 'currency') return metric.label;
    const effective = reducer ?? metric.defaultReducer;
    return `${REDUCER_LABELS[effective]} ${metric.label.toLowerCase()}`;
  }

  /** Ungrouped query over the base population; empty means the filters match nothing. */
  private async base(run: QueryRun, filters: Filters, timeRange: TimeRange | undefined): Promise<AggregateRow> {
    const [row] = await run.aggregate({ filters, groupBy: [], ...(timeRange ? { timeRange } : {}) });
    if (!row || row.rowCount === 0) {
      const described = describeFilters(filters);
      if (timeRange) described.push(`date in [${timeRange.start}, ${timeRange.end})`);
      throw new InvalidFilterError(described);
    }
    return row;
  }

  private async grouped(run: QueryRun, intent: Intent, operation: AnalyticOperation): Promise<ComputedResult> {
    const metric = this.metricDefinition(intent.metric);
    const reducer = metric.kind === 'rate' ? undefined : intent.reducer;
    const label = this.metricLabel(metric, reducer);
    const overall = await this.base(run, intent.filters, intent.timeRange);
    const numbers = [this.toNumber(label, this.measure(overall, metric, reducer), metric)];
    const warnings: string[] = [];
    let table: ResultTable | undefined;
    let chart: ChartData | undefined;

    if (intent.groupBy.length > 0) {
      const rows = await run.aggregate({
        filters: intent.filters,
        groupBy: intent.groupBy,
        ...(intent.timeRange ? { timeRange: intent.timeRange } : {}),
      });
      const groups = rows
        .map((row) => ({
          name: intent.groupBy.map((column) => row.group[column] ?? MISSING_VALUE).join(' / '),
          row,
          measure: this.measure(row, metric, reducer),
        }))
        .sort((a, b) => compareDescending(a.measure.value, b.measure.value) || compareText(a.name, b.name));
      if (groups.length > this.maxGroups) {
        warnings.push(`Showing the first ${this.maxGroups} of ${groups.length} groups`);
      }
      const shown = groups.slice(0, this.maxGroups);
      const groupNumbers = shown.map((group) => this.toNumber(`${label}: ${group.name}`, group.measure, metric));
      numbers.push(...groupNumbers);

      table = {
        columns: [...intent.groupBy, intent.metric, 'sample_size'],
        rows: shown.map((group, i) => [
          ...intent.groupBy.map((column) => group.row.group[column] ?? MISSING_VALUE),
          groupNumbers[i].value,
          group.row.rowCount,
        ]),
      };
      chart = {
        type: 'bar',
        title: `${label} by ${intent.groupBy.join(' and ')}`,
        xLabel: intent.groupBy.join(' / '),
        yLabel: label,
        data: shown.map((group, i) => ({ x: group.name, y: groupNumbers[i].value })),
      };
    }

    return this.result(operation, intent, run, numbers, warnings, { table, chart });
  }

  private async compareSegments(run: QueryRun, intent: Intent): Promise<ComputedResult> {
    const segments = intent.segments;
    if (!segments) throw new InsufficientDataError('A comparison needs two segments');
    const metric = this.metricDefinition(intent.metric);
    const reducer = metric.kind === 'rate' ? undefined : intent.reducer;
    const label = this.metricLabel(metric, reducer);
    await this.base(run, intent.filters, intent.timeRange);

    const measured: Array<{ label: string; measure: Measure }> = [];
    for (const segment of segments) {
      const [row] = await run.aggregate({
        filters: { ...intent.filters, ...segment.filters },
        groupBy: [],
        ...(intent.timeRange ? { timeRange: intent.timeRange } : {}),
      });
      const measure = row && row.rowCount > 0 ? this.measure(row, metric, reducer) : emptyMeasure(segment.label);
      measured.push({ label: segment.label, measure });
    }

    const empty = measured.filter((m) => m.measure.sampleSize === 0).map((m) => m.label);
    if (empty.length === measured.length) {
      throw new InsufficientDataError(`No transactions for ${empty.join(' or ')}`, empty);
    }

    const warnings = empty.map((name) => `No transactions for segment "${name}"; it is reported as unavailable`);
    const numbers = measured.map((m) => this.toNumber(`${label}: ${m.label}`, m.measure, metric));
    const [a, b] = numbers;

    if (a.value !== null && b.value !== null) {
      const unit = unitOf(metric);
      const decimals = metric.kind === 'count' ? 0 : metric.precision;
      const difference = roundTo(a.value - b.value, decimals);
      numbers.push({
        label: `Difference (${measured[0].label} − ${measured[1].label})`,
        value: difference,
        display: formatSigned(difference, unit, decimals),
        unit,
        status: 'ok',
        calculation: {
          formula: `${measured[0].label} − ${measured[1].label}`,
          sampleSize: a.calculation.sampleSize + b.calculation.sampleSize,
        },
      });
      if (b.value !== 0) {
        const relative = roundTo(((a.value - b.value) / Math.abs(b.value)) * 100, 2);
        numbers.push({
          label: `Relative difference vs ${measured[1].label}`,
          value: relative,
          display: formatSigned(relative, 'percent', 2),
          unit: 'percent',
          status: 'ok',
          calculation: {
            formula: `(${measured[0].label} − ${measured[1].label}) / ${measured[1].label} × 100`,
            sampleSize: a.calculation.sampleSize + b.calculation.sampleSize,
          },
        });
      }
    }

    const chart: ChartData = {
      type: 'bar',
      title: `${label}: ${measured[0].label} vs ${measured[1].label}`,
      xLabel: 'segment',
      yLabel: label,
      data: [
        { x: measured[0].label, y: a.value },
        { x: measured[1].label, y: b.value },
      ],
    };
    return this.result('compare_segments', intent, run, numbers, warnings, { chart });
  }

  private async timeSeries(run: QueryRun, intent: Intent): Promise<ComputedResult> {
    const metric = this.metricDefinition(intent.metric);
    const reducer = metric.kind === 'rate' ? undefined : intent.reducer;
    const label = this.metricLabel(metric, reducer);

    let range = intent.timeRange;
    if (!range) {
      const profile = await this.dataset.describe();
      if (!profile.domain) throw new InvalidFilterError(describeFilters(intent.filters));
      range = profile.domain;
    }
    const granularity = intent.granularity ?? inferGranularity(range);
    const overall = await this.base(run, intent.filters, range);
    const warnings: string[] = [];
    if (intent.groupBy.length > 0) {
      warnings.push(`Grouping by ${intent.groupBy.join(', ')} is not applied to a time series`);
    }

    const rows = await run.aggregate({ filters: intent.filters, groupBy: [], timeRange: range, granularity });
    const byBucket = new Map(rows.map((row) => [row.bucket ?? '', row]));
    const numbers = [this.toNumber(label, this.measure(overall, metric, reducer), metric)];
    const points = enumerateBuckets(range, granularity).map((bucket) => {
      const row = byBucket.get(bucket);
      const measure = row ? this.measure(row, metric, reducer) : this.emptyBucket(metric, reducer);
      const number = this.toNumber(`${label} ${bucket}`, measure, metric);
      numbers.push(number);
      return { bucket, value: number.value, sampleSize: measure.sampleSize };
    });

    const chart: ChartData = {
      type: 'line',
      title: `${label} per ${granularity}`,
      xLabel: granularity,
      yLabel: label,
      data: points.map((point) => ({ x: point.bucket, y: point.value })),
    };
    return this.result('time_series', { ...intent, timeRange: range }, run, numbers, warnings, {
      series: { granularity, points },
      chart,
    });
  }

  /** Counts and sums of nothing are zero; every ratio or extreme of nothing is unavailable. */
  private emptyBucket(metric: MetricDefinition, reducer: Reducer | undefined): Measure {
    const effective = metric.kind === 'rate' ? undefined : reducer ?? metric.defaultReducer;
    const zero = metric.kind === 'count' || effective === 'sum' || effective === 'count';
    return { value: zero ? 0 : null, sampleSize: 0, formula: this.measure(emptyRow(), metric, reducer).formula };
  }

  private async failureCodeRanking(
    run: QueryRun,
    filters: Filters,
    timeRange: TimeRange | undefined,
    topK: number
  ): Promise<{ totalFailed: number; codes: Array<{ code: string; count: number }> }> {
    const rows = await run.aggregate({
      filters: { ...filters, status: { op: 'eq', value: this.schema.failedStatus } },
      groupBy: ['failure_code'],
      ...(timeRange ? { timeRange } : {}),
    });
    const totalFailed = rows.reduce((sum, row) => sum + row.rowCount, 0);
    const codes = rows
      .map((row) => ({ code: row.group.failure_code ?? MISSING_VALUE, count: row.rowCount }))
      .sort((a, b) => b.count - a.count || compareText(a.code, b.code))
      .slice(0, topK);
    return { totalFailed, codes };
  }

  private codeNumbers(totalFailed: number, codes: Array<{ code: string; count: number }>): ComputedNumber[] {
    const numbers: ComputedNumber[] = [];
    const formula = `COUNT(*) WHERE status = '${this.schema.failedStatus}' GROUP BY failure_code`;
    for (const { code, count } of codes) {
      numbers.push({
        label: `Failures with ${code}`,
        value: count,
        display: formatValue(count, 'count', 0),
        unit: 'count',
        status: 'ok',
        calculation: { formula, sampleSize: totalFailed },
      });
      const share = totalFailed > 0 ? roundTo((count / totalFailed) * 100, 2) : null;
      numbers.push({
        label: `${code} share of failures`,
        value: share,
        display: formatValue(share, 'percent', 2),
        unit: 'percent',
        status: share === null ? 'insufficient_data' : 'ok',
        calculation: { formula: 'code failures / all failures × 100', sampleSize: totalFailed, numerator: count, denominator: totalFailed },
      });
    }
    return numbers;
  }

  private async topFailureCodes(run: QueryRun, intent: Intent): Promise<ComputedResult> {
    await this.base(run, intent.filters, intent.timeRange);
    const topK = intent.topK ?? this.options.defaultTopK;
    const { totalFailed, codes } = await this.failureCodeRanking(run, intent.filters, intent.timeRange, topK);
    const warnings = totalFailed === 0 ? ['No failed transactions match these filters'] : [];

    const numbers: ComputedNumber[] = [
      {
        label: 'Failed transactions',
        value: totalFailed,
        display: formatValue(totalFailed, 'count', 0),
        unit: 'count',
        status: 'ok',
        calculation: { formula: `COUNT(*) WHERE status = '${this.schema.failedStatus}'`, sampleSize: totalFailed },
      },
      ...this.codeNumbers(totalFailed, codes),
    ];
    const table: ResultTable = {
      columns: ['failure_code', 'failures', 'share_of_failures'],
      rows: codes.map(({ code, count }) => [code, count, totalFailed > 0 ? roundTo((count / totalFailed) * 100, 2) : null]),
    };
    const chart: ChartData = {
      type: 'bar',
      title: `Top ${topK} failure codes`,
      xLabel: 'failure code',
      yLabel: 'failures',
      data: codes.map(({ code, count }) => ({ x: code, y: count })),
    };
    return this.result('top_failure_codes', { ...intent, metric: 'count', topK }, run, numbers, warnings, { table, chart });
  }

  private async executiveSummary(run: QueryRun, intent: Intent): Promise<ComputedResult> {
    const overall = await this.base(run, intent.filters, intent.timeRange);
    const numbers: ComputedNumber[] = [];

    const count = this.metricDefinition('count');
    numbers.push(this.toNumber('Total transactions', this.measure(overall, count, undefined), count));
    const amount = this.metricDefinition('amount');
    numbers.push(this.toNumber('Total transaction amount', this.measure(overall, amount, 'sum'), amount));
    numbers.push(this.toNumber('Average transaction amount', this.measure(overall, amount, 'avg'), amount));
    for (const name of ['failure_rate', 'fraud_rate', 'review_rate']) {
      const metric = this.metricDefinition(name);
      numbers.push(this.toNumber(metric.label, this.measure(overall, metric, undefined), metric));
    }

    const { totalFailed, codes } = await this.failureCodeRanking(
      run,
      intent.filters,
      intent.timeRange,
      SUMMARY_TOP_CODES
    );
    numbers.push(...this.codeNumbers(totalFailed, codes));

    const table: ResultTable = {
      columns: ['metric', 'value'],
      rows: numbers.map((number) => [number.label, number.value]),
    };
    return this.result('executive_summary', intent, run, numbers, [], { table });
  }

  private result(
    operation: AnalyticOperation,
    intent: Intent,
    run: QueryRun,
    numbers: ComputedNumber[],
    warnings: string[],
    extras: Pick<ComputedResult, 'table' | 'series' | 'chart'>
  ): ComputedResult {
    const result: ComputedResult = {
      operation,
      metric: intent.metric,
      schemaVersion: this.schema.version,
      numbers,
      queryTrace: run.trace,
      warnings,
    };
    if (extras.table) result.table = extras.table;
    if (extras.series) result.series = extras.series;
    if (extras.chart) result.chart = extras.chart;
    if (intent.timeRange) result.timeRange = intent.timeRange;
    return result;
  }
}

/** Collects the trace of every dataset request made while resolving one intent. */
class QueryRun {
  readonly trace: string[] = [];

  constructor(private readonly dataset: TransactionDataset, private readonly timeoutMs: number) {}

  async aggregate(request: AggregateRequest): Promise<AggregateRow[]> {
    const result = await this.dataset.aggregate(request, { timeoutMs: this.timeoutMs });
    this.trace.push(result.query);
    return result.rows;
  }
}

function unitOf(metric: MetricDefinition): NumberUnit {
  switch (metric.kind) {
    case 'count':
      return 'count';
    case 'currency':
      return 'currency';
    case 'rate':
      return 'percent';
  }
}

function emptyMeasure(segment: string): Measure {
  return { value: null, sampleSize: 0, formula: `no transactions for ${segment}` };
}

function compareDescending(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
