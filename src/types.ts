export const OPERATIONS = [
  'failure_rate',
  'aggregate',
  'compare_segments',
  'time_series',
  'top_failure_codes',
  'executive_summary',
  'unsupported',
] as const;

export type Operation = (typeof OPERATIONS)[number];
export type AnalyticOperation = Exclude<Operation, 'unsupported'>;

export const REDUCERS = ['sum', 'avg', 'count', 'min', 'max'] as const;
export type Reducer = (typeof REDUCERS)[number];

export const GRANULARITIES = ['day', 'week', 'month'] as const;
export type Granularity = (typeof GRANULARITIES)[number];

export type FilterConstraint =
  | { op: 'eq'; value: string }
  | { op: 'in'; values: string[] }
  | { op: 'range'; min?: number; max?: number };

export type Filters = Record<string, FilterConstraint>;

/** Half-open `[start, end)` range of ISO dates (YYYY-MM-DD). */
export interface TimeRange {
  start: string;
  end: string;
}

export interface Segment {
  label: string;
  filters: Filters;
}

export interface Intent {
  operation: Operation;
  metric: string;
  reducer?: Reducer;
  filters: Filters;
  groupBy: string[];
  timeRange?: TimeRange;
  granularity?: Granularity;
  segments?: [Segment, Segment];
  topK?: number;
  confidence: number;
  followUp: boolean;
  unresolved: string[];
  clarifyingQuestion?: string;
}

export type NumberUnit = 'count' | 'currency' | 'percent' | 'number';

export interface Calculation {
  formula: string;
  sampleSize: number;
  numerator?: number;
  denominator?: number;
}

export interface ComputedNumber {
  label: string;
  /** Rounded to the metric precision; null when the denominator was empty. */
  value: number | null;
  display: string;
  unit: NumberUnit;
  status: 'ok' | 'insufficient_data';
  calculation: Calculation;
}

export interface ResultTable {
  columns: string[];
  rows: Array<Array<string | number | null>>;
}

export interface SeriesPoint {
  bucket: string;
  value: number | null;
  sampleSize: number;
}

export interface ResultSeries {
  granularity: Granularity;
  points: SeriesPoint[];
}

export interface ChartData {
  type: 'bar' | 'line';
  title: string;
  xLabel: string;
  yLabel: string;
  data: Array<{ x: string; y: number | null }>;
}

export interface ComputedResult {
  operation: AnalyticOperation;
  metric: string;
  schemaVersion: string;
  numbers: ComputedNumber[];
  table?: ResultTable;
  series?: ResultSeries;
  chart?: ChartData;
  timeRange?: TimeRange;
  queryTrace: string[];
  warnings: string[];
}

export type TurnOutcome = 'analysis' | 'clarification' | 'rejected' | 'failed';

export interface SessionTurn {
  question: string;
  intent: Intent | null;
  resultSummary: string;
  outcome: TurnOutcome;
  timestamp: number;
}

export interface SessionState {
  sessionId: string;
  /** Changes whenever the conversation starts over. */
  epoch: number;
  turns: SessionTurn[];
  requestTimestamps: number[];
  createdAt: number;
  lastActivity: number;
}

/** The slice of a session the extractor is allowed to see. */
export interface SessionContext {
  turns: SessionTurn[];
}

export interface AnalysisAnswer {
  kind: 'analysis';
  summaryLine: string;
  numbers: ComputedNumber[];
  chart?: ChartData;
  series?: ResultSeries;
  table?: ResultTable;
  queryTrace: string[];
  methodExplanation: string;
  suggestedFollowups: string[];
  explanationSource: 'model' | 'template';
  warnings: string[];
  /** Time spent resolving the intent against the dataset. */
  executionTimeMs: number;
}

export interface ClarificationAnswer {
  kind: 'clarification';
  clarificationQuestion: string;
  candidateOperations: AnalyticOperation[];
  reason: 'ambiguous' | 'unsupported' | 'invalid_filter' | 'insufficient_data';
}

export interface FailureAnswer {
  kind: 'failure';
  code: 'RATE_LIMITED' | 'EXTRACTION_FAILED' | 'RESOURCE_EXHAUSTED' | 'INTERNAL';
  message: string;
  retryable: boolean;
}

export type Answer = AnalysisAnswer | ClarificationAnswer | FailureAnswer;

export type PipelineState =
  | 'RECEIVED'
  | 'RATE_CHECK'
  | 'RATE_LIMITED'
  | 'EXTRACT'
  | 'VALID'
  | 'AMBIGUOUS'
  | 'UNSUPPORTED'
  | 'RESOLVE'
  | 'EXPLAIN'
  | 'CLARIFY'
  | 'REJECT'
  | 'FAILED'
  | 'RESPOND';

export interface ChatRequest {
  sessionId: string;
  message: string;
}

export interface ChatResponse {
  requestId: string;
  sessionId: string;
  states: PipelineState[];
  answer: Answer;
}
