import { monthIndex, toIsoDate } from './timeRange.js';
import type { ComputedResult, Filters, Intent, TimeRange } from './types.js';

export interface NumericToken {
  text: string;
  value: number;
  decimals: number;
  /** True when a `-` or `+` is written directly before the number. */
  signed: boolean;
}

const NUMBER_PATTERN = /\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?/g;
const SIGNS: Record<string, number> = { '-': -1, '−': -1, '+': 1 };
const EPSILON = 1e-9;

const MONTH = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?';
const ISO_DAY = /\b\d{4}-\d{2}-\d{2}\b/g;
const MONTH_DAY = new RegExp(`\\b${MONTH}\\s+(\\d{1,2})(?:st|nd|rd|th)?(?:,?\\s+(\\d{4}))?\\b`, 'gi');
const DAY_MONTH = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH}(?:,?\\s+(\\d{4}))?\\b`, 'gi');
const MONTH_YEAR = new RegExp(`\\b${MONTH},?\\s+(\\d{4})\\b`, 'gi');
const TIMES_HUNDRED = /(?:[×x*]|\btimes)\s*100\b/gi;
const TOP_K = /\btop[\s-]+(\d+)\b/gi;
const BOUND =
  /\b(?:above|over|below|under|more than|less than|greater than|at least|at most|exceeding|between|from|to|and)\s+(?:₹\s?|rs\.?\s*|inr\s*)?(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)/gi;

/** Every number written in `text`, thousands separators removed. */
export function extractNumericTokens(text: string): NumericToken[] {
  const tokens: NumericToken[] = [];
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const raw = match[0];
    const index = match.index ?? 0;
    const plain = raw.replace(/,/g, '');
    const dot = plain.indexOf('.');
    const sign = index > 0 && (index === 1 || /[\s(]/.test(text[index - 2])) ? SIGNS[text[index - 1]] : undefined;
    tokens.push({
      text: sign === undefined ? raw : `${text[index - 1]}${raw}`,
      value: (sign ?? 1) * Number(plain),
      decimals: dot === -1 ? 0 : plain.length - dot - 1,
      signed: sign !== undefined,
    });
  }
  return tokens;
}

/**
 * Values an explanation may cite: each available number and the inputs of
 * its calculation. Entries without data contribute nothing.
 */
export function allowedValues(result: ComputedResult): number[] {
  const allowed = new Set<number>();
  for (const number of result.numbers) {
    if (number.status !== 'ok' || number.value === null) continue;
    const { calculation } = number;
    allowed.add(number.value);
    allowed.add(calculation.sampleSize);
    if (calculation.numerator !== undefined) allowed.add(calculation.numerator);
    if (calculation.denominator !== undefined) allowed.add(calculation.denominator);
  }
  return [...allowed];
}

/**
 * A token matches a value when the value rounds to it at the token's
 * precision. An unsigned token matches either sign; a signed one only its own.
 */
export function tokenMatches(token: NumericToken, value: number): boolean {
  const target = token.signed ? value : Math.abs(value);
  const written = token.signed ? token.value : Math.abs(token.value);
  return Math.abs(target - written) <= 0.5 * 10 ** -token.decimals + EPSILON;
}

function maskMatches(text: string, pattern: RegExp, covered: (match: RegExpMatchArray) => boolean): string {
  let masked = '';
  let cursor = 0;
  for (const match of text.matchAll(pattern)) {
    if (!covered(match)) continue;
    const index = match.index ?? 0;
    masked += `${text.slice(cursor, index)} `;
    cursor = index + match[0].length;
  }
  return masked + text.slice(cursor);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function utcIso(year: number, month: number, day: number): string | null {
  const iso = toIsoDate(Date.UTC(year, month, day));
  return Number(iso.slice(8, 10)) === day ? iso : null;
}

/** Dates inside the range are written forms of it, not figures. End date included. */
function maskDates(text: string, range: TimeRange): string {
  const inRange = (iso: string | null) => iso !== null && iso >= range.start && iso <= range.end;
  const years = [Number(range.start.slice(0, 4)), Number(range.end.slice(0, 4))];
  const dayInRange = (monthWord: string, day: string, year: string | undefined) => {
    const month = monthIndex(monthWord.slice(0, 3));
    const candidates = year ? [Number(year)] : years;
    return candidates.some((y) => inRange(utcIso(y, month, Number(day))));
  };

  let masked = maskMatches(text, ISO_DAY, (match) => inRange(match[0]));
  masked = maskMatches(masked, MONTH_DAY, (match) => dayInRange(match[1], match[2], match[3]));
  masked = maskMatches(masked, DAY_MONTH, (match) => dayInRange(match[2], match[1], match[3]));
  return maskMatches(masked, MONTH_YEAR, (match) => {
    const month = monthIndex(match[1].slice(0, 3));
    const year = Number(match[2]);
    const start = toIsoDate(Date.UTC(year, month, 1));
    const end = toIsoDate(Date.UTC(year, month + 1, 1));
    return start < range.end && end > range.start;
  });
}

function filterLiterals(filters: Filters, into: Set<string>): void {
  for (const constraint of Object.values(filters)) {
    if (constraint.op === 'eq') into.add(constraint.value);
    else if (constraint.op === 'in') constraint.values.forEach((value) => into.add(value));
  }
}

function rangeBounds(filters: Filters, into: Set<number>): void {
  for (const constraint of Object.values(filters)) {
    if (constraint.op !== 'range') continue;
    if (constraint.min !== undefined) into.add(constraint.min);
    if (constraint.max !== undefined) into.add(constraint.max);
  }
}

/**
 * Blanks out the written forms of things the question itself named: dates
 * in the range, segment, group and filter labels, amount bounds, "top k"
 * and the percentage formula. Digits inside them are not figures and must
 * not widen what a figure may be.
 */
export function maskLiterals(text: string, result: ComputedResult, intent: Intent): string {
  const range = result.timeRange ?? intent.timeRange;
  let masked = range ? maskDates(text, range) : text;

  const literals = new Set<string>();
  for (const number of result.numbers) {
    const colon = number.label.indexOf(': ');
    if (colon === -1) continue;
    const group = number.label.slice(colon + 2);
    literals.add(group);
    group.split(' / ').forEach((part) => literals.add(part));
  }
  result.series?.points.forEach((point) => literals.add(point.bucket));
  filterLiterals(intent.filters, literals);
  const bounds = new Set<number>();
  rangeBounds(intent.filters, bounds);
  for (const segment of intent.segments ?? []) {
    literals.add(segment.label);
    filterLiterals(segment.filters, literals);
    rangeBounds(segment.filters, bounds);
  }

  const withDigits = [...literals].filter((literal) => /\d/.test(literal)).sort((a, b) => b.length - a.length);
  for (const literal of withDigits) {
    masked = maskMatches(masked, new RegExp(`(?<![\\w.])${escapeRegExp(literal)}(?![\\w]|[.,]\\d)`, 'gi'), () => true);
  }

  masked = maskMatches(masked, BOUND, (match) => bounds.has(Number(match[1].replace(/,/g, ''))));
  masked = maskMatches(masked, TOP_K, (match) => {
    const k = Number(match[1]);
    return k === intent.topK || (k > 0 && k <= result.numbers.length);
  });
  if (result.numbers.some((number) => number.status === 'ok' && number.calculation.formula.includes('× 100'))) {
    masked = maskMatches(masked, TIMES_HUNDRED, () => true);
  }
  return masked;
}

export interface GroundingReport {
  ok: boolean;
  violations: string[];
}

export function checkGrounding(text: string, result: ComputedResult, intent: Intent): GroundingReport {
  const allowed = allowedValues(result);
  const violations: string[] = [];
  for (const token of extractNumericTokens(maskLiterals(text, result, intent))) {
    if (!allowed.some((value) => tokenMatches(token, value)) && !violations.includes(token.text)) {
      violations.push(token.text);
    }
  }
  return { ok: violations.length === 0, violations };
}
