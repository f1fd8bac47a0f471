import { describe, it, expect, vi } from 'vitest';
import { resolveDate, endOfDayAt, formatTimestamp, type DateGrammar } from '../../src/parsers/date-parser.js';

// Tuesday Jul 8 2025, 10:30 local
const ref = new Date(2025, 6, 8, 10, 30);
// Friday Jul 11 2025, 09:00 local
const friday = new Date(2025, 6, 11, 9, 0);

const noGrammar: DateGrammar = { parse: () => null };

/** Local wall-clock part of a resolved timestamp (drops millis and offset) */
function resolved(expression: string, now: Date = ref, grammar?: DateGrammar): string {
  const r = resolveDate(expression, now, grammar);
  if (r.type !== 'success') throw new Error(`expected '${expression}' to resolve`);
  return r.date.slice(0, 19);
}

describe('resolveDate', () => {
  // --- Calendar dates ---

  it('parses YYYY-MM-DD as end of day', () => {
    expect(resolved('2025-07-15')).toBe('2025-07-15T23:59:59');
  });

  it('parses YYYY/MM/DD', () => {
    expect(resolved('2025/07/15')).toBe('2025-07-15T23:59:59');
  });

  it('rejects impossible calendar dates', () => {
    const r = resolveDate('2025-02-30', ref, noGrammar);
    expect(r).toEqual({ type: 'error', error: { kind: 'unparseable', input: '2025-02-30' } });
  });

  it('does not mistake object property names for weekdays', () => {
    expect(resolveDate('constructor', ref, noGrammar)).toEqual({
      type: 'error', error: { kind: 'unparseable', input: 'constructor' },
    });
    expect(resolveDate('__proto__', ref, noGrammar).type).toBe('error');
  });

  it('rejects mixed separators', () => {
    expect(resolveDate('2025-07/15', ref, noGrammar).type).toBe('error');
  });

  it('parses MM/DD/YYYY and falls back to DD/MM/YYYY', () => {
    expect(resolved('07/15/2025', ref, noGrammar)).toBe('2025-07-15T23:59:59');
    expect(resolved('15/07/2025', ref, noGrammar)).toBe('2025-07-15T23:59:59');
    expect(resolved('07-04-2025', ref, noGrammar)).toBe('2025-07-04T23:59:59');
  });

  // --- Keywords ---

  it('parses "today" and "tomorrow"', () => {
    expect(resolved('today')).toBe('2025-07-08T23:59:59');
    expect(resolved('tomorrow')).toBe('2025-07-09T23:59:59');
  });

  it('is case-insensitive and trims', () => {
    expect(resolved('  TOMORROW ')).toBe('2025-07-09T23:59:59');
    expect(resolved('Today')).toBe('2025-07-08T23:59:59');
  });

  // --- Weekdays ---

  it('parses weekday names as the next occurrence', () => {
    expect(resolved('friday')).toBe('2025-07-11T23:59:59');
    expect(resolved('monday')).toBe('2025-07-14T23:59:59');
    expect(resolved('fri')).toBe('2025-07-11T23:59:59');
  });

  it('never returns today for a weekday name', () => {
    expect(resolved('tuesday')).toBe('2025-07-15T23:59:59');
    expect(resolved('Friday', friday)).toBe('2025-07-18T23:59:59');
  });

  it('does not consult the grammar when an earlier rule matches', () => {
    const parse = vi.fn(() => null);
    resolveDate('friday', ref, { parse });
    resolveDate('2025-07-15', ref, { parse });
    expect(parse).not.toHaveBeenCalled();
  });

  // --- Natural language ---

  it('normalizes grammar results without a time to end of day', () => {
    const grammar: DateGrammar = { parse: () => ({ date: new Date(2025, 7, 1, 9, 0), hasTime: false }) };
    expect(resolved('first of august', ref, grammar)).toBe('2025-08-01T23:59:59');
  });

  it('keeps an explicit time from the grammar', () => {
    const grammar: DateGrammar = { parse: () => ({ date: new Date(2025, 7, 1, 9, 15), hasTime: true }) };
    expect(resolved('aug 1 at 9:15', ref, grammar)).toBe('2025-08-01T09:15:00');
  });

  it('passes the trimmed text and reference to the grammar', () => {
    const parse = vi.fn(() => null);
    resolveDate('  next sprint ', ref, { parse });
    expect(parse).toHaveBeenCalledWith('next sprint', ref);
  });

  it('understands relative days through chrono-node', () => {
    expect(resolved('in 3 days')).toBe('2025-07-11T23:59:59');
  });

  it('keeps the time of relative hours through chrono-node', () => {
    expect(resolved('in 2 hours')).toBe('2025-07-08T12:30:00');
  });

  // --- Failures ---

  it('reports the original input when nothing matches', () => {
    expect(resolveDate(' gibberish ', ref)).toEqual({
      type: 'error',
      error: { kind: 'unparseable', input: ' gibberish ' },
    });
  });

  it('rejects empty input', () => {
    expect(resolveDate('', ref).type).toBe('error');
    expect(resolveDate('   ', ref).type).toBe('error');
  });

  it('records the local UTC offset', () => {
    const r = resolveDate('2025-07-15', ref);
    expect(r.type).toBe('success');
    if (r.type === 'success') {
      expect(r.date).toMatch(/^2025-07-15T23:59:59\.000[+-]\d{2}:\d{2}$/);
      expect(new Date(r.date).getTime()).toBe(new Date(2025, 6, 15, 23, 59, 59).getTime());
    }
  });
});

describe('endOfDayAt', () => {
  it('moves to 23:59:59.000 on the same day', () => {
    const d = endOfDayAt(new Date(2025, 0, 31, 0, 0, 1, 500));
    expect(formatTimestamp(d).slice(0, 23)).toBe('2025-01-31T23:59:59.000');
  });
});
