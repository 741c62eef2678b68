import { DecodeOptions } from './fields';
import { BatchParseError, TleError } from './errors';
import { partition } from './partition';
import { TleRecord } from './tle-record';

export type TleSource = string | Iterable<string>;

export interface BatchOptions extends DecodeOptions {
  /** Hand a short trailing group to the parser instead of dropping it. */
  keepRemainder?: boolean;
}

export type BatchResult =
  | { ok: true; index: number; record: TleRecord }
  | { ok: false; index: number; lines: string[]; error: TleError };

function toLines(source: TleSource): Iterable<string> {
  return typeof source === 'string' ? source.split(/\r?\n/) : source;
}

function parseGroup(group: string[], options: BatchOptions): TleRecord {
  const [name = '', line1 = '', line2 = ''] = group;
  return TleRecord.fromLines(name, line1, line2, options);
}

/**
 * Lazily parses consecutive name / line 1 / line 2 groups. Stops at the
 * first group that fails, with a {@link BatchParseError} carrying its index.
 */
export function* iterateRecords(source: TleSource, options: BatchOptions = {}): Generator<TleRecord, void, undefined> {
  let index = 0;
  for (const group of partition(toLines(source), 3, options.keepRemainder)) {
    let record: TleRecord;
    try {
      record = parseGroup(group, options);
    } catch (err) {
      if (err instanceof TleError) {
        throw new BatchParseError(index, err);
      }
      throw err;
    }
    yield record;
    index++;
  }
}

/**
 * Parses every record in `source`; the first failure aborts the batch.
 * A string source is split into lines, so a trailing newline leaves an
 * empty line that is dropped with the remainder.
 */
export function parseAll(source: TleSource, options: BatchOptions = {}): TleRecord[] {
  return [...iterateRecords(source, options)];
}

/** Same as {@link parseAll} for text. */
export function loads(text: string, options: BatchOptions = {}): TleRecord[] {
  return parseAll(text, options);
}

/**
 * Parses every group and reports each outcome, failures included, in
 * source order. Nothing is skipped.
 */
export function parseAllSettled(source: TleSource, options: BatchOptions = {}): BatchResult[] {
  const results: BatchResult[] = [];
  let index = 0;
  for (const group of partition(toLines(source), 3, options.keepRemainder)) {
    try {
      results.push({ ok: true, index, record: parseGroup(group, options) });
    } catch (err) {
      if (!(err instanceof TleError)) {
        throw err;
      }
      results.push({ ok: false, index, lines: group, error: err });
    }
    index++;
  }
  return results;
}
