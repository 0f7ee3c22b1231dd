import type { EventBus } from '../../application/EventBus.js';
import type { Group } from '../model/Group.js';
import type { KeyValueLine } from '../model/KeyValueLine.js';
import { hasSeparator, parseKeyValueLine } from '../model/KeyValueLine.js';
import { DEFAULT_FIELD_DELIMITER, KV_SEPARATOR } from '../model/StreamingDefaults.js';
import { StreamingError } from '../errors/StreamingError.js';
import type { FieldSplitter } from './FieldSplitter.js';
import { delimiterSplitter } from './FieldSplitter.js';

/** Computes the grouping key of a line. The default groups on the line's own key. */
export type KeyFn = (line: KeyValueLine) => string;

/** Turns the payload of a line into a row. */
export type RowParser<R> = (payload: string) => R;

export interface RecordGrouperOptions<R> {
  readonly parseRow: RowParser<R>;
  /** Single character between key and payload. Default: tab. */
  readonly separator?: string;
  readonly keyFn?: KeyFn;
  /** Receives `line:malformed` and `group:completed` events. */
  readonly eventBus?: EventBus;
}

export type RawGrouperOptions = Omit<RecordGrouperOptions<string>, 'parseRow'>;

export interface DelimitedGrouperOptions extends Omit<RecordGrouperOptions<readonly string[]>, 'parseRow'> {
  /** Field delimiter, or a custom splitter for quoted payloads. Default: tab. */
  readonly delimiter?: string | FieldSplitter;
}

interface GroupState<R> {
  key: string;
  rows: R[];
  lineNumber: number;
  groupIndex: number;
}

const lineKey: KeyFn = (line) => line.key;

/**
 * Domain service that groups presorted `KEY<SEP>PAYLOAD` lines by key.
 *
 * Single forward pass: only the group being accumulated is held in memory.
 * The input MUST already be sorted (or at least clustered) by the grouping
 * key. A key that reappears after a different key starts a new group; this is
 * not detected.
 *
 * @example
 * ```typescript
 * const grouper = RecordGrouper.delimited({ delimiter: ',' });
 * for (const { key, rows } of grouper.group(['100\tA,B', '100\tC,D', '200\t1,2'])) {
 *   // '100' [['A','B'],['C','D']], then '200' [['1','2']]
 * }
 * ```
 */
export class RecordGrouper<R> {
  private readonly separator: string;
  private readonly keyFn: KeyFn;
  private readonly parseRow: RowParser<R>;
  private readonly eventBus: EventBus | null;

  constructor(options: RecordGrouperOptions<R>) {
    const separator = options.separator ?? KV_SEPARATOR;
    if (Array.from(separator).length !== 1) {
      throw new StreamingError(
        'CONFIGURATION',
        `RecordGrouper: separator must be a single character, got ${JSON.stringify(separator)}`,
      );
    }

    this.separator = separator;
    this.keyFn = options.keyFn ?? lineKey;
    this.parseRow = options.parseRow;
    this.eventBus = options.eventBus ?? null;
  }

  /** Grouper whose rows are the payload split into fields. */
  static delimited(options: DelimitedGrouperOptions = {}): RecordGrouper<readonly string[]> {
    const { delimiter = DEFAULT_FIELD_DELIMITER, ...rest } = options;
    const parseRow = typeof delimiter === 'function' ? delimiter : delimiterSplitter(delimiter);
    return new RecordGrouper<readonly string[]>({ ...rest, parseRow });
  }

  /** Grouper whose rows are the unparsed payload strings. */
  static raw(options: RawGrouperOptions = {}): RecordGrouper<string> {
    return new RecordGrouper<string>({ ...options, parseRow: (payload) => payload });
  }

  /** Lazily group a synchronous sequence of lines. Lines may keep their terminators. */
  *group(lines: Iterable<string>): Iterable<Group<R>> {
    const state = this.initialState();

    for (const line of lines) {
      const completed = this.accept(state, line);
      if (completed) yield completed;
    }

    const last = this.flush(state);
    if (last) yield last;
  }

  /** Same as {@link group} over an async source such as stdin. */
  async *groupStream(lines: AsyncIterable<string>): AsyncIterable<Group<R>> {
    const state = this.initialState();

    for await (const line of lines) {
      const completed = this.accept(state, line);
      if (completed) yield completed;
    }

    const last = this.flush(state);
    if (last) yield last;
  }

  private initialState(): GroupState<R> {
    return { key: '', rows: [], lineNumber: 0, groupIndex: 0 };
  }

  /** Add one line; returns the previous group when this line's key closes it. */
  private accept(state: GroupState<R>, line: string): Group<R> | undefined {
    state.lineNumber++;

    if (this.eventBus && !hasSeparator(line, this.separator)) {
      this.eventBus.emit({
        type: 'line:malformed',
        lineNumber: state.lineNumber,
        line,
        timestamp: Date.now(),
      });
    }

    const parsed = parseKeyValueLine(line, this.separator);
    const key = this.keyFn(parsed);
    const row = this.parseRow(parsed.payload);

    let completed: Group<R> | undefined;
    if (state.rows.length > 0 && key !== state.key) {
      completed = this.flush(state);
    }

    state.rows.push(row);
    state.key = key;
    return completed;
  }

  private flush(state: GroupState<R>): Group<R> | undefined {
    if (state.rows.length === 0) return undefined;

    const group: Group<R> = { key: state.key, rows: state.rows };
    this.eventBus?.emit({
      type: 'group:completed',
      key: group.key,
      groupIndex: state.groupIndex,
      rowCount: group.rows.length,
      timestamp: Date.now(),
    });

    state.rows = [];
    state.groupIndex++;
    return group;
  }
}
