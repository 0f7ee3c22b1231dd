/** A parsed payload: its fields when a splitter is configured, the raw payload otherwise. */
export type Row = string | readonly string[];

/** Contiguous rows sharing one grouping key, in input order. */
export interface Group<R = Row> {
  readonly key: string;
  readonly rows: readonly R[];
}
