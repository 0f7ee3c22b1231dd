/** A decoded record: the text key (sequence files) or byte offset (text files), and the parsed JSON. */
export interface JsonRecord<K extends string | number> {
  readonly key: K;
  readonly value: unknown;
}
