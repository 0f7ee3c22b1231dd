/** Character between the key and the payload of every protocol line. */
export const KV_SEPARATOR = '\t';

/** Delimiter between the values of a payload, as written by the serializer. */
export const DEFAULT_FIELD_DELIMITER = '\t';
