/**
 * JSON replacer that writes bigint values (nanosecond timestamps) as decimal
 * strings. JSON.stringify throws on bigint otherwise.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

/**
 * Deep copy of `value` with every bigint replaced by its decimal string.
 */
export function toPlainJson(value: unknown): unknown {
  if (value === undefined) {
    return undefined;
  }
  const plain: unknown = JSON.parse(toJson(value));
  return plain;
}
