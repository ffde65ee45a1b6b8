/**
 * Plain objects (including null-prototype ones); arrays, dates and class instances are excluded
 */
export const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

export const isMapping = (value: unknown): value is Record<string, unknown> | Map<unknown, unknown> =>
  value instanceof Map || isPlainRecord(value);

/**
 * Entries of a mapping in insertion order
 */
export const mappingEntries = (value: Record<string, unknown> | Map<unknown, unknown>): Array<[unknown, unknown]> =>
  value instanceof Map ? [...value.entries()] : Object.entries(value);

/**
 * Own-property lookup; a missing key reads as `undefined` (absent)
 */
export const readField = (value: Record<string, unknown> | Map<unknown, unknown>, name: string): unknown => {
  if (value instanceof Map) {
    return value.get(name);
  }
  return Object.prototype.hasOwnProperty.call(value, name) ? value[name] : undefined;
};
