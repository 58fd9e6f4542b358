export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

export function pickNumber(value: unknown): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const n = typeof value === 'number' ? value : parseFloat(String(value));
  return Number.isFinite(n) ? n : undefined;
}

export function pickString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/** First entry of an upper- or lower-case section array, e.g. `SUMMARY[0]`. */
export function firstEntry(reply: JsonRecord, section: string): JsonRecord | null {
  const list = reply[section] ?? reply[section.toLowerCase()];
  return Array.isArray(list) ? asRecord(list[0]) : null;
}

/** Return the first key present on `record`, for firmwares that disagree on spelling. */
export function pickField(record: JsonRecord, keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined) return record[key];
  }
  return undefined;
}
