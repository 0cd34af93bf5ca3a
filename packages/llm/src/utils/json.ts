export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(record: JsonRecord | undefined, key: string): string {
  const value = record?.[key];
  return typeof value === 'string' ? value : '';
}

export function numberField(record: JsonRecord | undefined, key: string): number {
  const value = record?.[key];
  return typeof value === 'number' ? value : 0;
}

export function recordField(record: JsonRecord | undefined, key: string): JsonRecord | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

export function recordArrayField(record: JsonRecord | undefined, key: string): ReadonlyArray<JsonRecord> {
  const value = record?.[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}
