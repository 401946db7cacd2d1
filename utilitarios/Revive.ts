// ════════════════════════════════════════════════════════════════════════
// REVIVE DE REGISTROS PERSISTIDOS
// ════════════════════════════════════════════════════════════════════════

/**
 * Leitores tipados para registros lidos do disco ou recebidos por HTTP.
 * Lançam RecordShapeError com o caminho do campo inválido.
 */

type UnknownRecord = Record<string, unknown>;

class RecordShapeError extends Error {
  constructor(field: string, expected: string) {
    super(`Campo '${field}' inválido: esperado ${expected}`);
    this.name = 'RecordShapeError';
  }
}

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, field: string): UnknownRecord {
  if (!isRecord(value)) {
    throw new RecordShapeError(field, 'objeto');
  }
  return value;
}

function readString(rec: UnknownRecord, key: string): string {
  const value = rec[key];
  if (typeof value !== 'string') {
    throw new RecordShapeError(key, 'string');
  }
  return value;
}

function readOptionalString(rec: UnknownRecord, key: string): string | null {
  const value = rec[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new RecordShapeError(key, 'string ou null');
  }
  return value;
}

function readNumber(rec: UnknownRecord, key: string): number {
  const value = rec[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new RecordShapeError(key, 'number');
  }
  return value;
}

function readOptionalNumber(rec: UnknownRecord, key: string): number | null {
  const value = rec[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new RecordShapeError(key, 'number ou null');
  }
  return value;
}

function readBoolean(rec: UnknownRecord, key: string, fallback: boolean): boolean {
  const value = rec[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new RecordShapeError(key, 'boolean');
  }
  return value;
}

function toDate(value: unknown, field: string): Date {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  throw new RecordShapeError(field, 'data ISO-8601');
}

function readDate(rec: UnknownRecord, key: string): Date {
  return toDate(rec[key], key);
}

function readOptionalDate(rec: UnknownRecord, key: string): Date | null {
  const value = rec[key];
  if (value === undefined || value === null) {
    return null;
  }
  return toDate(value, key);
}

function readStringArray(rec: UnknownRecord, key: string): string[] {
  const value = rec[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new RecordShapeError(key, 'lista de strings');
  }
  return [...value];
}

function readArray(rec: UnknownRecord, key: string): unknown[] {
  const value = rec[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new RecordShapeError(key, 'lista');
  }
  return value;
}

/**
 * Lê um valor restrito a um conjunto fechado (enum ou união de literais).
 */
function readOneOf<T extends string>(
  rec: UnknownRecord,
  key: string,
  allowed: readonly T[]
): T {
  const value = rec[key];
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new RecordShapeError(key, `um de [${allowed.join(', ')}]`);
  }
  return match;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
  return allowed.find(a => a === value);
}

export {
  UnknownRecord,
  RecordShapeError,
  isRecord,
  asRecord,
  readString,
  readOptionalString,
  readNumber,
  readOptionalNumber,
  readBoolean,
  toDate,
  readDate,
  readOptionalDate,
  readStringArray,
  readArray,
  readOneOf,
  oneOf
};
