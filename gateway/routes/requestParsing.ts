import { RecordShapeError } from '../../utilitarios/Revive';

// ════════════════════════════════════════════════════════════════════════════
// PARÂMETROS DE QUERY
// ════════════════════════════════════════════════════════════════════════════

/**
 * Inteiro em [min, max]; ausente devolve o fallback.
 * @throws RecordShapeError (400 no error handler)
 */
function parseIntParam(
  value: string | undefined,
  field: string,
  fallback: number,
  min: number,
  max: number
): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new RecordShapeError(field, `inteiro entre ${min} e ${max}`);
  }
  return parsed;
}

/**
 * Corpo opcional: POST sem payload chega como undefined.
 */
function bodyOrEmpty(body: unknown): unknown {
  return body === undefined || body === null ? {} : body;
}

export { parseIntParam, bodyOrEmpty };
