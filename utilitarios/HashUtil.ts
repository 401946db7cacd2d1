import { createHash } from 'crypto';

// ════════════════════════════════════════════════════════════════════════
// HASH ENCADEADO DO LOG DE EVENTOS
// ════════════════════════════════════════════════════════════════════════

/**
 * Campos de um evento que entram no hash da cadeia.
 */
interface ChainedFields {
  timestamp: Date;
  actor: string;
  evento: string;
  entidade: string;
  entidade_id: string;
  payload_hash: string;
}

function sha256(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * `previous|timestamp|actor|evento|entidade|entidade_id|payload_hash`,
 * com previous vazio no genesis.
 */
function computeEventHash(previousHash: string | null, fields: ChainedFields): string {
  return sha256([
    previousHash ?? '',
    fields.timestamp.toISOString(),
    fields.actor,
    fields.evento,
    fields.entidade,
    fields.entidade_id,
    fields.payload_hash
  ].join('|'));
}

/**
 * JSON com chaves de objeto ordenadas em qualquer profundidade; o hash do
 * payload não depende da ordem de construção do objeto.
 */
function canonicalJson(value: unknown): string {
  const text = JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v !== 'object' || v === null || Array.isArray(v)) return v;
    return Object.fromEntries(Object.entries(v).sort(([a], [b]) => a.localeCompare(b)));
  });
  return text ?? 'null';
}

function computePayloadHash(payload: unknown): string {
  return sha256(canonicalJson(payload));
}

export { ChainedFields, sha256, computeEventHash, canonicalJson, computePayloadHash };
