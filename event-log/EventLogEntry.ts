// ════════════════════════════════════════════════════════════════════════
// EVENTOS DE AUDITORIA DO MOTOR
// ════════════════════════════════════════════════════════════════════════

/** Ciclo de monitoramento ou chamada ao gateway */
type EventActor = 'monitor' | 'gateway';

const EVENT_ACTORS: readonly EventActor[] = ['monitor', 'gateway'];

/**
 * O que aconteceu com um episódio, um elemento ou um desvio.
 */
enum TipoEvento {
  EPISODE_OPENED = 'EPISODE_OPENED',
  ELEMENT_RESOLVED = 'ELEMENT_RESOLVED',
  EPISODE_STATUS_CHANGED = 'EPISODE_STATUS_CHANGED',
  DEVIATION_EMITTED = 'DEVIATION_EMITTED',
  DEVIATION_SUPPRESSED = 'DEVIATION_SUPPRESSED',
  EPISODE_CLOSED = 'EPISODE_CLOSED'
}

/**
 * Entidade afetada. Elementos usam o id composto `episodio/elemento`.
 */
enum TipoEntidade {
  EPISODE = 'Episode',
  ELEMENT = 'ElementCheckResult',
  DEVIATION = 'Deviation'
}

/**
 * Um registro do log de auditoria. O conteúdo da entidade não é guardado,
 * só o hash do payload canônico; `current_hash` cobre os campos do
 * registro e o hash do anterior, então editar ou remover um registro já
 * gravado invalida todos os seguintes.
 */
interface EventLogEntry {
  id: string;
  timestamp: Date;
  actor: EventActor;
  evento: string;
  entidade: string;
  entidade_id: string;
  payload_hash: string;
  /** null no primeiro registro */
  previous_hash: string | null;
  current_hash: string;
}

/**
 * Resultado de percorrer a cadeia desde o primeiro registro. Quando
 * inválida, aponta o primeiro registro que não confere.
 */
interface ChainVerificationResult {
  valid: boolean;
  firstInvalidIndex?: number;
  firstInvalidId?: string;
  reason?: string;
  /** Registros conferidos antes do primeiro inválido */
  totalVerified: number;
}

export { EventActor, EVENT_ACTORS, EventLogEntry, TipoEvento, TipoEntidade, ChainVerificationResult };
