import { EventActor, EventLogEntry, ChainVerificationResult } from './EventLogEntry';

/**
 * Log de auditoria encadeado por hash.
 *
 * Só cresce: não há update nem delete. O motor grava aqui depois de
 * persistir o estado do episódio, e uma falha do log nunca desfaz a
 * transição já gravada (ver EventLogRecorder).
 */
interface EventLogRepository {
  init(): Promise<void>;

  /**
   * Grava um registro ligado ao último; o payload vira `payload_hash`.
   */
  append(
    actor: EventActor,
    evento: string,
    entidade: string,
    entidadeId: string,
    payload: unknown
  ): Promise<EventLogEntry>;

  /** Em ordem de gravação */
  getAll(): Promise<EventLogEntry[]>;

  getByEntidade(entidade: string, entidadeId: string): Promise<EventLogEntry[]>;

  verifyChain(): Promise<ChainVerificationResult>;

  count(): Promise<number>;
}

export { EventLogRepository };
