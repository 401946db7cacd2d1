import { EventLogRepository } from '../event-log/EventLogRepository';
import { ChainVerificationResult, EventActor } from '../event-log/EventLogEntry';
import { Logger, createLogger } from '../utilitarios/Logger';
import { errorMessage } from '../entidades/AdherenceErrors';

// ════════════════════════════════════════════════════════════════════════
// SAÚDE DO EVENTLOG
// ════════════════════════════════════════════════════════════════════════

interface EventLogErrorEntry {
  ts: number;
  evento: string;
  msg: string;
}

interface EventLogStatus {
  enabled: boolean;
  degraded: boolean;
  errorCount: number;
  lastErrorAt?: Date;
  lastErrorMsg?: string;
  lastErrors: EventLogErrorEntry[];
}

const MAX_ERROR_BUFFER = 20;

/**
 * Ponte entre o avaliador e o log encadeado.
 *
 * O log observa, não governa: nenhuma falha de escrita ou verificação
 * sai daqui. Falhas marcam degraded e entram no ring buffer.
 */
class EventLogRecorder {
  private status: EventLogStatus;

  constructor(
    private readonly eventLog?: EventLogRepository,
    private readonly logger: Logger = createLogger('event-log')
  ) {
    this.status = {
      enabled: eventLog !== undefined,
      degraded: false,
      errorCount: 0,
      lastErrors: []
    };
  }

  /**
   * Verifica a cadeia na inicialização; corrupção só marca degraded.
   */
  async init(): Promise<void> {
    await this.verifyNow('INIT_VERIFY');
  }

  async verifyNow(evento: string = 'VERIFY_NOW'): Promise<ChainVerificationResult> {
    if (!this.eventLog) {
      return { valid: true, totalVerified: 0 };
    }

    try {
      const result = await this.eventLog.verifyChain();
      if (!result.valid) {
        this.fail(evento, `Chain corruption at index ${result.firstInvalidIndex}: ${result.reason}`);
      }
      return result;
    } catch (error) {
      const msg = errorMessage(error);
      this.fail(evento, msg);
      return { valid: false, totalVerified: 0, reason: msg };
    }
  }

  async record(
    actor: EventActor,
    evento: string,
    entidade: string,
    entidadeId: string,
    payload: unknown
  ): Promise<void> {
    if (!this.eventLog) return;

    try {
      await this.eventLog.append(actor, evento, entidade, entidadeId, payload);
    } catch (error) {
      this.fail(evento, errorMessage(error));
      this.logger.error({ err: error, evento, entidade, entidade_id: entidadeId }, 'failed to append event');
    }
  }

  getStatus(): EventLogStatus {
    return { ...this.status, lastErrors: [...this.status.lastErrors] };
  }

  private fail(evento: string, msg: string): void {
    this.status.degraded = true;
    this.status.errorCount++;
    this.status.lastErrorAt = new Date();
    this.status.lastErrorMsg = msg;
    this.status.lastErrors.push({ ts: Date.now(), evento, msg });
    if (this.status.lastErrors.length > MAX_ERROR_BUFFER) {
      this.status.lastErrors.shift();
    }
  }
}

export { EventLogErrorEntry, EventLogStatus, MAX_ERROR_BUFFER, EventLogRecorder };
