import * as path from 'path';
import { randomUUID } from 'crypto';
import { JsonFileStore } from '../utilitarios/JsonFileStore';
import {
  asRecord,
  isRecord,
  readDate,
  readOneOf,
  readOptionalDate,
  readString
} from '../utilitarios/Revive';
import {
  AlertNotFoundError,
  InvalidTransitionError,
  RepositoryNotInitializedError
} from '../entidades/AdherenceErrors';
import { DeviationSeverity } from '../entidades/tipos';
import { ALERT_STATUSES, Alert, AlertSink, AlertStatus, NewAlert } from './AlertSink';

const SEVERITIES: readonly DeviationSeverity[] = ['critical', 'warning', 'info'];

// ════════════════════════════════════════════════════════════════════════
// TRANSIÇÕES VÁLIDAS
// ════════════════════════════════════════════════════════════════════════

const TRANSICOES_ALERT: Record<AlertStatus, AlertStatus[]> = {
  pending: ['sent', 'resolved'],
  sent: ['acknowledged', 'snoozed', 'resolved'],
  acknowledged: ['snoozed', 'resolved'],
  snoozed: ['acknowledged', 'resolved'],
  resolved: []
};

interface AlertQuery {
  status?: AlertStatus;
  kind?: string;
  source_id?: string;
}

function reviveAlert(raw: unknown): Alert {
  const rec = asRecord(raw, 'alert');
  const content = rec.content;
  return {
    id: readString(rec, 'id'),
    kind: readString(rec, 'kind'),
    source_id: readString(rec, 'source_id'),
    severity: readOneOf(rec, 'severity', SEVERITIES),
    patient_ref: readString(rec, 'patient_ref'),
    title: readString(rec, 'title'),
    summary: readString(rec, 'summary'),
    content: isRecord(content) ? { ...content } : {},
    status: readOneOf(rec, 'status', ALERT_STATUSES),
    created_at: readDate(rec, 'created_at'),
    sent_at: readOptionalDate(rec, 'sent_at'),
    acknowledged_at: readOptionalDate(rec, 'acknowledged_at'),
    resolved_at: readOptionalDate(rec, 'resolved_at'),
    snoozed_until: readOptionalDate(rec, 'snoozed_until')
  };
}

function cloneAlert(a: Alert): Alert {
  const copy = (d: Date | null): Date | null => (d ? new Date(d.getTime()) : null);
  return {
    ...a,
    content: { ...a.content },
    created_at: new Date(a.created_at.getTime()),
    sent_at: copy(a.sent_at),
    acknowledged_at: copy(a.acknowledged_at),
    resolved_at: copy(a.resolved_at),
    snoozed_until: copy(a.snoozed_until)
  };
}

/**
 * Sink de alertas durável em alerts.json.
 *
 * A entrega a humanos (e-mail, chat) fica fora daqui: o store guarda o
 * alerta e o estado do ciclo de vida. DELETE é PROIBIDO - método não existe.
 */
class JsonFileAlertStore implements AlertSink {
  private store: Map<string, Alert> = new Map();
  private fileStore: JsonFileStore;
  private initialized: boolean = false;

  constructor(dataDir: string = './data', private readonly clock: () => Date = () => new Date()) {
    this.fileStore = new JsonFileStore(path.join(dataDir, 'alerts.json'));
  }

  static async create(dataDir: string = './data', clock?: () => Date): Promise<JsonFileAlertStore> {
    const store = new JsonFileAlertStore(dataDir, clock);
    await store.init();
    return store;
  }

  async init(): Promise<void> {
    const items = await this.fileStore.readAll();
    this.store.clear();
    for (const raw of items) {
      const alert = reviveAlert(raw);
      this.store.set(alert.id, alert);
    }
    this.initialized = true;
  }

  private checkInitialized(): void {
    if (!this.initialized) {
      throw new RepositoryNotInitializedError('JsonFileAlertStore');
    }
  }

  private async persist(): Promise<void> {
    await this.fileStore.writeAll(Array.from(this.store.values()));
  }

  private require(alertId: string): Alert {
    const alert = this.store.get(alertId);
    if (!alert) {
      throw new AlertNotFoundError(alertId);
    }
    return alert;
  }

  private async transition(alert: Alert, to: AlertStatus, apply: (a: Alert) => void): Promise<Alert> {
    if (!TRANSICOES_ALERT[alert.status].includes(to)) {
      throw new InvalidTransitionError('Alert', alert.id, alert.status, to);
    }
    const next = cloneAlert(alert);
    next.status = to;
    apply(next);
    this.store.set(next.id, next);
    await this.persist();
    return cloneAlert(next);
  }

  // ════════════════════════════════════════════════════════════════════════
  // CONTRATO AlertSink
  // ════════════════════════════════════════════════════════════════════════

  async checkIfAlerted(kind: string, sourceId: string, includeResolved: boolean): Promise<boolean> {
    this.checkInitialized();
    for (const alert of this.store.values()) {
      if (alert.kind !== kind || alert.source_id !== sourceId) continue;
      if (includeResolved || alert.status !== 'resolved') return true;
    }
    return false;
  }

  async saveAlert(input: NewAlert): Promise<string> {
    this.checkInitialized();

    const alert: Alert = {
      ...input,
      content: { ...input.content },
      id: `alert-${randomUUID()}`,
      status: 'pending',
      created_at: this.clock(),
      sent_at: null,
      acknowledged_at: null,
      resolved_at: null,
      snoozed_until: null
    };
    this.store.set(alert.id, alert);
    await this.persist();
    return alert.id;
  }

  /**
   * @returns false se o alerta não está mais pendente
   */
  async markSent(alertId: string): Promise<boolean> {
    this.checkInitialized();
    const alert = this.require(alertId);
    if (alert.status !== 'pending') {
      return false;
    }
    await this.transition(alert, 'sent', a => { a.sent_at = this.clock(); });
    return true;
  }

  // ════════════════════════════════════════════════════════════════════════
  // CICLO DE VIDA
  // ════════════════════════════════════════════════════════════════════════

  async acknowledge(alertId: string): Promise<Alert> {
    this.checkInitialized();
    return this.transition(this.require(alertId), 'acknowledged', a => {
      a.acknowledged_at = this.clock();
      a.snoozed_until = null;
    });
  }

  async snooze(alertId: string, until: Date): Promise<Alert> {
    this.checkInitialized();
    return this.transition(this.require(alertId), 'snoozed', a => { a.snoozed_until = until; });
  }

  async resolve(alertId: string): Promise<Alert> {
    this.checkInitialized();
    return this.transition(this.require(alertId), 'resolved', a => {
      a.resolved_at = this.clock();
      a.snoozed_until = null;
    });
  }

  async getById(alertId: string): Promise<Alert | null> {
    this.checkInitialized();
    const alert = this.store.get(alertId);
    return alert ? cloneAlert(alert) : null;
  }

  /**
   * Mais recentes primeiro.
   */
  async list(query: AlertQuery = {}): Promise<Alert[]> {
    this.checkInitialized();
    return Array.from(this.store.values())
      .filter(a => query.status === undefined || a.status === query.status)
      .filter(a => query.kind === undefined || a.kind === query.kind)
      .filter(a => query.source_id === undefined || a.source_id === query.source_id)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map(cloneAlert);
  }
}

export { JsonFileAlertStore, AlertQuery, TRANSICOES_ALERT };
