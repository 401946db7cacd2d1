import { DeviationSeverity } from '../entidades/tipos';

// ════════════════════════════════════════════════════════════════════════
// SINK DE ALERTAS
// ════════════════════════════════════════════════════════════════════════

/**
 * Ciclo de vida: pending → sent → acknowledged → resolved.
 * snoozed sai de sent/acknowledged e volta para acknowledged ou resolved.
 */
type AlertStatus = 'pending' | 'sent' | 'acknowledged' | 'snoozed' | 'resolved';

const ALERT_STATUSES: readonly AlertStatus[] = ['pending', 'sent', 'acknowledged', 'snoozed', 'resolved'];

interface NewAlert {
  kind: string;
  source_id: string;
  severity: DeviationSeverity;
  patient_ref: string;
  title: string;
  summary: string;
  content: Record<string, unknown>;
}

interface Alert extends NewAlert {
  id: string;
  status: AlertStatus;
  created_at: Date;
  sent_at: Date | null;
  acknowledged_at: Date | null;
  resolved_at: Date | null;
  snoozed_until: Date | null;
}

/**
 * Contrato consumido pelo deduplicador e pelo avaliador.
 */
interface AlertSink {
  /**
   * @param includeResolved considerar também alertas já resolvidos
   */
  checkIfAlerted(kind: string, sourceId: string, includeResolved: boolean): Promise<boolean>;

  saveAlert(alert: NewAlert): Promise<string>;

  markSent(alertId: string): Promise<boolean>;
}

export { AlertStatus, ALERT_STATUSES, NewAlert, Alert, AlertSink };
