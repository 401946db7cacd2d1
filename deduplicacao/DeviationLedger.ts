import { DeviationMarkerRepository } from '../repositorios/interfaces/DeviationMarkerRepository';
import { AlertSink } from '../alertas/AlertSink';

// ════════════════════════════════════════════════════════════════════════
// LEDGER DE DESVIOS (TRÊS CAMADAS)
// ════════════════════════════════════════════════════════════════════════

const DEVIATION_ALERT_KIND = 'bundle_deviation';

/**
 * Chave de deduplicação: episode_id + "_" + element_id.
 */
function deviationKey(episodeId: string, elementId: string): string {
  return `${episodeId}_${elementId}`;
}

interface DeviationRef {
  episode_id: string;
  element_id: string;
}

type LedgerTier = 'memory' | 'marker' | 'sink';

/**
 * Uma implementação por camada de durabilidade.
 */
interface DeviationLedger {
  readonly tier: LedgerTier;

  has(ref: DeviationRef): Promise<boolean>;

  /**
   * @param alertId null quando a camada é preenchida a partir de outra
   */
  record(ref: DeviationRef, alertId: string | null, at: Date): Promise<void>;
}

/**
 * Camada 1: conjunto em memória, perdido no reinício.
 */
class InMemoryDeviationLedger implements DeviationLedger {
  readonly tier = 'memory' as const;
  private readonly keys = new Set<string>();

  async has(ref: DeviationRef): Promise<boolean> {
    return this.keys.has(deviationKey(ref.episode_id, ref.element_id));
  }

  async record(ref: DeviationRef): Promise<void> {
    this.keys.add(deviationKey(ref.episode_id, ref.element_id));
  }

  get size(): number {
    return this.keys.size;
  }

  /**
   * Apenas para isolamento entre testes.
   */
  clear(): void {
    this.keys.clear();
  }
}

/**
 * Camada 2: marcador durável por (episode_id, element_id).
 */
class PersistentDeviationLedger implements DeviationLedger {
  readonly tier = 'marker' as const;

  constructor(private readonly markers: DeviationMarkerRepository) {}

  async has(ref: DeviationRef): Promise<boolean> {
    return this.markers.has(ref.episode_id, ref.element_id);
  }

  async record(ref: DeviationRef, alertId: string | null, at: Date): Promise<void> {
    await this.markers.record({
      episode_id: ref.episode_id,
      element_id: ref.element_id,
      alert_id: alertId,
      recorded_at: at
    });
  }
}

/**
 * Camada 3 (autoritativa): o próprio sink, incluindo alertas resolvidos.
 * O registro acontece na emissão; record() não escreve nada.
 */
class AlertSinkDeviationLedger implements DeviationLedger {
  readonly tier = 'sink' as const;

  constructor(private readonly sink: AlertSink) {}

  async has(ref: DeviationRef): Promise<boolean> {
    return this.sink.checkIfAlerted(DEVIATION_ALERT_KIND, deviationKey(ref.episode_id, ref.element_id), true);
  }

  async record(): Promise<void> {
    return;
  }
}

export {
  DEVIATION_ALERT_KIND,
  deviationKey,
  DeviationRef,
  LedgerTier,
  DeviationLedger,
  InMemoryDeviationLedger,
  PersistentDeviationLedger,
  AlertSinkDeviationLedger
};
