import { Logger, createLogger } from '../utilitarios/Logger';
import {
  AlertSinkDeviationLedger,
  DeviationLedger,
  DeviationRef,
  InMemoryDeviationLedger,
  LedgerTier,
  PersistentDeviationLedger
} from './DeviationLedger';

/**
 * Decisão para um par (episode, element).
 */
type DedupDecision =
  | { emit: true }
  | { emit: false; suppressedBy: LedgerTier };

/**
 * Deduplicador de desvios.
 *
 * INVARIANTES:
 * - no máximo um alerta por (episode_id, element_id) durante toda a vida do sistema
 * - camadas consultadas em ordem: memória → marcador → sink
 * - acerto em qualquer camada suprime e preenche as camadas mais rápidas
 * - falha nas camadas 1–2 nunca libera emissão sem consultar a camada 3
 * - falha na camada 3 propaga: o chamador adia a emissão
 */
class DeviationDeduplicator {
  private readonly tiers: DeviationLedger[];

  constructor(
    readonly memory: InMemoryDeviationLedger,
    readonly markers: PersistentDeviationLedger,
    readonly sink: AlertSinkDeviationLedger,
    private readonly logger: Logger = createLogger('dedup')
  ) {
    this.tiers = [memory, markers, sink];
  }

  async check(ref: DeviationRef, now: Date): Promise<DedupDecision> {
    for (let i = 0; i < this.tiers.length; i++) {
      const tier = this.tiers[i];
      const authoritative = i === this.tiers.length - 1;

      let hit: boolean;
      try {
        hit = await tier.has(ref);
      } catch (err) {
        if (authoritative) throw err;
        this.logger.warn({ err, tier: tier.tier, ...ref }, 'dedup tier lookup failed, falling through');
        continue;
      }

      if (hit) {
        await this.backfill(this.tiers.slice(0, i), ref, null, now);
        return { emit: false, suppressedBy: tier.tier };
      }
    }
    return { emit: true };
  }

  /**
   * Grava a emissão em todas as camadas. Falha de escrita é registrada e
   * não desfaz a emissão: a camada 1 continua protegendo o processo.
   */
  async recordEmission(ref: DeviationRef, alertId: string, now: Date): Promise<void> {
    await this.backfill(this.tiers, ref, alertId, now);
  }

  private async backfill(tiers: DeviationLedger[], ref: DeviationRef, alertId: string | null, now: Date): Promise<void> {
    for (const tier of tiers) {
      try {
        await tier.record(ref, alertId, now);
      } catch (err) {
        this.logger.error({ err, tier: tier.tier, ...ref }, 'failed to record deviation marker');
      }
    }
  }
}

export { DedupDecision, DeviationDeduplicator };
