import { BundleCatalog } from '../catalogo/BundleCatalog';
import { Logger, createLogger } from '../utilitarios/Logger';
import { addHours } from '../utilitarios/TimeWindow';
import { CycleReport, EpisodeEvaluator } from './EpisodeEvaluator';
import { CHECK_INTERVAL_MINUTES } from './MonitorConfig';
import { TriggerFinder } from './TriggerFinder';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface MonitorRunnerOptions {
  evaluator: EpisodeEvaluator;
  catalog: BundleCatalog;
  triggerFinder?: TriggerFinder;
  intervalMinutes?: number;
  /** Restringe a bundles específicos; padrão: todo o catálogo */
  bundleIds?: string[];
  /** Avalia sem persistir, sem alertar e sem abrir episódios */
  dryRun?: boolean;
  /** Janela de busca de triggers (default: 72h) */
  triggerLookbackHours?: number;
  logger?: Logger;
  clock?: () => Date;
}

interface RunnerCycleResult {
  triggers_found: number;
  episodes_opened: number;
  trigger_errors: number;
  report: CycleReport;
}

interface RunnerStatus {
  running: boolean;
  cycle_in_progress: boolean;
  cycles_completed: number;
  last_cycle_at: Date | null;
  next_run_at: Date | null;
  interval_minutes: number;
}

const TRIGGER_LOOKBACK_HOURS = 72;

// ════════════════════════════════════════════════════════════════════════
// RUNNER
// ════════════════════════════════════════════════════════════════════════

/**
 * Executa ciclos uma vez ou em intervalo fixo.
 *
 * INVARIANTES:
 * - ciclos nunca se sobrepõem
 * - stop() deixa o episódio atual terminar e impede o próximo
 * - falha de um ciclo é registrada e o intervalo continua
 */
class MonitorRunner {
  private readonly evaluator: EpisodeEvaluator;
  private readonly catalog: BundleCatalog;
  private readonly triggerFinder?: TriggerFinder;
  private readonly intervalMinutes: number;
  private readonly bundleIds?: string[];
  private readonly dryRun: boolean;
  private readonly lookbackHours: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private inFlight: Promise<RunnerCycleResult> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopRequested = false;
  private cyclesCompleted = 0;
  private lastCycleAt: Date | null = null;
  private nextRunAt: Date | null = null;

  constructor(options: MonitorRunnerOptions) {
    this.evaluator = options.evaluator;
    this.catalog = options.catalog;
    this.triggerFinder = options.triggerFinder;
    this.intervalMinutes = options.intervalMinutes ?? CHECK_INTERVAL_MINUTES;
    this.bundleIds = options.bundleIds;
    this.dryRun = options.dryRun ?? false;
    this.lookbackHours = options.triggerLookbackHours ?? TRIGGER_LOOKBACK_HOURS;
    this.logger = options.logger ?? createLogger('runner');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Um ciclo. Chamada durante um ciclo em andamento devolve o mesmo ciclo.
   */
  runOnce(): Promise<RunnerCycleResult> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Modo daemon: roda agora e depois a cada intervalo.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopRequested = false;
    this.logger.info({ interval_minutes: this.intervalMinutes, dry_run: this.dryRun }, 'monitor started');
    this.tick();
  }

  async stop(): Promise<void> {
    this.stopRequested = true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
    if (this.inFlight) {
      await this.inFlight.catch(err => {
        this.logger.warn({ err }, 'cycle in progress failed while stopping');
      });
    }
    this.logger.info({ cycles_completed: this.cyclesCompleted }, 'monitor stopped');
  }

  getStatus(): RunnerStatus {
    return {
      running: this.running,
      cycle_in_progress: this.inFlight !== null,
      cycles_completed: this.cyclesCompleted,
      last_cycle_at: this.lastCycleAt,
      next_run_at: this.nextRunAt,
      interval_minutes: this.intervalMinutes
    };
  }

  private tick(): void {
    this.runOnce()
      .catch(err => {
        this.logger.error({ err }, 'monitor cycle failed');
      })
      .finally(() => this.schedule());
  }

  private schedule(): void {
    if (!this.running || this.stopRequested) return;
    const delayMs = this.intervalMinutes * 60_000;
    this.nextRunAt = new Date(this.clock().getTime() + delayMs);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
    }, delayMs);
  }

  private async cycle(): Promise<RunnerCycleResult> {
    const now = this.clock();
    const bundles = this.bundleIds
      ? this.bundleIds.map(id => this.catalog.require(id))
      : this.catalog.list();

    let triggersFound = 0;
    let opened = 0;
    let triggerErrors = 0;

    if (this.triggerFinder) {
      const since = addHours(now, -this.lookbackHours);
      for (const bundle of bundles) {
        if (this.stopRequested) break;
        try {
          const matches = await this.triggerFinder.findTriggers(bundle, since);
          triggersFound += matches.length;
          if (this.dryRun) continue;

          for (const match of matches) {
            try {
              const { created } = await this.evaluator.openEpisode(bundle.bundle_id, match);
              if (created) opened++;
            } catch (err) {
              triggerErrors++;
              this.logger.error({ err, bundle_id: bundle.bundle_id, patient_id: match.patient_id }, 'failed to open episode');
            }
          }
        } catch (err) {
          triggerErrors++;
          this.logger.error({ err, bundle_id: bundle.bundle_id }, 'trigger finder failed');
        }
      }
    }

    const report = await this.evaluator.runCycle({
      now,
      dryRun: this.dryRun,
      bundleIds: bundles.map(b => b.bundle_id),
      shouldStop: () => this.stopRequested
    });

    this.cyclesCompleted++;
    this.lastCycleAt = now;

    return {
      triggers_found: triggersFound,
      episodes_opened: opened,
      trigger_errors: triggerErrors,
      report
    };
  }
}

export { MonitorRunnerOptions, RunnerCycleResult, RunnerStatus, TRIGGER_LOOKBACK_HOURS, MonitorRunner };
