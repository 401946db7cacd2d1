import {
  BundleElement,
  ElementCheckResult,
  ElementStatus,
  Episode,
  EpisodeStatus,
  GuidelineBundle,
  PatientContext,
  Deviation,
  TriggerMatch
} from '../entidades/tipos';
import {
  EpisodeAlreadyExistsError,
  EpisodeClosedError,
  EpisodeNotFoundError,
  InvalidTransitionError,
  errorMessage
} from '../entidades/AdherenceErrors';
import { BundleCatalog } from '../catalogo/BundleCatalog';
import { EpisodeRepository, episodeIdFor } from '../repositorios/interfaces/EpisodeRepository';
import { CheckerRegistry } from '../checkers/CheckerRegistry';
import { PatientContextBuilder } from '../contexto/PatientContextBuilder';
import { resolveApplicability } from '../contexto/ApplicabilityResolver';
import { AlertSink, NewAlert } from '../alertas/AlertSink';
import { DedupDecision, DeviationDeduplicator } from '../deduplicacao/DeviationDeduplicator';
import { DEVIATION_ALERT_KIND, LedgerTier, deviationKey } from '../deduplicacao/DeviationLedger';
import { EventLogRepository } from '../event-log/EventLogRepository';
import { ChainVerificationResult, EventActor, TipoEntidade, TipoEvento } from '../event-log/EventLogEntry';
import { EventLogRecorder, EventLogStatus } from './EventLogRecorder';
import { episodeAdherence } from '../servicos/ComplianceAggregator';
import { Logger, createLogger } from '../utilitarios/Logger';
import { deadline } from '../utilitarios/TimeWindow';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

type DeviationOutcomeKind = 'emitted' | 'suppressed' | 'deferred' | 'dry_run' | 'disabled';

interface DeviationOutcome {
  element_id: string;
  key: string;
  outcome: DeviationOutcomeKind;
  alert_id?: string;
  suppressed_by?: LedgerTier;
}

interface EpisodeEvaluation {
  episode: Episode;
  previous_status: EpisodeStatus;
  /** Elementos que saíram de PENDING neste ciclo */
  transitions: ElementCheckResult[];
  deviations: DeviationOutcome[];
  /** null quando nenhum elemento pendente exigiu contexto */
  context: PatientContext | null;
  dry_run: boolean;
  persisted: boolean;
}

interface EvaluateOptions {
  now?: Date;
  dryRun?: boolean;
  actor?: EventActor;
}

interface CycleOptions extends EvaluateOptions {
  /** Restringe a bundles específicos; padrão: todo o catálogo */
  bundleIds?: string[];
  /** Consultado antes de cada episódio; true interrompe o ciclo */
  shouldStop?: () => boolean;
}

interface CycleError {
  episode_id: string;
  error: string;
}

interface CycleReport {
  started_at: Date;
  finished_at: Date;
  dry_run: boolean;
  stopped: boolean;
  episodes_evaluated: number;
  episodes_failed: number;
  elements_resolved: number;
  deviations_emitted: number;
  deviations_suppressed: number;
  deviations_deferred: number;
  evaluations: EpisodeEvaluation[];
  errors: CycleError[];
}

interface OpenEpisodeResult {
  episode: Episode;
  created: boolean;
}

interface EpisodeEvaluatorDeps {
  catalog: BundleCatalog;
  episodes: EpisodeRepository;
  checkers: CheckerRegistry;
  contextBuilder: PatientContextBuilder;
  alerts: AlertSink;
  deduplicator: DeviationDeduplicator;
  eventLog?: EventLogRepository;
  logger?: Logger;
  clock?: () => Date;
  /** false: desvios são apenas registrados em log, sem alerta */
  alertOnDeviation?: boolean;
}

// ════════════════════════════════════════════════════════════════════════
// FUNÇÕES PURAS
// ════════════════════════════════════════════════════════════════════════

function freshResult(element: BundleElement, triggerTime: Date): ElementCheckResult {
  return {
    element_id: element.element_id,
    element_name: element.name,
    status: ElementStatus.PENDING,
    deadline: deadline(triggerTime, element.time_window_hours),
    completed_at: null,
    value: null,
    notes: ''
  };
}

/**
 * Pré-requisitos (depends_on) antes dos dependentes; ordem do bundle nos empates.
 */
function evaluationOrder(bundle: GuidelineBundle): BundleElement[] {
  const byId = new Map(bundle.elements.map(e => [e.element_id, e]));
  const depth = (element: BundleElement, seen: Set<string>): number => {
    const dep = element.depends_on;
    if (!dep || seen.has(element.element_id)) return 0;
    const parent = byId.get(dep.element_id);
    if (!parent) return 0;
    return 1 + depth(parent, new Set(seen).add(element.element_id));
  };
  return bundle.elements
    .map((element, index) => ({ element, index, depth: depth(element, new Set()) }))
    .sort((a, b) => a.depth - b.depth || a.index - b.index)
    .map(x => x.element);
}

function statusFor(results: readonly ElementCheckResult[]): EpisodeStatus {
  return results.some(r => r.status === ElementStatus.PENDING) ? EpisodeStatus.ACTIVE : EpisodeStatus.COMPLETE;
}

function defaultRecommendation(element: BundleElement): string {
  return `${element.name} not completed within required timeframe. Review and document completion or clinical rationale.`;
}

function buildDeviation(bundle: GuidelineBundle, element: BundleElement, episode: Episode, result: ElementCheckResult): Deviation {
  return {
    key: deviationKey(episode.id, element.element_id),
    episode_id: episode.id,
    element_id: element.element_id,
    severity: element.severity,
    title: `Guideline Deviation: ${element.name}`,
    summary: `${bundle.name}: ${element.name} not completed within required timeframe`,
    recommendation: `${bundle.name}: ${element.recommendation ?? defaultRecommendation(element)}`,
    result
  };
}

function patientRef(episode: Episode): string {
  return episode.patient_mrn ?? episode.patient_id;
}

function deviationAlert(bundle: GuidelineBundle, element: BundleElement, episode: Episode, deviation: Deviation): NewAlert {
  return {
    kind: DEVIATION_ALERT_KIND,
    source_id: deviation.key,
    severity: deviation.severity,
    patient_ref: patientRef(episode),
    title: deviation.title,
    summary: deviation.summary,
    content: {
      bundle_id: bundle.bundle_id,
      bundle_name: bundle.name,
      trigger_time: episode.trigger_time.toISOString(),
      element_id: element.element_id,
      element_name: element.name,
      window_hours: element.time_window_hours,
      window_expiry: deviation.result.deadline?.toISOString() ?? null,
      status: deviation.result.status,
      recommendation: deviation.recommendation,
      overall_adherence_percentage: episodeAdherence(episode).overall_adherence_percentage,
      episode_id: episode.id,
      patient_ref: patientRef(episode)
    }
  };
}

// ════════════════════════════════════════════════════════════════════════
// AVALIADOR
// ════════════════════════════════════════════════════════════════════════

/**
 * Avaliador de episódios.
 *
 * PRINCÍPIOS:
 * - único escritor de Episode e ElementCheckResult
 * - estados terminais nunca são revisitados
 * - reavaliação com a mesma evidência e o mesmo instante não muda nada
 * - falha em um episódio não interrompe o ciclo
 * - alerta de desvio só sai depois do deduplicador
 */
class EpisodeEvaluator {
  private readonly catalog: BundleCatalog;
  private readonly episodes: EpisodeRepository;
  private readonly checkers: CheckerRegistry;
  private readonly contextBuilder: PatientContextBuilder;
  private readonly alerts: AlertSink;
  private readonly deduplicator: DeviationDeduplicator;
  private readonly events: EventLogRecorder;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly alertOnDeviation: boolean;

  constructor(deps: EpisodeEvaluatorDeps) {
    this.catalog = deps.catalog;
    this.episodes = deps.episodes;
    this.checkers = deps.checkers;
    this.contextBuilder = deps.contextBuilder;
    this.alerts = deps.alerts;
    this.deduplicator = deps.deduplicator;
    this.logger = deps.logger ?? createLogger('evaluator');
    this.events = new EventLogRecorder(deps.eventLog, this.logger);
    this.clock = deps.clock ?? (() => new Date());
    this.alertOnDeviation = deps.alertOnDeviation ?? true;
  }

  /**
   * Verifica a cadeia do event log; nunca bloqueia.
   */
  async init(): Promise<void> {
    await this.events.init();
  }

  getEventLogStatus(): EventLogStatus {
    return this.events.getStatus();
  }

  async verifyEventLog(): Promise<ChainVerificationResult> {
    return this.events.verifyNow();
  }

  // ──────────────────────────────────────────────────────────────────────
  // ABERTURA E ENCERRAMENTO
  // ──────────────────────────────────────────────────────────────────────

  /**
   * Abre (ou reencontra) o episódio da identidade (paciente, encontro, bundle).
   * Um episódio existente mantém o relógio; só age_days ausente é preenchido.
   *
   * @throws BundleNotFoundError
   */
  async openEpisode(bundleId: string, match: TriggerMatch, actor: EventActor = 'monitor'): Promise<OpenEpisodeResult> {
    const bundle = this.catalog.require(bundleId);
    const existing = await this.episodes.getByIdentity(match.patient_id, match.encounter_id, bundleId);
    if (existing) {
      return { episode: await this.fillAgeDays(existing, match), created: false };
    }

    const now = this.clock();
    const episode: Episode = {
      id: episodeIdFor(match.patient_id, match.encounter_id, bundleId),
      patient_id: match.patient_id,
      encounter_id: match.encounter_id,
      bundle_id: bundle.bundle_id,
      bundle_name: bundle.name,
      trigger_time: match.onset_time,
      age_days: match.age_days ?? null,
      patient_mrn: match.mrn ?? null,
      status: EpisodeStatus.ACTIVE,
      element_results: bundle.elements.map(e => freshResult(e, match.onset_time)),
      undelivered_deviations: [],
      created_at: now,
      updated_at: now,
      last_evaluated_at: null,
      closed_at: null,
      close_reason: null
    };

    try {
      await this.episodes.create(episode);
    } catch (error) {
      if (!(error instanceof EpisodeAlreadyExistsError)) throw error;
      const raced = await this.episodes.getById(episode.id);
      if (!raced) throw error;
      return { episode: raced, created: false };
    }

    this.logger.info({ episode_id: episode.id, bundle_id: bundleId }, 'episode opened');
    await this.events.record(actor, TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, episode.id, episode);
    return { episode, created: true };
  }

  private async fillAgeDays(existing: Episode, match: TriggerMatch): Promise<Episode> {
    if (existing.age_days !== null || match.age_days === undefined || match.age_days === null) {
      return existing;
    }
    const updated: Episode = { ...existing, age_days: match.age_days, updated_at: this.clock() };
    await this.episodes.save(updated);
    return updated;
  }

  /**
   * @throws EpisodeNotFoundError
   * @throws InvalidTransitionError se já estiver CLOSED
   */
  async closeEpisode(episodeId: string, reason: string, actor: EventActor = 'gateway'): Promise<Episode> {
    const episode = await this.episodes.getById(episodeId);
    if (!episode) {
      throw new EpisodeNotFoundError(episodeId);
    }
    if (episode.status === EpisodeStatus.CLOSED) {
      throw new InvalidTransitionError('Episode', episodeId, EpisodeStatus.CLOSED, EpisodeStatus.CLOSED);
    }

    const now = this.clock();
    const closed: Episode = {
      ...episode,
      status: EpisodeStatus.CLOSED,
      closed_at: now,
      close_reason: reason,
      updated_at: now
    };
    await this.episodes.save(closed);

    this.logger.info({ episode_id: episodeId, reason }, 'episode closed');
    await this.events.record(actor, TipoEvento.EPISODE_CLOSED, TipoEntidade.EPISODE, episodeId, {
      previous_status: episode.status,
      reason
    });
    return closed;
  }

  // ──────────────────────────────────────────────────────────────────────
  // AVALIAÇÃO
  // ──────────────────────────────────────────────────────────────────────

  /**
   * @throws EpisodeNotFoundError
   * @throws EpisodeClosedError
   */
  async evaluateEpisode(episodeId: string, options: EvaluateOptions = {}): Promise<EpisodeEvaluation> {
    const episode = await this.episodes.getById(episodeId);
    if (!episode) {
      throw new EpisodeNotFoundError(episodeId);
    }
    return this.evaluate(episode, options);
  }

  /**
   * Um ciclo: episódios ACTIVE mais os que têm alertas pendentes de entrega.
   */
  async runCycle(options: CycleOptions = {}): Promise<CycleReport> {
    const startedAt = options.now ?? this.clock();
    const dryRun = options.dryRun ?? false;
    const bundleIds = options.bundleIds ?? this.catalog.list().map(b => b.bundle_id);

    const report: CycleReport = {
      started_at: startedAt,
      finished_at: startedAt,
      dry_run: dryRun,
      stopped: false,
      episodes_evaluated: 0,
      episodes_failed: 0,
      elements_resolved: 0,
      deviations_emitted: 0,
      deviations_suppressed: 0,
      deviations_deferred: 0,
      evaluations: [],
      errors: []
    };

    for (const episode of await this.cycleEpisodes(bundleIds)) {
      if (options.shouldStop?.()) {
        report.stopped = true;
        break;
      }

      try {
        const evaluation = await this.evaluate(episode, {
          now: options.now ?? this.clock(),
          dryRun,
          actor: options.actor
        });
        report.episodes_evaluated++;
        report.elements_resolved += evaluation.transitions.length;
        for (const d of evaluation.deviations) {
          if (d.outcome === 'emitted') report.deviations_emitted++;
          if (d.outcome === 'suppressed') report.deviations_suppressed++;
          if (d.outcome === 'deferred') report.deviations_deferred++;
        }
        report.evaluations.push(evaluation);
      } catch (error) {
        report.episodes_failed++;
        report.errors.push({ episode_id: episode.id, error: errorMessage(error) });
        this.logger.error({ err: error, episode_id: episode.id }, 'episode evaluation failed');
      }
    }

    report.finished_at = this.clock();
    this.logger.info(
      {
        evaluated: report.episodes_evaluated,
        failed: report.episodes_failed,
        resolved: report.elements_resolved,
        emitted: report.deviations_emitted,
        dry_run: dryRun
      },
      'evaluation cycle finished'
    );
    return report;
  }

  private async cycleEpisodes(bundleIds: string[]): Promise<Episode[]> {
    const wanted = new Set(bundleIds);
    const active = await this.episodes.listByStatus([EpisodeStatus.ACTIVE]);
    const retry = await this.episodes.listWithUndeliveredDeviations();

    const seen = new Set<string>();
    const result: Episode[] = [];
    for (const e of [...active, ...retry]) {
      if (seen.has(e.id) || !wanted.has(e.bundle_id) || e.status === EpisodeStatus.CLOSED) continue;
      seen.add(e.id);
      result.push(e);
    }
    return result;
  }

  private async evaluate(episode: Episode, options: EvaluateOptions): Promise<EpisodeEvaluation> {
    if (episode.status === EpisodeStatus.CLOSED) {
      throw new EpisodeClosedError(episode.id);
    }

    const now = options.now ?? this.clock();
    const dryRun = options.dryRun ?? false;
    const actor = options.actor ?? 'monitor';
    const bundle = this.catalog.require(episode.bundle_id);

    const { results, transitions, context } = await this.assess(bundle, episode, now);

    const updated: Episode = {
      ...episode,
      element_results: results,
      status: statusFor(results),
      updated_at: now,
      last_evaluated_at: now
    };

    const candidates = this.deviationCandidates(bundle, episode, transitions);

    if (dryRun) {
      return {
        episode: updated,
        previous_status: episode.status,
        transitions,
        deviations: candidates.map(id => ({ element_id: id, key: deviationKey(episode.id, id), outcome: 'dry_run' })),
        context,
        dry_run: true,
        persisted: false
      };
    }

    let persisted = await this.persist(updated);
    await this.recordTransitions(actor, episode, updated, transitions);

    const deviations = await this.deliver(bundle, updated, candidates, now, actor);
    const undelivered = deviations.filter(d => d.outcome === 'deferred').map(d => d.element_id);
    if (!sameIds(undelivered, episode.undelivered_deviations)) {
      updated.undelivered_deviations = undelivered;
      persisted = (await this.persist(updated)) && persisted;
    }

    return {
      episode: updated,
      previous_status: episode.status,
      transitions,
      deviations,
      context,
      dry_run: false,
      persisted
    };
  }

  /**
   * Executa a máquina de estados sobre os elementos ainda PENDING.
   * O contexto do paciente só é montado se houver algo pendente.
   */
  private async assess(
    bundle: GuidelineBundle,
    episode: Episode,
    now: Date
  ): Promise<{ results: ElementCheckResult[]; transitions: ElementCheckResult[]; context: PatientContext | null }> {
    const current = new Map(episode.element_results.map(r => [r.element_id, r]));
    for (const element of bundle.elements) {
      if (!current.has(element.element_id)) {
        current.set(element.element_id, freshResult(element, episode.trigger_time));
      }
    }

    const anyPending = Array.from(current.values()).some(r => r.status === ElementStatus.PENDING);
    const context = anyPending ? await this.contextBuilder.build(episode) : null;
    const transitions: ElementCheckResult[] = [];

    if (context) {
      for (const element of evaluationOrder(bundle)) {
        const before = current.get(element.element_id);
        if (!before || before.status !== ElementStatus.PENDING) continue;

        const after = await this.resolveElement(bundle, element, episode, context, current, before, now);
        current.set(element.element_id, after);
        if (after.status !== ElementStatus.PENDING) {
          transitions.push(after);
        }
      }
    }

    // Ordem de exibição: resultados existentes e depois elementos novos do bundle
    const ordered = [
      ...episode.element_results.map(r => current.get(r.element_id) ?? r),
      ...bundle.elements
        .filter(e => !episode.element_results.some(r => r.element_id === e.element_id))
        .map(e => current.get(e.element_id) ?? freshResult(e, episode.trigger_time))
    ];
    return { results: ordered, transitions, context };
  }

  private async resolveElement(
    bundle: GuidelineBundle,
    element: BundleElement,
    episode: Episode,
    context: PatientContext,
    results: ReadonlyMap<string, ElementCheckResult>,
    before: ElementCheckResult,
    now: Date
  ): Promise<ElementCheckResult> {
    const base: ElementCheckResult = {
      ...before,
      element_name: element.name,
      deadline: deadline(episode.trigger_time, element.time_window_hours)
    };

    const applicability = resolveApplicability(bundle, element, context, results);
    switch (applicability.kind) {
      case 'not_applicable':
        return { ...base, status: ElementStatus.NOT_APPLICABLE, completed_at: null, value: null, notes: applicability.notes };
      case 'undecidable':
        return { ...base, status: ElementStatus.PENDING, completed_at: null, value: null, notes: applicability.notes };
      case 'applicable':
        break;
    }

    const prerequisite = element.depends_on ? results.get(element.depends_on.element_id) ?? null : null;
    const outcome = await this.checkers.resolve(element.data_source).check({
      bundle,
      element,
      episode,
      context,
      now,
      prerequisite
    });
    return { ...base, ...outcome };
  }

  /**
   * Elementos obrigatórios que viraram NOT_MET agora, mais os que falharam antes.
   */
  private deviationCandidates(bundle: GuidelineBundle, episode: Episode, transitions: ElementCheckResult[]): string[] {
    const required = new Set(bundle.elements.filter(e => e.required).map(e => e.element_id));
    const fresh = transitions
      .filter(r => r.status === ElementStatus.NOT_MET && required.has(r.element_id))
      .map(r => r.element_id);
    return Array.from(new Set([...episode.undelivered_deviations, ...fresh]));
  }

  private async persist(episode: Episode): Promise<boolean> {
    try {
      await this.episodes.save(episode);
      return true;
    } catch (error) {
      this.logger.error({ err: error, episode_id: episode.id }, 'failed to persist episode state');
      return false;
    }
  }

  private async recordTransitions(
    actor: EventActor,
    before: Episode,
    after: Episode,
    transitions: ElementCheckResult[]
  ): Promise<void> {
    for (const result of transitions) {
      await this.events.record(actor, TipoEvento.ELEMENT_RESOLVED, TipoEntidade.ELEMENT, `${after.id}/${result.element_id}`, result);
    }
    if (before.status !== after.status) {
      await this.events.record(actor, TipoEvento.EPISODE_STATUS_CHANGED, TipoEntidade.EPISODE, after.id, {
        from: before.status,
        to: after.status
      });
    }
  }

  // ──────────────────────────────────────────────────────────────────────
  // ENTREGA DE DESVIOS
  // ──────────────────────────────────────────────────────────────────────

  private async deliver(
    bundle: GuidelineBundle,
    episode: Episode,
    elementIds: string[],
    now: Date,
    actor: EventActor
  ): Promise<DeviationOutcome[]> {
    const outcomes: DeviationOutcome[] = [];

    for (const elementId of elementIds) {
      const element = bundle.elements.find(e => e.element_id === elementId);
      const result = episode.element_results.find(r => r.element_id === elementId);
      const key = deviationKey(episode.id, elementId);
      if (!element || !result || result.status !== ElementStatus.NOT_MET) {
        this.logger.warn({ episode_id: episode.id, element_id: elementId }, 'dropping undeliverable deviation');
        continue;
      }

      if (!this.alertOnDeviation) {
        this.logger.info({ episode_id: episode.id, element_id: elementId }, 'deviation detected; alerting disabled');
        outcomes.push({ element_id: elementId, key, outcome: 'disabled' });
        continue;
      }

      outcomes.push(await this.deliverOne(bundle, element, episode, result, now, actor));
    }

    return outcomes;
  }

  private async deliverOne(
    bundle: GuidelineBundle,
    element: BundleElement,
    episode: Episode,
    result: ElementCheckResult,
    now: Date,
    actor: EventActor
  ): Promise<DeviationOutcome> {
    const ref = { episode_id: episode.id, element_id: element.element_id };
    const deviation = buildDeviation(bundle, element, episode, result);
    const deferred: DeviationOutcome = { element_id: element.element_id, key: deviation.key, outcome: 'deferred' };

    let decision: DedupDecision;
    try {
      decision = await this.deduplicator.check(ref, now);
    } catch (error) {
      this.logger.warn({ err: error, ...ref }, 'alert sink unavailable; deferring deviation');
      return deferred;
    }

    if (!decision.emit) {
      await this.events.record(actor, TipoEvento.DEVIATION_SUPPRESSED, TipoEntidade.DEVIATION, deviation.key, {
        suppressed_by: decision.suppressedBy
      });
      return { element_id: element.element_id, key: deviation.key, outcome: 'suppressed', suppressed_by: decision.suppressedBy };
    }

    let alertId: string;
    try {
      alertId = await this.alerts.saveAlert(deviationAlert(bundle, element, episode, deviation));
    } catch (error) {
      this.logger.error({ err: error, ...ref }, 'failed to save deviation alert; will retry next cycle');
      return deferred;
    }

    await this.deduplicator.recordEmission(ref, alertId, now);

    try {
      await this.alerts.markSent(alertId);
    } catch (error) {
      this.logger.warn({ err: error, alert_id: alertId, ...ref }, 'failed to mark alert as sent');
    }

    this.logger.warn(
      { episode_id: episode.id, element_id: element.element_id, alert_id: alertId, severity: deviation.severity },
      deviation.title
    );
    await this.events.record(actor, TipoEvento.DEVIATION_EMITTED, TipoEntidade.DEVIATION, deviation.key, {
      alert_id: alertId,
      severity: deviation.severity,
      title: deviation.title
    });
    return { element_id: element.element_id, key: deviation.key, outcome: 'emitted', alert_id: alertId };
  }
}

function sameIds(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every(id => b.includes(id));
}

export {
  DeviationOutcomeKind,
  DeviationOutcome,
  EpisodeEvaluation,
  EvaluateOptions,
  CycleOptions,
  CycleError,
  CycleReport,
  OpenEpisodeResult,
  EpisodeEvaluatorDeps,
  EpisodeEvaluator,
  evaluationOrder,
  buildDeviation,
  deviationAlert
};
