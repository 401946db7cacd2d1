import { EpisodeRepository } from '../repositorios/interfaces/EpisodeRepository';
import { BundleCatalog } from '../catalogo/BundleCatalog';
import { ElementCheckResult, ElementStatus, Episode, EpisodeStatus } from '../entidades/tipos';
import { MS_PER_DAY } from '../utilitarios/TimeWindow';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

type AdherenceLevel = 'full' | 'partial' | 'low';

interface StatusCounts {
  total: number;
  met: number;
  not_met: number;
  pending: number;
  not_applicable: number;
}

interface EpisodeAdherence extends StatusCounts {
  applicable: number;
  /** met / (met + not_met): desempenho entre elementos já decididos */
  adherence_percentage: number;
  /** met / aplicáveis: pendentes contam como ainda não cumpridos */
  overall_adherence_percentage: number;
  adherence_level: AdherenceLevel;
}

interface ElementCompliance {
  element_id: string;
  name: string;
  met: number;
  not_met: number;
  pending: number;
  not_applicable: number;
  compliance_rate: number | null;
}

interface BundleComplianceReport {
  bundle_id: string;
  bundle_name: string;
  window_days: number;
  from: Date;
  to: Date;
  total_episodes: number;
  by_status: Record<EpisodeStatus, number>;
  elements: ElementCompliance[];
  mean_adherence_percentage: number | null;
}

const DEFAULT_COMPLIANCE_DAYS = 30;

// ════════════════════════════════════════════════════════════════════════
// CÁLCULOS PUROS
// ════════════════════════════════════════════════════════════════════════

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function countStatuses(results: readonly ElementCheckResult[]): StatusCounts {
  const counts: StatusCounts = { total: results.length, met: 0, not_met: 0, pending: 0, not_applicable: 0 };
  for (const r of results) {
    switch (r.status) {
      case ElementStatus.MET: counts.met++; break;
      case ElementStatus.NOT_MET: counts.not_met++; break;
      case ElementStatus.PENDING: counts.pending++; break;
      case ElementStatus.NOT_APPLICABLE: counts.not_applicable++; break;
    }
  }
  return counts;
}

function adherenceLevel(percentage: number): AdherenceLevel {
  if (percentage >= 100) return 'full';
  if (percentage > 50) return 'partial';
  return 'low';
}

/**
 * As duas taxas do episódio. Sem decididos: 100; sem aplicáveis: ambas 100.
 */
function episodeAdherence(episode: Pick<Episode, 'element_results'>): EpisodeAdherence {
  const counts = countStatuses(episode.element_results);
  const decided = counts.met + counts.not_met;
  const applicable = counts.total - counts.not_applicable;

  const adherence = decided === 0 ? 100 : round1((counts.met / decided) * 100);
  const overall = applicable === 0 ? 100 : round1((counts.met / applicable) * 100);

  return {
    ...counts,
    applicable,
    adherence_percentage: adherence,
    overall_adherence_percentage: overall,
    adherence_level: adherenceLevel(adherence)
  };
}

// ════════════════════════════════════════════════════════════════════════
// SERVIÇO
// ════════════════════════════════════════════════════════════════════════

/**
 * Agregação de conformidade sobre o histórico de episódios.
 *
 * PRINCÍPIOS:
 * - somente leitura
 * - pendentes nunca entram na taxa por elemento
 */
class ComplianceAggregator {
  constructor(
    private readonly episodes: EpisodeRepository,
    private readonly catalog: BundleCatalog,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Episódios cujo trigger cai em [now - days, now].
   *
   * @throws BundleNotFoundError
   */
  async bundleCompliance(
    bundleId: string,
    days: number = DEFAULT_COMPLIANCE_DAYS,
    now: Date = this.clock()
  ): Promise<BundleComplianceReport> {
    const bundle = this.catalog.require(bundleId);
    const from = new Date(now.getTime() - days * MS_PER_DAY);
    const { episodes } = await this.episodes.find({ bundle_id: bundleId, trigger_from: from, trigger_to: now });

    const byStatus: Record<EpisodeStatus, number> = {
      [EpisodeStatus.ACTIVE]: 0,
      [EpisodeStatus.COMPLETE]: 0,
      [EpisodeStatus.CLOSED]: 0
    };
    for (const e of episodes) {
      byStatus[e.status]++;
    }

    const elements = bundle.elements.map((element): ElementCompliance => {
      const results = episodes
        .map(e => e.element_results.find(r => r.element_id === element.element_id))
        .filter((r): r is ElementCheckResult => r !== undefined);
      const counts = countStatuses(results);
      const decided = counts.met + counts.not_met;
      return {
        element_id: element.element_id,
        name: element.name,
        met: counts.met,
        not_met: counts.not_met,
        pending: counts.pending,
        not_applicable: counts.not_applicable,
        compliance_rate: decided === 0 ? null : round1((counts.met / decided) * 100)
      };
    });

    const adherences = episodes.map(e => episodeAdherence(e).adherence_percentage);
    const mean = adherences.length === 0
      ? null
      : round1(adherences.reduce((sum, v) => sum + v, 0) / adherences.length);

    return {
      bundle_id: bundle.bundle_id,
      bundle_name: bundle.name,
      window_days: days,
      from,
      to: now,
      total_episodes: episodes.length,
      by_status: byStatus,
      elements,
      mean_adherence_percentage: mean
    };
  }
}

export {
  AdherenceLevel,
  StatusCounts,
  EpisodeAdherence,
  ElementCompliance,
  BundleComplianceReport,
  DEFAULT_COMPLIANCE_DAYS,
  round1,
  countStatuses,
  adherenceLevel,
  episodeAdherence,
  ComplianceAggregator
};
