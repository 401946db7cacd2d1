/**
 * Contrato e base comum dos verificadores de elemento.
 *
 * Um verificador decide um único ElementCheckResult a partir da definição
 * do elemento, do episódio e do instante de avaliação. Aplicabilidade já
 * foi resolvida antes da chamada.
 *
 * INVARIANTES:
 * - evidência só conta se datada entre o trigger e o prazo (inclusivo)
 * - sem evidência: PENDING dentro da janela, NOT_MET depois
 * - falha da fonte de evidência = sem evidência; nunca lança
 */

import {
  BundleElement,
  ElementCheckResult,
  ElementStatus,
  Episode,
  EvidenceValue,
  GuidelineBundle,
  PatientContext
} from '../entidades/tipos';
import { EvidenceSource } from '../evidencia/EvidenceSource';
import { Logger } from '../utilitarios/Logger';
import { deadline, withinWindow } from '../utilitarios/TimeWindow';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

type EpisodeRef = Pick<Episode, 'id' | 'patient_id' | 'encounter_id' | 'trigger_time'>;

interface CheckRequest {
  bundle: GuidelineBundle;
  element: BundleElement;
  episode: EpisodeRef;
  context: PatientContext;
  now: Date;
  /** Resultado atual do elemento em depends_on, quando houver */
  prerequisite: ElementCheckResult | null;
}

interface CheckOutcome {
  status: ElementStatus;
  completed_at: Date | null;
  value: EvidenceValue;
  notes: string;
}

/**
 * Evidência qualificadora encontrada por um verificador.
 */
interface Completion {
  at: Date;
  value: EvidenceValue;
  notes: string;
}

interface ElementChecker {
  check(request: CheckRequest): Promise<CheckOutcome>;
}

// ════════════════════════════════════════════════════════════════════════════
// BASE
// ════════════════════════════════════════════════════════════════════════════

abstract class BaseElementChecker implements ElementChecker {
  constructor(
    protected readonly evidence: EvidenceSource,
    protected readonly logger: Logger
  ) {}

  abstract check(request: CheckRequest): Promise<CheckOutcome>;

  protected deadlineOf(request: CheckRequest, windowHours = request.element.time_window_hours): Date | null {
    return deadline(request.episode.trigger_time, windowHours);
  }

  /**
   * Consulta a fonte de evidência; falha vira lista vazia com warn.
   */
  protected async safely<T>(request: CheckRequest, query: string, fetch: () => Promise<T[]>): Promise<T[]> {
    try {
      return await fetch();
    } catch (err) {
      this.logger.warn(
        { err, episode_id: request.episode.id, element_id: request.element.element_id, query },
        'evidence query failed; treating as no evidence'
      );
      return [];
    }
  }

  /**
   * Decisão final: MET com a evidência, ou PENDING/NOT_MET pela janela.
   */
  protected conclude(
    request: CheckRequest,
    completion: Completion | null,
    missing: string,
    windowHours = request.element.time_window_hours
  ): CheckOutcome {
    if (completion) {
      return met(completion);
    }
    if (withinWindow(request.now, request.episode.trigger_time, windowHours)) {
      return pending(`Awaiting ${missing}`);
    }
    return notMet(`No ${missing} within ${windowHours}h window`);
  }
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

function met(completion: Completion): CheckOutcome {
  return {
    status: ElementStatus.MET,
    completed_at: completion.at,
    value: completion.value,
    notes: completion.notes
  };
}

function pending(notes: string): CheckOutcome {
  return { status: ElementStatus.PENDING, completed_at: null, value: null, notes };
}

function notMet(notes: string): CheckOutcome {
  return { status: ElementStatus.NOT_MET, completed_at: null, value: null, notes };
}

function notApplicable(notes: string): CheckOutcome {
  return { status: ElementStatus.NOT_APPLICABLE, completed_at: null, value: null, notes };
}

/**
 * Casamento por palavra inteira, sem distinção de caixa.
 */
function containsTerm(haystack: string, term: string): boolean {
  const escaped = term.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(haystack.toLowerCase());
}

function findTerm(haystack: string, terms: readonly string[]): string | null {
  return terms.find(t => containsTerm(haystack, t)) ?? null;
}

/**
 * Converte texto numérico em number; mantém o texto caso contrário.
 */
function normalizeValue(value: EvidenceValue): EvidenceValue {
  if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    return Number(value);
  }
  return value;
}

export {
  EpisodeRef,
  CheckRequest,
  CheckOutcome,
  Completion,
  ElementChecker,
  BaseElementChecker,
  met,
  pending,
  notMet,
  notApplicable,
  containsTerm,
  findTerm,
  normalizeValue
};
