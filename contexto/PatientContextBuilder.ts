/**
 * Construção do PatientContext.
 *
 * Recalculado a cada ciclo: a evidência cresce com o tempo. Ausência de
 * resultado nunca é tratada como anormal, e falha da fonte deixa a flag
 * correspondente em false.
 */

import { AgeGroup, Episode, LabResult, PatientContext } from '../entidades/tipos';
import { EvidenceSource } from '../evidencia/EvidenceSource';
import { Logger, createLogger } from '../utilitarios/Logger';
import { wholeDaysBetween } from '../utilitarios/TimeWindow';

// ════════════════════════════════════════════════════════════════════════════
// CÓDIGOS E LIMIARES
// ════════════════════════════════════════════════════════════════════════════

const LOINC = {
  PROCALCITONIN: '33959-8',
  CRP: '1988-5',
  ANC: '751-8',
  UA_WBC: '5821-4',
  UA_LEUKOCYTE_ESTERASE: '5799-2',
  CSF_WBC: '806-0',
  CSF_RBC: '804-5'
} as const;

const THRESHOLDS = {
  PROCALCITONIN_NG_ML: 0.5,
  ANC_PER_UL: 4000,
  CRP_MG_DL: 2.0,
  UA_WBC_PER_HPF: 5
} as const;

const LE_POSITIVE = ['positive', 'pos', '+', '++', '+++'];

type EpisodeFacts = Pick<Episode, 'id' | 'patient_id' | 'encounter_id' | 'trigger_time' | 'age_days'>;

// ════════════════════════════════════════════════════════════════════════════
// FUNÇÕES PURAS
// ════════════════════════════════════════════════════════════════════════════

function ageGroupFor(ageDays: number | null): AgeGroup {
  if (ageDays === null || ageDays < 0) return AgeGroup.UNKNOWN;
  if (ageDays <= 7) return AgeGroup.DAYS_0_7;
  if (ageDays <= 21) return AgeGroup.DAYS_8_21;
  if (ageDays <= 28) return AgeGroup.DAYS_22_28;
  if (ageDays <= 60) return AgeGroup.DAYS_29_60;
  return AgeGroup.UNKNOWN;
}

function numericValue(result: LabResult): number | null {
  const value = typeof result.value === 'number' ? result.value : Number(result.value);
  return result.value !== null && Number.isFinite(value) ? value : null;
}

/**
 * ANC em células/µL; aceita laudos em 10^3/µL.
 */
function ancPerMicroliter(result: LabResult): number | null {
  const value = numericValue(result);
  if (value === null) return null;
  const unit = (result.unit ?? '').toLowerCase().replace(/\s/g, '');
  const thousands = unit.includes('10*3') || unit.includes('10^3') || unit.startsWith('k/');
  return thousands ? value * 1000 : value;
}

function isLeukocyteEsterasePositive(result: LabResult): boolean {
  if (typeof result.value === 'number') return result.value > 0;
  if (typeof result.value !== 'string') return false;
  const normalized = result.value.trim().toLowerCase();
  if (LE_POSITIVE.includes(normalized)) return true;
  const numeric = Number(normalized);
  return normalized.length > 0 && Number.isFinite(numeric) && numeric > 0;
}

function inflammatoryMarkersAbnormal(labs: LabResult[]): boolean {
  return labs.some(lab => {
    switch (lab.code) {
      case LOINC.PROCALCITONIN: {
        const v = numericValue(lab);
        return v !== null && v > THRESHOLDS.PROCALCITONIN_NG_ML;
      }
      case LOINC.ANC: {
        const v = ancPerMicroliter(lab);
        return v !== null && v > THRESHOLDS.ANC_PER_UL;
      }
      case LOINC.CRP: {
        const v = numericValue(lab);
        return v !== null && v > THRESHOLDS.CRP_MG_DL;
      }
      default:
        return false;
    }
  });
}

function urinalysisAbnormal(labs: LabResult[]): boolean {
  return labs.some(lab => {
    if (lab.code === LOINC.UA_WBC) {
      const v = numericValue(lab);
      return v !== null && v >= THRESHOLDS.UA_WBC_PER_HPF;
    }
    return lab.code === LOINC.UA_LEUKOCYTE_ESTERASE && isLeukocyteEsterasePositive(lab);
  });
}

// ════════════════════════════════════════════════════════════════════════════
// BUILDER
// ════════════════════════════════════════════════════════════════════════════

class PatientContextBuilder {
  constructor(
    private readonly evidence: EvidenceSource,
    private readonly logger: Logger = createLogger('patient-context')
  ) {}

  async build(episode: EpisodeFacts): Promise<PatientContext> {
    const ageDays = episode.age_days ?? await this.ageFromBirthDate(episode);
    const labs = await this.attempt<LabResult[]>(episode, 'labs', [], () =>
      this.evidence.getLabResults(episode.patient_id, Object.values(LOINC), episode.trigger_time)
    );
    const encounter = await this.attempt(episode, 'encounter', null, () =>
      this.evidence.getEncounter(episode.patient_id, episode.encounter_id)
    );

    return {
      age_days: ageDays,
      age_group: ageGroupFor(ageDays),
      inflammatory_markers_abnormal: inflammatoryMarkersAbnormal(labs),
      ua_abnormal: urinalysisAbnormal(labs),
      lp_performed: labs.some(l => l.code === LOINC.CSF_WBC || l.code === LOINC.CSF_RBC),
      disposition_home: encounter?.disposition?.toLowerCase() === 'home'
    };
  }

  private async ageFromBirthDate(episode: EpisodeFacts): Promise<number | null> {
    const patient = await this.attempt(episode, 'patient', null, () =>
      this.evidence.getPatient(episode.patient_id)
    );
    if (!patient?.birth_date) return null;
    return wholeDaysBetween(patient.birth_date, episode.trigger_time);
  }

  private async attempt<T>(
    episode: EpisodeFacts,
    query: string,
    fallback: T,
    fetch: () => Promise<T>
  ): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      this.logger.warn({ err, episode_id: episode.id, query }, 'context evidence unavailable');
      return fallback;
    }
  }
}

export {
  LOINC,
  THRESHOLDS,
  EpisodeFacts,
  PatientContextBuilder,
  ageGroupFor,
  ancPerMicroliter,
  isLeukocyteEsterasePositive,
  inflammatoryMarkersAbnormal,
  urinalysisAbnormal
};
