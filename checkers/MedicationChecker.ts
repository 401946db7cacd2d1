/**
 * Verificador de administração de medicamentos.
 *
 * Classifica cada administração em categorias (antibiótico de amplo
 * espectro, antibiótico parenteral, bolus de cristaloide, antiviral) e
 * procura a primeira administração qualificadora até o prazo.
 *
 * Bolus de fluido: dose em volume/peso (mL/kg) ou volume absoluto >= 100 mL.
 * Elementos com requires_shock só se aplicam com critério de choque:
 * hipotensão ajustada à idade, PAM < 65 ou lactato > 4.
 */

import {
  MedicationAdministration,
  MedicationCategory,
  VitalSign
} from '../entidades/tipos';
import {
  BaseElementChecker,
  CheckOutcome,
  CheckRequest,
  Completion,
  findTerm,
  notApplicable,
  pending
} from './ElementChecker';
import { byTime, isOnTime } from '../utilitarios/TimeWindow';
import medicationClasses from './medicationClasses.json';

// ════════════════════════════════════════════════════════════════════════════
// CONSTANTES
// ════════════════════════════════════════════════════════════════════════════

const VITAL_SYSTOLIC = '8480-6';
const VITAL_MEAN_ARTERIAL = '8478-0';
const LAB_LACTATE = '2524-7';

const MAP_THRESHOLD = 65;
const LACTATE_SHOCK_THRESHOLD = 4;
const BOLUS_MIN_ML = 100;

// ════════════════════════════════════════════════════════════════════════════
// CLASSIFICAÇÃO
// ════════════════════════════════════════════════════════════════════════════

function isParenteralRoute(route: string | null): boolean {
  return route !== null && findTerm(route, medicationClasses.parenteral_routes) !== null;
}

/**
 * Dose de bolus: "20 mL/kg", "20 ml per kg" ou volume >= 100 mL.
 */
function isBolusDose(dose: string | null): boolean {
  if (!dose) return false;
  const lower = dose.toLowerCase();
  if (/ml\s*\/\s*kg|ml per kg/.test(lower)) {
    return true;
  }
  const volume = lower.match(/(\d+(?:\.\d+)?)\s*(ml|milliliter)/);
  return volume !== null && Number(volume[1]) >= BOLUS_MIN_ML;
}

/**
 * Termo de classe que qualifica a administração, ou null.
 */
function classify(med: MedicationAdministration, category: MedicationCategory): string | null {
  switch (category) {
    case MedicationCategory.BROAD_SPECTRUM_ANTIBIOTIC:
      return findTerm(med.name, medicationClasses.broad_spectrum_antibiotics);
    case MedicationCategory.PARENTERAL_ANTIBIOTIC:
      return isParenteralRoute(med.route)
        ? findTerm(med.name, medicationClasses.parenteral_antibiotics)
        : null;
    case MedicationCategory.CRYSTALLOID_BOLUS:
      return isBolusDose(med.dose) ? findTerm(med.name, medicationClasses.crystalloids) : null;
    case MedicationCategory.ANTIVIRAL:
      return findTerm(med.name, medicationClasses.antivirals);
  }
}

/**
 * Limiar de pressão sistólica (mmHg) para hipotensão por idade.
 * Idade desconhecida usa o limiar de adulto.
 */
function systolicHypotensionThreshold(ageDays: number | null): number {
  if (ageDays === null) return 90;
  if (ageDays < 28) return 60;
  if (ageDays < 365) return 70;
  const years = Math.floor(ageDays / 365);
  if (years < 10) return 70 + 2 * years;
  return 90;
}

// ════════════════════════════════════════════════════════════════════════════
// VERIFICADOR
// ════════════════════════════════════════════════════════════════════════════

class MedicationChecker extends BaseElementChecker {
  async check(request: CheckRequest): Promise<CheckOutcome> {
    const category = request.element.medication_category;
    if (category === null) {
      return pending('No medication category configured');
    }

    if (request.element.requires_shock) {
      const shock = await this.assessShock(request);
      if (shock === null) {
        return notApplicable('Shock criteria not met');
      }
      const outcome = await this.checkCategory(request, category);
      return { ...outcome, notes: `${outcome.notes} (shock: ${shock})` };
    }

    return this.checkCategory(request, category);
  }

  async checkCategory(request: CheckRequest, category: MedicationCategory): Promise<CheckOutcome> {
    return this.conclude(request, await this.findAdministration(request, category), `${category} administration`);
  }

  /**
   * Primeira administração da categoria dentro do prazo.
   */
  async findAdministration(request: CheckRequest, category: MedicationCategory): Promise<Completion | null> {
    const { episode } = request;
    const limit = this.deadlineOf(request);
    const admins = await this.safely(request, 'medications', () =>
      this.evidence.getMedicationAdministrations(episode.patient_id, episode.trigger_time)
    );

    const qualifying = admins
      .filter(m => m.admin_time >= episode.trigger_time && isOnTime(m.admin_time, limit))
      .sort(byTime(m => m.admin_time))
      .find(m => classify(m, category) !== null);

    if (!qualifying) return null;
    const route = qualifying.route ? ` ${qualifying.route}` : '';
    return {
      at: qualifying.admin_time,
      value: qualifying.name,
      notes: `${qualifying.name}${route} given at ${qualifying.admin_time.toISOString()}`
    };
  }

  /**
   * Descrição do critério de choque presente até o prazo, ou null.
   */
  async assessShock(request: CheckRequest): Promise<string | null> {
    const { episode, context } = request;
    const limit = this.deadlineOf(request);
    const inWindow = (time: Date): boolean => time >= episode.trigger_time && isOnTime(time, limit);

    const vitals = await this.safely<VitalSign>(request, 'vitals', () =>
      this.evidence.getVitalSigns(episode.patient_id, episode.trigger_time)
    );
    const sbpLimit = systolicHypotensionThreshold(context.age_days);
    for (const vital of vitals.filter(v => inWindow(v.effective_time) && v.value !== null)) {
      if (vital.code === VITAL_SYSTOLIC && vital.value !== null && vital.value < sbpLimit) {
        return `systolic ${vital.value} < ${sbpLimit}`;
      }
      if (vital.code === VITAL_MEAN_ARTERIAL && vital.value !== null && vital.value < MAP_THRESHOLD) {
        return `MAP ${vital.value} < ${MAP_THRESHOLD}`;
      }
    }

    const lactates = await this.safely(request, 'labs', () =>
      this.evidence.getLabResults(episode.patient_id, [LAB_LACTATE], episode.trigger_time)
    );
    for (const lab of lactates.filter(l => inWindow(l.effective_time))) {
      const value = typeof lab.value === 'number' ? lab.value : Number(lab.value);
      if (Number.isFinite(value) && value > LACTATE_SHOCK_THRESHOLD) {
        return `lactate ${value} > ${LACTATE_SHOCK_THRESHOLD}`;
      }
    }

    return null;
  }
}

export { MedicationChecker, classify, isBolusDose, isParenteralRoute, systolicHypotensionThreshold };
