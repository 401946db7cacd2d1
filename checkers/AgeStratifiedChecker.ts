/**
 * Verificador estratificado por idade (lactente febril).
 *
 * O gating por faixa etária e por marcadores é feito antes, na resolução
 * de aplicabilidade; aqui cada variante de `check` decide a evidência:
 *
 * - lab: resultados (ex.: LCR para punção lombar)
 * - parenteral_antibiotic: antibiótico por via IV/IM
 * - hsv_assessment: aciclovir administrado OU nota citando risco de HSV
 * - admission: encontro internado; alta para casa sem internação = NOT_MET
 * - discharge_checklist: notas de plano de alta (min_matching_notes)
 */

import { Logger } from '../utilitarios/Logger';
import { EncounterInfo, MedicationCategory, StratifiedCheck } from '../entidades/tipos';
import { EvidenceSource } from '../evidencia/EvidenceSource';
import {
  BaseElementChecker,
  CheckOutcome,
  CheckRequest,
  Completion,
  met,
  notMet,
  pending
} from './ElementChecker';
import { LabChecker } from './LabChecker';
import { MedicationChecker } from './MedicationChecker';
import { NoteChecker } from './NoteChecker';

const INPATIENT_CLASSES = ['imp', 'inpatient', 'acute', 'nonac', 'obsenc', 'observation'];

function isAdmitted(encounter: EncounterInfo): boolean {
  const cls = encounter.encounter_class?.toLowerCase() ?? '';
  const disposition = encounter.disposition?.toLowerCase() ?? '';
  return INPATIENT_CLASSES.includes(cls) || disposition === 'admitted';
}

class AgeStratifiedChecker extends BaseElementChecker {
  constructor(
    evidence: EvidenceSource,
    logger: Logger,
    private readonly labs: LabChecker,
    private readonly medications: MedicationChecker,
    private readonly notes: NoteChecker
  ) {
    super(evidence, logger);
  }

  async check(request: CheckRequest): Promise<CheckOutcome> {
    switch (request.element.check) {
      case StratifiedCheck.LAB:
        return this.labs.check(request);
      case StratifiedCheck.PARENTERAL_ANTIBIOTIC:
        return this.medications.checkCategory(request, MedicationCategory.PARENTERAL_ANTIBIOTIC);
      case StratifiedCheck.HSV_ASSESSMENT:
        return this.checkHsv(request);
      case StratifiedCheck.ADMISSION:
        return this.checkAdmission(request);
      case StratifiedCheck.DISCHARGE_CHECKLIST:
        return this.notes.check(request);
      case null:
        return pending('No stratified check configured');
    }
  }

  /**
   * O que vier primeiro: aciclovir ou documentação de risco de HSV.
   */
  private async checkHsv(request: CheckRequest): Promise<CheckOutcome> {
    const candidates = [
      await this.medications.findAdministration(request, MedicationCategory.ANTIVIRAL),
      request.element.keywords.length > 0 ? await this.notes.findDocumentation(request) : null
    ].filter((c): c is Completion => c !== null);

    const earliest = candidates.sort((a, b) => a.at.getTime() - b.at.getTime())[0] ?? null;
    return this.conclude(request, earliest, 'HSV risk assessment or acyclovir');
  }

  private async checkAdmission(request: CheckRequest): Promise<CheckOutcome> {
    const { episode, context } = request;
    const [encounter] = await this.safely(request, 'encounter', async () => {
      const found = await this.evidence.getEncounter(episode.patient_id, episode.encounter_id);
      return found ? [found] : [];
    });

    if (encounter && isAdmitted(encounter)) {
      const at = encounter.admit_time ?? request.now;
      return met({
        at,
        value: encounter.encounter_class,
        notes: `Admitted (${encounter.encounter_class ?? encounter.disposition}) at ${at.toISOString()}`
      });
    }
    if (context.disposition_home) {
      return notMet('Discharged home without admission');
    }
    return this.conclude(request, null, 'admission');
  }
}

export { AgeStratifiedChecker, isAdmitted };
