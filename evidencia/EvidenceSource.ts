/**
 * Fonte de evidência clínica (colaborador externo).
 *
 * Todas as chamadas são leituras delimitadas no tempo (`since`); nenhuma
 * escreve. Uma falha é lançada como EvidenceSourceError e tratada pelo
 * chamador como "sem evidência qualificadora ainda".
 */

import {
  ClinicalNote,
  EncounterInfo,
  LabResult,
  MedicationAdministration,
  PatientDemographics,
  VitalSign
} from '../entidades/tipos';

interface EvidenceSource {
  getLabResults(patientId: string, resultCodes: string[], since: Date): Promise<LabResult[]>;

  getMedicationAdministrations(patientId: string, since: Date): Promise<MedicationAdministration[]>;

  getVitalSigns(patientId: string, since: Date): Promise<VitalSign[]>;

  /**
   * @param types códigos de tipo de nota; vazio = todos
   */
  getRecentNotes(patientId: string, since: Date, types?: string[]): Promise<ClinicalNote[]>;

  getPatient(patientId: string): Promise<PatientDemographics | null>;

  getEncounter(patientId: string, encounterId: string): Promise<EncounterInfo | null>;
}

export { EvidenceSource };
