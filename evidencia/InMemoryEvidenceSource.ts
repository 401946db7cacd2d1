/**
 * Fonte de evidência em memória.
 *
 * Usada pelos testes e pela CLI com fixtures JSON. Aplica os mesmos
 * filtros de paciente, código e `since` que uma fonte real.
 */

import * as fs from 'fs/promises';
import {
  ClinicalNote,
  EncounterInfo,
  LabResult,
  MedicationAdministration,
  PatientDemographics,
  TriggerMatch,
  VitalSign
} from '../entidades/tipos';
import { EvidenceSourceError } from '../entidades/AdherenceErrors';
import { EvidenceSource } from './EvidenceSource';
import {
  UnknownRecord,
  asRecord,
  isRecord,
  readArray,
  readDate,
  readOptionalDate,
  readOptionalNumber,
  readOptionalString,
  readString
} from '../utilitarios/Revive';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

type EvidenceQuery = 'labs' | 'medications' | 'vitals' | 'notes' | 'patient' | 'encounter';

interface PatientRecord {
  demographics: PatientDemographics;
  labs: LabResult[];
  medications: MedicationAdministration[];
  vitals: VitalSign[];
  notes: ClinicalNote[];
  encounters: EncounterInfo[];
}

interface EvidenceFixture {
  source: InMemoryEvidenceSource;
  triggers: Map<string, TriggerMatch[]>;
}

// ════════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════════

class InMemoryEvidenceSource implements EvidenceSource {
  private readonly patients = new Map<string, PatientRecord>();
  private readonly failures = new Map<EvidenceQuery, Error>();

  private record(patientId: string): PatientRecord {
    let rec = this.patients.get(patientId);
    if (!rec) {
      rec = {
        demographics: { patient_id: patientId, birth_date: null, mrn: null, name: null },
        labs: [],
        medications: [],
        vitals: [],
        notes: [],
        encounters: []
      };
      this.patients.set(patientId, rec);
    }
    return rec;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // CARGA
  // ──────────────────────────────────────────────────────────────────────────

  setPatient(demographics: Partial<PatientDemographics> & { patient_id: string }): this {
    const rec = this.record(demographics.patient_id);
    rec.demographics = { ...rec.demographics, ...demographics };
    return this;
  }

  addLab(patientId: string, lab: LabResult): this {
    this.record(patientId).labs.push(lab);
    return this;
  }

  addMedication(patientId: string, med: MedicationAdministration): this {
    this.record(patientId).medications.push(med);
    return this;
  }

  addVital(patientId: string, vital: VitalSign): this {
    this.record(patientId).vitals.push(vital);
    return this;
  }

  addNote(patientId: string, note: ClinicalNote): this {
    this.record(patientId).notes.push(note);
    return this;
  }

  setEncounter(patientId: string, encounter: EncounterInfo): this {
    const rec = this.record(patientId);
    rec.encounters = rec.encounters.filter(e => e.encounter_id !== encounter.encounter_id);
    rec.encounters.push(encounter);
    return this;
  }

  /**
   * Faz a consulta indicada falhar até clearFailures().
   */
  failOn(query: EvidenceQuery, error: Error = new EvidenceSourceError(`${query} indisponível`)): this {
    this.failures.set(query, error);
    return this;
  }

  clearFailures(): this {
    this.failures.clear();
    return this;
  }

  private guard(query: EvidenceQuery): void {
    const error = this.failures.get(query);
    if (error) {
      throw error;
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // CONSULTAS
  // ──────────────────────────────────────────────────────────────────────────

  async getLabResults(patientId: string, resultCodes: string[], since: Date): Promise<LabResult[]> {
    this.guard('labs');
    const rec = this.patients.get(patientId);
    if (!rec) return [];
    return rec.labs
      .filter(l => resultCodes.includes(l.code) && l.effective_time >= since)
      .map(l => ({ ...l }));
  }

  async getMedicationAdministrations(patientId: string, since: Date): Promise<MedicationAdministration[]> {
    this.guard('medications');
    const rec = this.patients.get(patientId);
    if (!rec) return [];
    return rec.medications.filter(m => m.admin_time >= since).map(m => ({ ...m }));
  }

  async getVitalSigns(patientId: string, since: Date): Promise<VitalSign[]> {
    this.guard('vitals');
    const rec = this.patients.get(patientId);
    if (!rec) return [];
    return rec.vitals.filter(v => v.effective_time >= since).map(v => ({ ...v }));
  }

  async getRecentNotes(patientId: string, since: Date, types: string[] = []): Promise<ClinicalNote[]> {
    this.guard('notes');
    const rec = this.patients.get(patientId);
    if (!rec) return [];
    return rec.notes
      .filter(n => n.date >= since && (types.length === 0 || types.includes(n.type)))
      .map(n => ({ ...n }));
  }

  async getPatient(patientId: string): Promise<PatientDemographics | null> {
    this.guard('patient');
    const rec = this.patients.get(patientId);
    return rec ? { ...rec.demographics } : null;
  }

  async getEncounter(patientId: string, encounterId: string): Promise<EncounterInfo | null> {
    this.guard('encounter');
    const found = this.patients.get(patientId)?.encounters.find(e => e.encounter_id === encounterId);
    return found ? { ...found } : null;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // FIXTURES
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Lê um arquivo de fixture:
   * `{ patients: [...], triggers: { <bundle_id>: [...] } }`
   */
  static async fromFixtureFile(filePath: string): Promise<EvidenceFixture> {
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    return InMemoryEvidenceSource.fromFixture(parsed);
  }

  static fromFixture(raw: unknown): EvidenceFixture {
    const doc = asRecord(raw, 'fixture');
    const source = new InMemoryEvidenceSource();

    for (const item of readArray(doc, 'patients')) {
      const p = asRecord(item, 'patients[]');
      const patientId = readString(p, 'patient_id');
      source.setPatient({
        patient_id: patientId,
        birth_date: readOptionalDate(p, 'birth_date'),
        mrn: readOptionalString(p, 'mrn'),
        name: readOptionalString(p, 'name')
      });

      for (const l of readArray(p, 'labs').map(v => asRecord(v, 'labs[]'))) {
        source.addLab(patientId, {
          code: readString(l, 'code'),
          value: readEvidenceValue(l),
          unit: readOptionalString(l, 'unit'),
          effective_time: readDate(l, 'effective_time')
        });
      }
      for (const m of readArray(p, 'medications').map(v => asRecord(v, 'medications[]'))) {
        source.addMedication(patientId, {
          name: readString(m, 'name'),
          dose: readOptionalString(m, 'dose'),
          route: readOptionalString(m, 'route'),
          admin_time: readDate(m, 'admin_time')
        });
      }
      for (const v of readArray(p, 'vitals').map(x => asRecord(x, 'vitals[]'))) {
        source.addVital(patientId, {
          code: readString(v, 'code'),
          value: readOptionalNumber(v, 'value'),
          effective_time: readDate(v, 'effective_time')
        });
      }
      for (const n of readArray(p, 'notes').map(x => asRecord(x, 'notes[]'))) {
        source.addNote(patientId, {
          type: readString(n, 'type'),
          date: readDate(n, 'date'),
          text: readString(n, 'text')
        });
      }
      for (const e of readArray(p, 'encounters').map(x => asRecord(x, 'encounters[]'))) {
        source.setEncounter(patientId, {
          encounter_id: readString(e, 'encounter_id'),
          status: readString(e, 'status'),
          encounter_class: readOptionalString(e, 'encounter_class'),
          disposition: readOptionalString(e, 'disposition'),
          admit_time: readOptionalDate(e, 'admit_time'),
          discharge_time: readOptionalDate(e, 'discharge_time')
        });
      }
    }

    const triggers = new Map<string, TriggerMatch[]>();
    const rawTriggers = isRecord(doc.triggers) ? doc.triggers : {};
    for (const [bundleId, list] of Object.entries(rawTriggers)) {
      if (!Array.isArray(list)) continue;
      triggers.set(bundleId, list.map((t: unknown) => {
        const rec = asRecord(t, `triggers.${bundleId}[]`);
        return {
          patient_id: readString(rec, 'patient_id'),
          encounter_id: readString(rec, 'encounter_id'),
          onset_time: readDate(rec, 'onset_time'),
          age_days: readOptionalNumber(rec, 'age_days'),
          mrn: readOptionalString(rec, 'mrn')
        };
      }));
    }

    return { source, triggers };
  }
}

function readEvidenceValue(rec: UnknownRecord): string | number | null {
  const value = rec.value;
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return null;
}

export { InMemoryEvidenceSource, EvidenceQuery, EvidenceFixture };
