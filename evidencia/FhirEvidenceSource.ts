/**
 * Fonte de evidência sobre um servidor FHIR R4.
 *
 * Usa fetch nativo com timeout via AbortController. Respostas não-OK e
 * erros de rede viram EvidenceSourceError; o motor trata como ausência
 * de evidência.
 *
 * Recursos consultados:
 * - Observation (laboratório por LOINC, sinais vitais por categoria)
 * - MedicationAdministration
 * - DocumentReference (texto em anexo base64)
 * - Patient, Encounter
 */

import {
  ClinicalNote,
  EncounterInfo,
  LabResult,
  MedicationAdministration,
  PatientDemographics,
  VitalSign
} from '../entidades/tipos';
import { EvidenceSourceError, errorMessage, isErrorLike } from '../entidades/AdherenceErrors';
import { EvidenceSource } from './EvidenceSource';
import { UnknownRecord, isRecord } from '../utilitarios/Revive';

// ════════════════════════════════════════════════════════════════════════════
// CONFIGURAÇÃO
// ════════════════════════════════════════════════════════════════════════════

interface FhirEvidenceSourceOptions {
  /** URL base (ex: http://localhost:8080/fhir) */
  baseUrl: string;
  /** Bearer token opcional */
  token?: string;
  /** Timeout em ms (default: 30000) */
  timeout?: number;
  /** Máximo de recursos por busca (default: 200) */
  pageSize?: number;
}

type QueryParams = Record<string, string | undefined>;

const LOINC_SYSTEM = 'http://loinc.org';

// ════════════════════════════════════════════════════════════════════════════
// HELPERS DE LEITURA FHIR
// ════════════════════════════════════════════════════════════════════════════

function field(rec: UnknownRecord | null | undefined, key: string): UnknownRecord | null {
  const value = rec?.[key];
  return isRecord(value) ? value : null;
}

function text(rec: UnknownRecord | null | undefined, key: string): string | null {
  const value = rec?.[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function list(rec: UnknownRecord | null | undefined, key: string): UnknownRecord[] {
  const value = rec?.[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function firstCoding(concept: UnknownRecord | null): UnknownRecord | null {
  return list(concept, 'coding')[0] ?? null;
}

/**
 * Texto do CodeableConcept: `text`, senão o primeiro `display`.
 */
function conceptText(concept: UnknownRecord | null): string | null {
  return text(concept, 'text')
    ?? list(concept, 'coding').map(c => text(c, 'display')).find(d => d !== null)
    ?? null;
}

function extractEntries(bundle: unknown): UnknownRecord[] {
  if (!isRecord(bundle)) return [];
  return list(bundle, 'entry')
    .map(e => field(e, 'resource'))
    .filter((r): r is UnknownRecord => r !== null);
}

function observationValue(resource: UnknownRecord): string | number | null {
  const quantity = field(resource, 'valueQuantity');
  const numeric = quantity?.value;
  if (typeof numeric === 'number') return numeric;
  return text(resource, 'valueString') ?? conceptText(field(resource, 'valueCodeableConcept'));
}

// ════════════════════════════════════════════════════════════════════════════
// CLIENTE
// ════════════════════════════════════════════════════════════════════════════

class FhirEvidenceSource implements EvidenceSource {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly timeout: number;
  private readonly pageSize: number;

  constructor(options: FhirEvidenceSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.token = options.token;
    this.timeout = options.timeout ?? 30000;
    this.pageSize = options.pageSize ?? 200;
  }

  /**
   * GET em um recurso FHIR. 404 retorna null.
   */
  private async get(resourcePath: string, query: QueryParams = {}): Promise<unknown> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, value);
      }
    }
    const queryString = params.toString();
    const url = `${this.baseUrl}/${resourcePath}${queryString ? `?${queryString}` : ''}`;

    const headers: Record<string, string> = { Accept: 'application/fhir+json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    try {
      response = await fetch(url, { method: 'GET', headers, signal: controller.signal });
    } catch (error: unknown) {
      if (isErrorLike(error) && error.name === 'AbortError') {
        throw new EvidenceSourceError(`FHIR timeout after ${this.timeout}ms`, { resourcePath });
      }
      throw new EvidenceSourceError(
        `FHIR network error: ${errorMessage(error)}`,
        { resourcePath }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new EvidenceSourceError(`FHIR ${resourcePath} respondeu ${response.status}`, {
        resourcePath,
        status: response.status
      });
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error: unknown) {
      throw new EvidenceSourceError(
        `FHIR ${resourcePath}: corpo não-JSON (${errorMessage(error)})`,
        { resourcePath }
      );
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // EvidenceSource
  // ──────────────────────────────────────────────────────────────────────────

  async getLabResults(patientId: string, resultCodes: string[], since: Date): Promise<LabResult[]> {
    if (resultCodes.length === 0) return [];

    const bundle = await this.get('Observation', {
      patient: patientId,
      code: resultCodes.map(c => `${LOINC_SYSTEM}|${c}`).join(','),
      date: `ge${since.toISOString()}`,
      _count: String(this.pageSize),
      _sort: 'date'
    });

    const results: LabResult[] = [];
    for (const resource of extractEntries(bundle)) {
      const code = list(field(resource, 'code'), 'coding')
        .map(c => text(c, 'code'))
        .find((c): c is string => c !== null && resultCodes.includes(c));
      const effective = parseDate(text(resource, 'effectiveDateTime') ?? text(resource, 'issued'));
      if (!code || !effective) continue;

      results.push({
        code,
        value: observationValue(resource),
        unit: text(field(resource, 'valueQuantity'), 'unit'),
        effective_time: effective
      });
    }
    return results;
  }

  async getMedicationAdministrations(patientId: string, since: Date): Promise<MedicationAdministration[]> {
    const bundle = await this.get('MedicationAdministration', {
      patient: patientId,
      'effective-time': `ge${since.toISOString()}`,
      _count: String(this.pageSize)
    });

    const admins: MedicationAdministration[] = [];
    for (const resource of extractEntries(bundle)) {
      const status = text(resource, 'status');
      if (status === 'not-done' || status === 'entered-in-error') continue;

      const adminTime = parseDate(
        text(resource, 'effectiveDateTime') ?? text(field(resource, 'effectivePeriod'), 'start')
      );
      const name = conceptText(field(resource, 'medicationCodeableConcept'));
      if (!adminTime || !name) continue;

      const dosage = field(resource, 'dosage');
      const doseQty = field(dosage, 'dose');
      const doseValue = doseQty?.value;
      const dose = typeof doseValue === 'number'
        ? `${doseValue} ${text(doseQty, 'unit') ?? ''}`.trim()
        : null;

      admins.push({
        name,
        dose,
        route: conceptText(field(dosage, 'route')),
        admin_time: adminTime
      });
    }
    return admins;
  }

  async getVitalSigns(patientId: string, since: Date): Promise<VitalSign[]> {
    const bundle = await this.get('Observation', {
      patient: patientId,
      category: 'vital-signs',
      date: `ge${since.toISOString()}`,
      _count: String(this.pageSize)
    });

    const vitals: VitalSign[] = [];
    for (const resource of extractEntries(bundle)) {
      const effective = parseDate(text(resource, 'effectiveDateTime'));
      const code = text(firstCoding(field(resource, 'code')), 'code');
      if (!effective || !code) continue;

      const value = field(resource, 'valueQuantity')?.value;
      vitals.push({ code, value: typeof value === 'number' ? value : null, effective_time: effective });

      // Pressão arterial como painel: sistólica e média vêm em `component`
      for (const component of list(resource, 'component')) {
        const componentCode = text(firstCoding(field(component, 'code')), 'code');
        const componentValue = field(component, 'valueQuantity')?.value;
        if (componentCode && typeof componentValue === 'number') {
          vitals.push({ code: componentCode, value: componentValue, effective_time: effective });
        }
      }
    }
    return vitals;
  }

  async getRecentNotes(patientId: string, since: Date, types: string[] = []): Promise<ClinicalNote[]> {
    const bundle = await this.get('DocumentReference', {
      patient: patientId,
      date: `ge${since.toISOString()}`,
      type: types.length > 0 ? types.join(',') : undefined,
      _count: '50'
    });

    const notes: ClinicalNote[] = [];
    for (const resource of extractEntries(bundle)) {
      const coding = firstCoding(field(resource, 'type'));
      const type = text(coding, 'code') ?? text(coding, 'display') ?? 'unknown';
      const date = parseDate(
        text(resource, 'date') ?? text(field(field(resource, 'context'), 'period'), 'start')
      );
      const body = list(resource, 'content')
        .map(c => text(field(c, 'attachment'), 'data'))
        .find((d): d is string => d !== null);
      if (!date || !body) continue;

      notes.push({ type, date, text: Buffer.from(body, 'base64').toString('utf-8') });
    }
    return notes;
  }

  async getPatient(patientId: string): Promise<PatientDemographics | null> {
    const resource = await this.get(`Patient/${encodeURIComponent(patientId)}`);
    if (!isRecord(resource)) return null;

    const mrn = list(resource, 'identifier').find(
      i => text(firstCoding(field(i, 'type')), 'code') === 'MR'
    );
    const name: UnknownRecord | undefined = list(resource, 'name')[0];
    const givenRaw = name?.given;
    const given = Array.isArray(givenRaw)
      ? givenRaw.filter((g: unknown): g is string => typeof g === 'string').join(' ')
      : '';
    const fullName = `${given} ${text(name, 'family') ?? ''}`.trim();

    return {
      patient_id: text(resource, 'id') ?? patientId,
      birth_date: parseDate(text(resource, 'birthDate')),
      mrn: text(mrn, 'value'),
      name: fullName.length > 0 ? fullName : null
    };
  }

  async getEncounter(_patientId: string, encounterId: string): Promise<EncounterInfo | null> {
    const resource = await this.get(`Encounter/${encodeURIComponent(encounterId)}`);
    if (!isRecord(resource)) return null;

    const period = field(resource, 'period');
    const encounterClass = field(resource, 'class');
    return {
      encounter_id: text(resource, 'id') ?? encounterId,
      status: text(resource, 'status') ?? 'unknown',
      encounter_class: text(encounterClass, 'code'),
      disposition: text(firstCoding(field(field(resource, 'hospitalization'), 'dischargeDisposition')), 'code'),
      admit_time: parseDate(text(period, 'start')),
      discharge_time: parseDate(text(period, 'end'))
    };
  }
}

export { FhirEvidenceSource, FhirEvidenceSourceOptions };
