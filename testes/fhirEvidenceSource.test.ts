import { FhirEvidenceSource } from '../evidencia/FhirEvidenceSource';
import { EvidenceSourceError } from '../entidades/AdherenceErrors';
import { T0 } from './helpers/engineHarness';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/fhir+json' } });
}

function bundle(...resources: unknown[]): unknown {
  return { resourceType: 'Bundle', entry: resources.map(resource => ({ resource })) };
}

describe('FhirEvidenceSource', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  const source = new FhirEvidenceSource({ baseUrl: 'https://fhir.example.test/r4/', token: 'test-secret', timeout: 1000 });

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  function requestedUrl(call = 0): URL {
    return new URL(String(fetchSpy.mock.calls[call][0]));
  }

  describe('TESTE 1: leitura de recursos', () => {
    test('laboratório filtra códigos pedidos e exige data', async () => {
      fetchSpy.mockResolvedValueOnce(json(bundle(
        {
          resourceType: 'Observation',
          code: { coding: [{ system: 'http://loinc.org', code: '2524-7' }] },
          valueQuantity: { value: 2.1, unit: 'mmol/L' },
          effectiveDateTime: '2026-03-01T10:30:00Z'
        },
        {
          resourceType: 'Observation',
          code: { coding: [{ system: 'http://loinc.org', code: '9999-9' }] },
          valueQuantity: { value: 1 },
          effectiveDateTime: '2026-03-01T10:30:00Z'
        },
        {
          resourceType: 'Observation',
          code: { coding: [{ system: 'http://loinc.org', code: '600-7' }] },
          valueString: 'positive',
          issued: '2026-03-01T11:00:00Z'
        },
        {
          resourceType: 'Observation',
          code: { coding: [{ system: 'http://loinc.org', code: '600-7' }] },
          valueString: 'pending'
        }
      )));

      const results = await source.getLabResults('p1', ['2524-7', '600-7'], T0);

      expect(results).toEqual([
        { code: '2524-7', value: 2.1, unit: 'mmol/L', effective_time: new Date('2026-03-01T10:30:00Z') },
        { code: '600-7', value: 'positive', unit: null, effective_time: new Date('2026-03-01T11:00:00Z') }
      ]);

      const url = requestedUrl();
      expect(url.pathname).toBe('/r4/Observation');
      expect(url.searchParams.get('patient')).toBe('p1');
      expect(url.searchParams.get('code')).toBe('http://loinc.org|2524-7,http://loinc.org|600-7');
      expect(url.searchParams.get('date')).toBe('ge2026-03-01T10:00:00.000Z');
      expect(url.searchParams.get('_count')).toBe('200');
      expect(fetchSpy.mock.calls[0][1]?.headers).toEqual({
        Accept: 'application/fhir+json',
        Authorization: 'Bearer test-secret'
      });
    });

    test('sem códigos não consulta o servidor', async () => {
      expect(await source.getLabResults('p1', [], T0)).toEqual([]);
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    test('medicações ignoram not-done e montam dose', async () => {
      fetchSpy.mockResolvedValueOnce(json(bundle(
        {
          status: 'completed',
          medicationCodeableConcept: { text: 'Ceftriaxone' },
          effectiveDateTime: '2026-03-01T10:20:00Z',
          dosage: { dose: { value: 50, unit: 'mg/kg' }, route: { coding: [{ display: 'IV' }] } }
        },
        {
          status: 'not-done',
          medicationCodeableConcept: { text: 'Cefepime' },
          effectiveDateTime: '2026-03-01T10:25:00Z'
        },
        {
          status: 'completed',
          medicationCodeableConcept: { coding: [{ code: '11124', display: 'Vancomycin' }] },
          effectivePeriod: { start: '2026-03-01T10:40:00Z' }
        }
      )));

      const admins = await source.getMedicationAdministrations('p1', T0);

      expect(admins).toEqual([
        { name: 'Ceftriaxone', dose: '50 mg/kg', route: 'IV', admin_time: new Date('2026-03-01T10:20:00Z') },
        { name: 'Vancomycin', dose: null, route: null, admin_time: new Date('2026-03-01T10:40:00Z') }
      ]);
      expect(requestedUrl().searchParams.get('effective-time')).toBe('ge2026-03-01T10:00:00.000Z');
    });

    test('sinais vitais expandem componentes do painel', async () => {
      fetchSpy.mockResolvedValueOnce(json(bundle(
        {
          code: { coding: [{ code: '8867-4' }] },
          valueQuantity: { value: 120 },
          effectiveDateTime: '2026-03-01T10:05:00Z'
        },
        {
          code: { coding: [{ code: '85354-9' }] },
          effectiveDateTime: '2026-03-01T10:06:00Z',
          component: [
            { code: { coding: [{ code: '8480-6' }] }, valueQuantity: { value: 70 } },
            { code: { coding: [{ code: '8478-0' }] }, valueQuantity: { value: 55 } }
          ]
        }
      )));

      const vitals = await source.getVitalSigns('p1', T0);

      expect(vitals.map(v => [v.code, v.value])).toEqual([
        ['8867-4', 120],
        ['85354-9', null],
        ['8480-6', 70],
        ['8478-0', 55]
      ]);
      expect(requestedUrl().searchParams.get('category')).toBe('vital-signs');
    });

    test('notas decodificam o anexo base64', async () => {
      fetchSpy.mockResolvedValueOnce(json(bundle(
        {
          type: { coding: [{ code: '11506-3', display: 'Progress note' }] },
          date: '2026-03-01T12:00:00Z',
          content: [{ attachment: { contentType: 'text/plain', data: Buffer.from('Margins marked').toString('base64') } }]
        },
        {
          type: { coding: [{ code: '11506-3' }] },
          date: '2026-03-01T12:30:00Z',
          content: [{ attachment: { url: 'Binary/1' } }]
        }
      )));

      const notes = await source.getRecentNotes('p1', T0, ['11506-3']);

      expect(notes).toEqual([{ type: '11506-3', date: new Date('2026-03-01T12:00:00Z'), text: 'Margins marked' }]);
      expect(requestedUrl().searchParams.get('type')).toBe('11506-3');
      expect(requestedUrl().searchParams.get('_count')).toBe('50');
    });

    test('paciente com MRN e nome', async () => {
      fetchSpy.mockResolvedValueOnce(json({
        resourceType: 'Patient',
        id: 'p1',
        birthDate: '2025-12-01',
        identifier: [
          { type: { coding: [{ code: 'SS' }] }, value: '000' },
          { type: { coding: [{ code: 'MR' }] }, value: 'MRN-1' }
        ],
        name: [{ given: ['Ana', 'B'], family: 'Silva' }]
      }));

      expect(await source.getPatient('p1')).toEqual({
        patient_id: 'p1',
        birth_date: new Date('2025-12-01'),
        mrn: 'MRN-1',
        name: 'Ana B Silva'
      });
      expect(requestedUrl().pathname).toBe('/r4/Patient/p1');
    });

    test('encontro com disposição e 404 como ausente', async () => {
      fetchSpy
        .mockResolvedValueOnce(json({
          resourceType: 'Encounter',
          id: 'e1',
          status: 'in-progress',
          class: { code: 'EMER' },
          hospitalization: { dischargeDisposition: { coding: [{ code: 'home' }] } },
          period: { start: '2026-03-01T09:00:00Z' }
        }))
        .mockResolvedValueOnce(json({ resourceType: 'OperationOutcome' }, 404));

      expect(await source.getEncounter('p1', 'e1')).toEqual({
        encounter_id: 'e1',
        status: 'in-progress',
        encounter_class: 'EMER',
        disposition: 'home',
        admit_time: new Date('2026-03-01T09:00:00Z'),
        discharge_time: null
      });
      expect(await source.getEncounter('p1', 'missing')).toBeNull();
    });
  });

  describe('TESTE 2: falhas viram EvidenceSourceError', () => {
    test('status de erro', async () => {
      fetchSpy.mockResolvedValueOnce(json({}, 500));
      await expect(source.getVitalSigns('p1', T0)).rejects.toThrow('FHIR Observation respondeu 500');
    });

    test('erro de rede', async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));
      const failure = source.getMedicationAdministrations('p1', T0);
      await expect(failure).rejects.toThrow(EvidenceSourceError);
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));
      await expect(source.getMedicationAdministrations('p1', T0)).rejects.toThrow('FHIR network error: fetch failed');
    });

    test('timeout', async () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';
      fetchSpy.mockRejectedValueOnce(abort);
      await expect(source.getPatient('p1')).rejects.toThrow('FHIR timeout after 1000ms');
    });

    test('corpo não-JSON', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('<html>', { status: 200 }));
      await expect(source.getPatient('p1')).rejects.toThrow('FHIR Patient/p1: corpo não-JSON');
    });
  });
});
