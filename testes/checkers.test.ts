import {
  AgeGroup,
  BundleElement,
  ElementCheckResult,
  ElementStatus,
  GuidelineBundle,
  MedicationCategory,
  PatientContext
} from '../entidades/tipos';
import { parseBundleElement } from '../catalogo/BundleDefinitionParser';
import { InMemoryEvidenceSource } from '../evidencia/InMemoryEvidenceSource';
import { CheckRequest, containsTerm, normalizeValue } from '../checkers/ElementChecker';
import { LabChecker } from '../checkers/LabChecker';
import {
  MedicationChecker,
  classify,
  isBolusDose,
  isParenteralRoute,
  systolicHypotensionThreshold
} from '../checkers/MedicationChecker';
import { NoteChecker } from '../checkers/NoteChecker';
import { AgeStratifiedChecker } from '../checkers/AgeStratifiedChecker';
import { CheckerRegistry } from '../checkers/CheckerRegistry';
import { createLogger } from '../utilitarios/Logger';
import { T0, at } from './helpers/engineHarness';

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

const logger = createLogger('checkers-test');

const BASE_CONTEXT: PatientContext = {
  age_days: null,
  age_group: AgeGroup.UNKNOWN,
  inflammatory_markers_abnormal: false,
  ua_abnormal: false,
  lp_performed: false,
  disposition_home: false
};

function element(raw: Record<string, unknown>): BundleElement {
  return parseBundleElement({ element_id: 'el', name: 'Element', ...raw }, 'checker_bundle');
}

interface RequestOptions {
  now: Date;
  context?: Partial<PatientContext>;
  prerequisite?: ElementCheckResult | null;
}

function request(el: BundleElement, options: RequestOptions): CheckRequest {
  const bundle: GuidelineBundle = {
    bundle_id: 'checker_bundle',
    name: 'Checker Bundle',
    description: '',
    version: '1',
    excluded_age_groups: [],
    elements: [el]
  };
  return {
    bundle,
    element: el,
    episode: { id: 'ep-1', patient_id: 'p1', encounter_id: 'e1', trigger_time: T0 },
    context: { ...BASE_CONTEXT, ...options.context },
    now: options.now,
    prerequisite: options.prerequisite ?? null
  };
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS COMUNS
// ════════════════════════════════════════════════════════════════════════════

describe('ElementChecker helpers', () => {
  test('containsTerm casa palavra inteira sem distinção de caixa', () => {
    expect(containsTerm('Piperacillin-Tazobactam', 'piperacillin')).toBe(true);
    expect(containsTerm('Ampicillin-sulbactam', 'ampicillin-sulbactam')).toBe(true);
    expect(containsTerm('transplant', 'ns')).toBe(false);
    expect(containsTerm('0.9% NS bolus', 'ns')).toBe(true);
  });

  test('normalizeValue converte texto numérico', () => {
    expect(normalizeValue('2.4')).toBe(2.4);
    expect(normalizeValue(' -1 ')).toBe(-1);
    expect(normalizeValue('positive')).toBe('positive');
    expect(normalizeValue(null)).toBeNull();
  });
});

// ════════════════════════════════════════════════════════════════════════════
// LABORATÓRIO
// ════════════════════════════════════════════════════════════════════════════

describe('LabChecker', () => {
  let evidence: InMemoryEvidenceSource;
  let checker: LabChecker;
  const lab = element({ data_source: 'lab', time_window_hours: 1, result_codes: ['L1'] });

  beforeEach(() => {
    evidence = new InMemoryEvidenceSource();
    checker = new LabChecker(evidence, logger);
  });

  test('sem códigos configurados fica PENDING', async () => {
    const outcome = await checker.check(request(element({ data_source: 'lab', time_window_hours: 1 }), { now: at(5) }));
    expect(outcome).toEqual({ status: ElementStatus.PENDING, completed_at: null, value: null, notes: 'No result codes configured' });
  });

  test('resultado mais antigo dentro do prazo completa o elemento', async () => {
    evidence
      .addLab('p1', { code: 'L1', value: '2.4', unit: 'mmol/L', effective_time: at(0.8) })
      .addLab('p1', { code: 'L1', value: '1.1', unit: 'mmol/L', effective_time: at(0.3) });

    const outcome = await checker.check(request(lab, { now: at(0.9) }));

    expect(outcome).toEqual({
      status: ElementStatus.MET,
      completed_at: at(0.3),
      value: 1.1,
      notes: `Result L1 = 1.1 mmol/L at ${at(0.3).toISOString()}`
    });
  });

  test('resultado após o prazo não conta', async () => {
    evidence.addLab('p1', { code: 'L1', value: 3, unit: null, effective_time: at(1.5) });

    expect((await checker.check(request(lab, { now: at(0.5) }))).notes).toBe('Awaiting result (L1)');
    expect(await checker.check(request(lab, { now: at(2) }))).toEqual({
      status: ElementStatus.NOT_MET,
      completed_at: null,
      value: null,
      notes: 'No result (L1) within 1h window'
    });
  });

  test('resultado no instante exato do prazo conta', async () => {
    evidence.addLab('p1', { code: 'L1', value: 3, unit: null, effective_time: at(1) });
    expect((await checker.check(request(lab, { now: at(2) }))).status).toBe(ElementStatus.MET);
  });

  test('repetição exige resultado estritamente posterior ao pré-requisito', async () => {
    const repeat = element({
      element_id: 'repeat',
      data_source: 'lab',
      time_window_hours: 6,
      result_codes: ['L1'],
      depends_on: { element_id: 'first', operator: 'gt', threshold: 2 }
    });
    const prerequisite: ElementCheckResult = {
      element_id: 'first',
      element_name: 'First',
      status: ElementStatus.MET,
      deadline: at(1),
      completed_at: at(0.5),
      value: 3.2,
      notes: ''
    };
    evidence.addLab('p1', { code: 'L1', value: 3.2, unit: null, effective_time: at(0.5) });

    const waiting = await checker.check(request(repeat, { now: at(2), prerequisite }));
    expect(waiting.notes).toBe('Awaiting repeat result (L1)');

    evidence.addLab('p1', { code: 'L1', value: 1.9, unit: null, effective_time: at(2) });
    const done = await checker.check(request(repeat, { now: at(3), prerequisite }));
    expect(done.status).toBe(ElementStatus.MET);
    expect(done.value).toBe(1.9);
    expect(done.notes).toBe(`Repeat result L1 = 1.9 at ${at(2).toISOString()}`);
  });

  test('falha da fonte equivale a ausência de evidência', async () => {
    evidence.addLab('p1', { code: 'L1', value: 3, unit: null, effective_time: at(0.5) }).failOn('labs');

    expect((await checker.check(request(lab, { now: at(0.7) }))).status).toBe(ElementStatus.PENDING);
    expect((await checker.check(request(lab, { now: at(2) }))).status).toBe(ElementStatus.NOT_MET);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// MEDICAMENTOS
// ════════════════════════════════════════════════════════════════════════════

describe('MedicationChecker', () => {
  let evidence: InMemoryEvidenceSource;
  let checker: MedicationChecker;

  beforeEach(() => {
    evidence = new InMemoryEvidenceSource();
    checker = new MedicationChecker(evidence, logger);
  });

  describe('classificação', () => {
    test('via parenteral', () => {
      expect(isParenteralRoute('IV')).toBe(true);
      expect(isParenteralRoute('Intramuscular')).toBe(true);
      expect(isParenteralRoute('PO')).toBe(false);
      expect(isParenteralRoute(null)).toBe(false);
    });

    test('dose de bolus', () => {
      expect(isBolusDose('20 mL/kg')).toBe(true);
      expect(isBolusDose('10 ml per kg')).toBe(true);
      expect(isBolusDose('500 mL')).toBe(true);
      expect(isBolusDose('50 mL')).toBe(false);
      expect(isBolusDose(null)).toBe(false);
    });

    test('categorias', () => {
      const med = { name: 'Ampicillin', dose: '50 mg/kg', route: 'IV', admin_time: T0 };
      expect(classify(med, MedicationCategory.PARENTERAL_ANTIBIOTIC)).toBe('ampicillin');
      expect(classify({ ...med, route: 'PO' }, MedicationCategory.PARENTERAL_ANTIBIOTIC)).toBeNull();
      expect(classify(med, MedicationCategory.BROAD_SPECTRUM_ANTIBIOTIC)).toBeNull();
      expect(classify({ ...med, name: 'Normal Saline', dose: '20 mL/kg' }, MedicationCategory.CRYSTALLOID_BOLUS))
        .toBe('normal saline');
      expect(classify({ ...med, name: 'Acyclovir' }, MedicationCategory.ANTIVIRAL)).toBe('acyclovir');
    });

    test('limiar de hipotensão sistólica por idade', () => {
      expect(systolicHypotensionThreshold(null)).toBe(90);
      expect(systolicHypotensionThreshold(10)).toBe(60);
      expect(systolicHypotensionThreshold(27)).toBe(60);
      expect(systolicHypotensionThreshold(28)).toBe(70);
      expect(systolicHypotensionThreshold(100)).toBe(70);
      expect(systolicHypotensionThreshold(365 * 5)).toBe(80);
      expect(systolicHypotensionThreshold(4000)).toBe(90);
    });
  });

  test('primeira administração qualificadora dentro do prazo', async () => {
    const abx = element({ data_source: 'medication', time_window_hours: 1, medication_category: 'broad_spectrum_antibiotic' });
    evidence
      .addMedication('p1', { name: 'Acetaminophen', dose: '15 mg/kg', route: 'PO', admin_time: at(0.2) })
      .addMedication('p1', { name: 'Piperacillin-Tazobactam', dose: '100 mg/kg', route: 'IV', admin_time: at(0.6) });

    expect(await checker.check(request(abx, { now: at(2) }))).toEqual({
      status: ElementStatus.MET,
      completed_at: at(0.6),
      value: 'Piperacillin-Tazobactam',
      notes: `Piperacillin-Tazobactam IV given at ${at(0.6).toISOString()}`
    });
  });

  test('sem administração após o prazo vira NOT_MET', async () => {
    const abx = element({ data_source: 'medication', time_window_hours: 1, medication_category: 'broad_spectrum_antibiotic' });
    evidence.addMedication('p1', { name: 'Meropenem', dose: null, route: 'IV', admin_time: at(1.2) });

    expect((await checker.check(request(abx, { now: at(2) }))).notes)
      .toBe('No broad_spectrum_antibiotic administration within 1h window');
  });

  describe('critério de choque', () => {
    const bolus = element({
      data_source: 'medication',
      time_window_hours: 1,
      medication_category: 'crystalloid_bolus',
      requires_shock: true
    });

    test('sem choque: NOT_APPLICABLE já dentro da janela', async () => {
      const notApplicable = {
        status: ElementStatus.NOT_APPLICABLE,
        completed_at: null,
        value: null,
        notes: 'Shock criteria not met'
      };
      expect(await checker.check(request(bolus, { now: at(0.5) }))).toEqual(notApplicable);
      expect(await checker.check(request(bolus, { now: at(2) }))).toEqual(notApplicable);
    });

    test('sem choque e sem prazo: resolve em vez de ficar pendente', async () => {
      const openEnded = element({
        data_source: 'medication',
        medication_category: 'crystalloid_bolus',
        requires_shock: true
      });
      expect((await checker.check(request(openEnded, { now: at(10000) }))).status).toBe(ElementStatus.NOT_APPLICABLE);
    });

    test('PAM baixa abre o elemento e o bolus o completa', async () => {
      evidence
        .addVital('p1', { code: '8478-0', value: 60, effective_time: at(0.25) })
        .addMedication('p1', { name: 'Normal Saline', dose: '20 mL/kg', route: 'IV', admin_time: at(0.5) });

      const outcome = await checker.check(request(bolus, { now: at(2) }));
      expect(outcome.status).toBe(ElementStatus.MET);
      expect(outcome.notes).toBe(`Normal Saline IV given at ${at(0.5).toISOString()} (shock: MAP 60 < 65)`);
    });

    test('hipotensão ajustada à idade e lactato elevado', async () => {
      evidence.addVital('p1', { code: '8480-6', value: 65, effective_time: at(0.25) });
      const neonate = await checker.check(request(bolus, { now: at(2), context: { age_days: 10 } }));
      expect(neonate.notes).toBe('Shock criteria not met');

      const adult = await checker.check(request(bolus, { now: at(2), context: { age_days: null } }));
      expect(adult.notes).toBe('No crystalloid_bolus administration within 1h window (shock: systolic 65 < 90)');

      const lactateOnly = new InMemoryEvidenceSource()
        .addLab('p1', { code: '2524-7', value: '4.5', unit: 'mmol/L', effective_time: at(0.5) });
      const viaLactate = new MedicationChecker(lactateOnly, logger);
      expect(await viaLactate.assessShock(request(bolus, { now: at(2) }))).toBe('lactate 4.5 > 4');
    });
  });
});

// ════════════════════════════════════════════════════════════════════════════
// NOTAS
// ════════════════════════════════════════════════════════════════════════════

describe('NoteChecker', () => {
  let evidence: InMemoryEvidenceSource;
  let checker: NoteChecker;

  beforeEach(() => {
    evidence = new InMemoryEvidenceSource();
    checker = new NoteChecker(evidence, logger);
  });

  test('sem palavras-chave fica PENDING', async () => {
    const outcome = await checker.check(request(element({ data_source: 'note', time_window_hours: 4 }), { now: at(10) }));
    expect(outcome.notes).toBe('No documentation keywords configured');
  });

  test('palavra-chave em qualquer caixa completa o elemento', async () => {
    const doc = element({ data_source: 'note', time_window_hours: 72, keywords: ['De-escalat'] });
    evidence.addNote('p1', { type: 'progress', date: at(30), text: 'Plan: De-escalation to ampicillin' });

    expect(await checker.check(request(doc, { now: at(31) }))).toEqual({
      status: ElementStatus.MET,
      completed_at: at(30),
      value: 'de-escalat',
      notes: `Documented in progress note at ${at(30).toISOString()}`
    });
  });

  describe('janela interna', () => {
    const reassess = element({
      data_source: 'note',
      time_window_hours: 72,
      keywords: ['reassess'],
      note_window: { start_hours: 48, end_hours: 72 }
    });

    test('antes da abertura o elemento aguarda', async () => {
      expect((await checker.check(request(reassess, { now: at(24) }))).notes)
        .toBe(`Documentation window opens at ${at(48).toISOString()}`);
    });

    test('nota anterior à abertura não conta', async () => {
      evidence.addNote('p1', { type: 'progress', date: at(30), text: 'will reassess later' });
      expect((await checker.check(request(reassess, { now: at(73) }))).notes).toBe('No documentation within 72h window');

      evidence.addNote('p1', { type: 'progress', date: at(50), text: 'Antibiotics reassessed' });
      expect((await checker.check(request(reassess, { now: at(73) }))).completed_at).toEqual(at(50));
    });

    test('prazo efetivo é o menor entre a janela e o fim da nota', async () => {
      const shorter = element({
        data_source: 'note',
        time_window_hours: 100,
        keywords: ['reassess'],
        note_window: { start_hours: 0, end_hours: 10 }
      });
      expect((await checker.check(request(shorter, { now: at(11) }))).notes).toBe('No documentation within 10h window');
    });
  });

  test('min_matching_notes exige N notas e completa na N-ésima', async () => {
    const checklist = element({ data_source: 'note', time_window_hours: 24, keywords: ['follow-up'], min_matching_notes: 2 });
    evidence.addNote('p1', { type: 'discharge', date: at(2), text: 'Follow-up arranged' });

    expect((await checker.check(request(checklist, { now: at(3) }))).notes).toBe('Awaiting documentation');

    evidence.addNote('p1', { type: 'discharge', date: at(4), text: 'Pediatrician follow-up in 24h' });
    const done = await checker.check(request(checklist, { now: at(5) }));
    expect(done.completed_at).toEqual(at(4));
    expect(done.notes).toBe(`Documented in discharge note at ${at(4).toISOString()} (2 notes)`);
  });

  test('filtra por tipo de nota', async () => {
    const typed = element({ data_source: 'note', time_window_hours: 24, keywords: ['margin'], note_types: ['procedure'] });
    evidence.addNote('p1', { type: 'progress', date: at(1), text: 'margins marked' });

    expect((await checker.check(request(typed, { now: at(2) }))).status).toBe(ElementStatus.PENDING);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// ESTRATIFICADO POR IDADE
// ════════════════════════════════════════════════════════════════════════════

describe('AgeStratifiedChecker', () => {
  let evidence: InMemoryEvidenceSource;
  let checker: AgeStratifiedChecker;

  beforeEach(() => {
    evidence = new InMemoryEvidenceSource();
    checker = new AgeStratifiedChecker(
      evidence,
      logger,
      new LabChecker(evidence, logger),
      new MedicationChecker(evidence, logger),
      new NoteChecker(evidence, logger)
    );
  });

  test('lab delega ao verificador de laboratório', async () => {
    const lp = element({ data_source: 'age_stratified', check: 'lab', time_window_hours: 24, result_codes: ['806-0'] });
    evidence.addLab('p1', { code: '806-0', value: 3, unit: '/uL', effective_time: at(5) });

    expect((await checker.check(request(lp, { now: at(6) }))).status).toBe(ElementStatus.MET);
  });

  test('antibiótico parenteral exige via IV/IM', async () => {
    const abx = element({ data_source: 'age_stratified', check: 'parenteral_antibiotic', time_window_hours: 2 });
    evidence.addMedication('p1', { name: 'Amoxicillin', dose: '45 mg/kg', route: 'PO', admin_time: at(1) });
    expect((await checker.check(request(abx, { now: at(3) }))).status).toBe(ElementStatus.NOT_MET);

    evidence.addMedication('p1', { name: 'Ampicillin', dose: '50 mg/kg', route: 'IV', admin_time: at(1.5) });
    expect((await checker.check(request(abx, { now: at(3) }))).value).toBe('Ampicillin');
  });

  describe('avaliação de HSV', () => {
    const hsv = element({ data_source: 'age_stratified', check: 'hsv_assessment', time_window_hours: 24, keywords: ['hsv'] });

    test('vale o que vier primeiro: nota ou aciclovir', async () => {
      evidence
        .addMedication('p1', { name: 'Acyclovir', dose: '20 mg/kg', route: 'IV', admin_time: at(3) })
        .addNote('p1', { type: 'progress', date: at(2), text: 'HSV risk low' });

      const outcome = await checker.check(request(hsv, { now: at(4) }));
      expect(outcome.value).toBe('hsv');
      expect(outcome.completed_at).toEqual(at(2));
    });

    test('só aciclovir também completa', async () => {
      evidence.addMedication('p1', { name: 'Acyclovir', dose: '20 mg/kg', route: 'IV', admin_time: at(3) });
      expect((await checker.check(request(hsv, { now: at(4) }))).value).toBe('Acyclovir');
    });

    test('sem nenhum dos dois após o prazo', async () => {
      expect((await checker.check(request(hsv, { now: at(25) }))).notes)
        .toBe('No HSV risk assessment or acyclovir within 24h window');
    });
  });

  describe('internação', () => {
    const admit = element({ data_source: 'age_stratified', check: 'admission', time_window_hours: 24 });

    test('encontro internado completa com o horário de admissão', async () => {
      evidence.setEncounter('p1', {
        encounter_id: 'e1',
        status: 'in-progress',
        encounter_class: 'IMP',
        disposition: null,
        admit_time: at(3),
        discharge_time: null
      });

      expect(await checker.check(request(admit, { now: at(4) }))).toEqual({
        status: ElementStatus.MET,
        completed_at: at(3),
        value: 'IMP',
        notes: `Admitted (IMP) at ${at(3).toISOString()}`
      });
    });

    test('alta para casa sem internação é NOT_MET imediato', async () => {
      const outcome = await checker.check(request(admit, { now: at(4), context: { disposition_home: true } }));
      expect(outcome.status).toBe(ElementStatus.NOT_MET);
      expect(outcome.notes).toBe('Discharged home without admission');
    });

    test('sem decisão ainda aguarda', async () => {
      expect((await checker.check(request(admit, { now: at(4) }))).notes).toBe('Awaiting admission');
    });
  });

  test('checklist de alta usa as notas', async () => {
    const checklist = element({
      data_source: 'age_stratified',
      check: 'discharge_checklist',
      time_window_hours: 48,
      keywords: ['return precautions']
    });
    evidence.addNote('p1', { type: 'discharge', date: at(20), text: 'Return precautions reviewed with family' });

    expect((await checker.check(request(checklist, { now: at(21) }))).value).toBe('return precautions');
  });
});

// ════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ════════════════════════════════════════════════════════════════════════════

describe('CheckerRegistry', () => {
  test('registra as quatro fontes conhecidas', () => {
    const registry = CheckerRegistry.withDefaults(new InMemoryEvidenceSource(), logger);
    expect(['lab', 'medication', 'note', 'age_stratified'].every(s => registry.has(s))).toBe(true);
    expect(registry.has('imaging')).toBe(false);
  });

  test('fonte desconhecida cai no fallback PENDING', async () => {
    const registry = CheckerRegistry.withDefaults(new InMemoryEvidenceSource(), logger);
    const imaging = element({ data_source: 'imaging', time_window_hours: 1 });

    const outcome = await registry.resolve('imaging').check(request(imaging, { now: at(5) }));
    expect(outcome).toEqual({
      status: ElementStatus.PENDING,
      completed_at: null,
      value: null,
      notes: "No checker registered for data source 'imaging'"
    });
  });
});
