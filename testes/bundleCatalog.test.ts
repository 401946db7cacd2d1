import * as fs from 'fs/promises';
import { AgeGroup, DataSource, MedicationCategory, StratifiedCheck } from '../entidades/tipos';
import { BundleNotFoundError, CatalogValidationError } from '../entidades/AdherenceErrors';
import { parseBundleDefinition } from '../catalogo/BundleDefinitionParser';
import { InMemoryBundleCatalog } from '../catalogo/BundleCatalog';
import { DEFAULT_CATALOG_PATH, loadBundleCatalog, parseBundleCatalogYaml } from '../catalogo/loadBundleCatalog';
import { TestDataDir, createTestDataDir } from './helpers/testDataDir';
import { testBundle } from './helpers/engineHarness';

const minimal = (elements: unknown[], extra: Record<string, unknown> = {}): unknown => ({
  bundle_id: 'b',
  name: 'Bundle B',
  elements,
  ...extra
});

describe('Catálogo de bundles', () => {
  // ══════════════════════════════════════════════════════════════════════════
  // PARSER
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 1: parseBundleDefinition', () => {
    test('aplica defaults aos campos opcionais', () => {
      const bundle = parseBundleDefinition(minimal([{ element_id: 'e1', name: 'E1', data_source: 'lab' }]));

      expect(bundle.version).toBe('1');
      expect(bundle.description).toBe('');
      expect(bundle.excluded_age_groups).toEqual([]);
      expect(bundle.elements[0]).toEqual({
        element_id: 'e1',
        name: 'E1',
        description: '',
        required: true,
        time_window_hours: null,
        data_source: 'lab',
        severity: 'warning',
        recommendation: null,
        age_groups: null,
        applies_when: [],
        depends_on: null,
        result_codes: [],
        medication_category: null,
        requires_shock: false,
        keywords: [],
        note_types: [],
        note_window: null,
        min_matching_notes: 1,
        check: null
      });
    });

    test('keywords são normalizadas para minúsculas', () => {
      const bundle = parseBundleDefinition(minimal([
        { element_id: 'n', name: 'N', data_source: 'note', keywords: ['Margins Marked', 'HSV'] }
      ]));
      expect(bundle.elements[0].keywords).toEqual(['margins marked', 'hsv']);
    });

    test('bundle sem elementos é rejeitado', () => {
      expect(() => parseBundleDefinition(minimal([]))).toThrow(new CatalogValidationError('b: bundle sem elementos'));
    });

    test('element_id duplicado é rejeitado', () => {
      const raw = minimal([
        { element_id: 'e1', name: 'E1', data_source: 'lab' },
        { element_id: 'e1', name: 'E1 again', data_source: 'lab' }
      ]);
      expect(() => parseBundleDefinition(raw)).toThrow("b: element_id duplicado 'e1'");
    });

    test('depends_on para elemento inexistente ou para si mesmo', () => {
      const dangling = minimal([
        { element_id: 'e1', name: 'E1', data_source: 'lab', depends_on: { element_id: 'zz', operator: 'gt', threshold: 1 } }
      ]);
      expect(() => parseBundleDefinition(dangling)).toThrow("b.e1: depends_on aponta para 'zz' inexistente");

      const self = minimal([
        { element_id: 'e1', name: 'E1', data_source: 'lab', depends_on: { element_id: 'e1', operator: 'gt', threshold: 1 } }
      ]);
      expect(() => parseBundleDefinition(self)).toThrow("b.e1: depends_on aponta para 'e1' inexistente");
    });

    test('operador desconhecido em depends_on', () => {
      const raw = minimal([
        { element_id: 'e1', name: 'E1', data_source: 'lab' },
        { element_id: 'e2', name: 'E2', data_source: 'lab', depends_on: { element_id: 'e1', operator: 'eq', threshold: 1 } }
      ]);
      expect(() => parseBundleDefinition(raw))
        .toThrow("b.e2: Campo 'operator' inválido: esperado um de [gt, gte, lt, lte]");
    });

    test('age_stratified exige check', () => {
      const raw = minimal([{ element_id: 'lp', name: 'LP', data_source: 'age_stratified' }]);
      expect(() => parseBundleDefinition(raw)).toThrow("b.lp: data_source age_stratified exige 'check'");
    });

    test('janelas inválidas', () => {
      expect(() => parseBundleDefinition(minimal([
        { element_id: 'e1', name: 'E1', data_source: 'lab', time_window_hours: -1 }
      ]))).toThrow('b.e1: time_window_hours negativo');

      expect(() => parseBundleDefinition(minimal([
        { element_id: 'n', name: 'N', data_source: 'note', note_window: { start_hours: 72, end_hours: 48 } }
      ]))).toThrow('b.n: note_window exige 0 <= start_hours < end_hours');
    });

    test('min_matching_notes deve ser inteiro positivo', () => {
      expect(() => parseBundleDefinition(minimal([
        { element_id: 'n', name: 'N', data_source: 'note', min_matching_notes: 0 }
      ]))).toThrow('b.n: min_matching_notes deve ser inteiro >= 1');
    });

    test('faixa etária desconhecida', () => {
      expect(() => parseBundleDefinition(minimal([{ element_id: 'e1', name: 'E1', data_source: 'lab' }], {
        excluded_age_groups: ['0-365']
      }))).toThrow("b: valor '0-365' inválido em excluded_age_groups");
    });

    test('campo com tipo errado carrega o caminho', () => {
      expect(() => parseBundleDefinition(minimal([{ element_id: 'e1', name: 42, data_source: 'lab' }])))
        .toThrow("b.e1: Campo 'name' inválido: esperado string");
      expect(() => parseBundleDefinition({ name: 'sem id', elements: [] }))
        .toThrow("bundle: Campo 'bundle_id' inválido: esperado string");
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // CATÁLOGO EM MEMÓRIA
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 2: InMemoryBundleCatalog', () => {
    test('get, require e list', () => {
      const catalog = new InMemoryBundleCatalog([testBundle()]);

      expect(catalog.get('test_bundle')?.name).toBe('Test Bundle');
      expect(catalog.get('missing')).toBeNull();
      expect(catalog.list().map(b => b.bundle_id)).toEqual(['test_bundle']);
      expect(() => catalog.require('missing')).toThrow(BundleNotFoundError);
    });

    test('definições ficam congeladas', () => {
      const catalog = new InMemoryBundleCatalog([testBundle()]);
      const bundle = catalog.require('test_bundle');

      expect(Object.isFrozen(bundle)).toBe(true);
      expect(Object.isFrozen(bundle.elements)).toBe(true);
      expect(Object.isFrozen(bundle.elements[0])).toBe(true);
      expect(Object.isFrozen(bundle.elements[0].result_codes)).toBe(true);
    });

    test('bundle_id duplicado no catálogo', () => {
      expect(() => new InMemoryBundleCatalog([testBundle(), testBundle()]))
        .toThrow('bundle_id duplicado no catálogo: test_bundle');
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // YAML
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 3: carregamento de YAML', () => {
    let testDir: TestDataDir;

    beforeEach(async () => {
      testDir = await createTestDataDir('catalog');
    });

    afterEach(async () => {
      await testDir.cleanup();
    });

    test('catálogo padrão traz os quatro bundles', async () => {
      const catalog = await loadBundleCatalog();

      expect(catalog.list().map(b => [b.bundle_id, b.elements.length])).toEqual([
        ['sepsis_peds_2024', 6],
        ['febrile_infant_2024', 13],
        ['fn_peds_2024', 3],
        ['ssti_peds_2024', 2]
      ]);
    });

    test('campos do catálogo padrão chegam tipados', async () => {
      const catalog = await loadBundleCatalog(DEFAULT_CATALOG_PATH);
      const sepsis = catalog.require('sepsis_peds_2024');
      const infant = catalog.require('febrile_infant_2024');

      const fluids = sepsis.elements.find(e => e.element_id === 'sepsis_fluid_bolus');
      expect(fluids?.medication_category).toBe(MedicationCategory.CRYSTALLOID_BOLUS);
      expect(fluids?.requires_shock).toBe(true);

      const repeat = sepsis.elements.find(e => e.element_id === 'sepsis_repeat_lactate');
      expect(repeat?.depends_on).toEqual({ element_id: 'sepsis_lactate', operator: 'gt', threshold: 2 });

      const reassess = sepsis.elements.find(e => e.element_id === 'sepsis_reassess_48h');
      expect(reassess?.note_window).toEqual({ start_hours: 48, end_hours: 72 });

      expect(infant.excluded_age_groups).toEqual([AgeGroup.DAYS_0_7]);
      const hsv = infant.elements.find(e => e.element_id === 'fi_hsv_risk_assessment');
      expect(hsv?.data_source).toBe(DataSource.AGE_STRATIFIED);
      expect(hsv?.check).toBe(StratifiedCheck.HSV_ASSESSMENT);
      expect(hsv?.age_groups).toEqual([AgeGroup.DAYS_8_21, AgeGroup.DAYS_22_28]);
    });

    test('habilitar um subconjunto de bundles', async () => {
      const catalog = await loadBundleCatalog(DEFAULT_CATALOG_PATH, ['fn_peds_2024']);
      expect(catalog.list().map(b => b.bundle_id)).toEqual(['fn_peds_2024']);
    });

    test('bundle habilitado inexistente', async () => {
      const file = testDir.file('bundles.yaml');
      await fs.writeFile(file, [
        'bundles:',
        '  - bundle_id: only',
        '    name: Only',
        '    elements:',
        '      - element_id: e1',
        '        name: E1',
        '        data_source: lab',
        ''
      ].join('\n'));

      await expect(loadBundleCatalog(file, ['ghost']))
        .rejects.toThrow(`${file}: bundle habilitado 'ghost' não existe`);
    });

    test('documento sem lista de bundles', () => {
      expect(() => parseBundleCatalogYaml('name: nothing here', 'inline.yaml'))
        .toThrow("inline.yaml: esperado objeto com lista 'bundles'");
    });

    test('YAML malformado vira CatalogValidationError', () => {
      expect(() => parseBundleCatalogYaml('bundles: [unclosed', 'broken.yaml')).toThrow(CatalogValidationError);
    });
  });
});
