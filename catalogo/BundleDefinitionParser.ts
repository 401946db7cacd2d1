/**
 * Validação de definições de bundle.
 *
 * Converte o objeto cru (YAML, JSON ou literal em teste) em GuidelineBundle
 * imutável, aplicando os defaults de cada campo opcional.
 *
 * REGRAS:
 * - element_id único dentro do bundle
 * - depends_on aponta para outro elemento do mesmo bundle
 * - janelas não negativas; note_window com start < end
 * - check obrigatório quando data_source = age_stratified
 */

import {
  AgeGroup,
  BundleElement,
  CONTEXT_FLAGS,
  ComparisonOperator,
  DataSource,
  DeviationSeverity,
  ElementDependency,
  GuidelineBundle,
  MedicationCategory,
  NoteWindow,
  StratifiedCheck
} from '../entidades/tipos';
import { CatalogValidationError } from '../entidades/AdherenceErrors';
import {
  RecordShapeError,
  UnknownRecord,
  asRecord,
  readArray,
  readBoolean,
  readNumber,
  readOneOf,
  readOptionalNumber,
  readOptionalString,
  readString,
  readStringArray,
  oneOf
} from '../utilitarios/Revive';

// ════════════════════════════════════════════════════════════════════════════
// VOCABULÁRIOS FECHADOS
// ════════════════════════════════════════════════════════════════════════════

const AGE_GROUPS: readonly AgeGroup[] = Object.values(AgeGroup);
const MEDICATION_CATEGORIES: readonly MedicationCategory[] = Object.values(MedicationCategory);
const STRATIFIED_CHECKS: readonly StratifiedCheck[] = Object.values(StratifiedCheck);
const SEVERITIES: readonly DeviationSeverity[] = ['critical', 'warning', 'info'];
const OPERATORS: readonly ComparisonOperator[] = ['gt', 'gte', 'lt', 'lte'];

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

function withPath<T>(where: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof RecordShapeError) {
      throw new CatalogValidationError(`${where}: ${error.message}`, { where });
    }
    throw error;
  }
}

function readOneOfList<T extends string>(
  rec: UnknownRecord,
  key: string,
  allowed: readonly T[],
  where: string
): T[] {
  return readStringArray(rec, key).map(raw => {
    const value = oneOf(raw, allowed);
    if (value === undefined) {
      throw new CatalogValidationError(
        `${where}: valor '${raw}' inválido em ${key} (permitidos: ${allowed.join(', ')})`,
        { where, key, value: raw }
      );
    }
    return value;
  });
}

function readOptionalOneOf<T extends string>(
  rec: UnknownRecord,
  key: string,
  allowed: readonly T[]
): T | null {
  if (rec[key] === undefined || rec[key] === null) {
    return null;
  }
  return readOneOf(rec, key, allowed);
}

function parseNoteWindow(rec: UnknownRecord, where: string): NoteWindow | null {
  if (rec.note_window === undefined || rec.note_window === null) {
    return null;
  }
  const raw = asRecord(rec.note_window, 'note_window');
  const window = {
    start_hours: readNumber(raw, 'start_hours'),
    end_hours: readNumber(raw, 'end_hours')
  };
  if (window.start_hours < 0 || window.end_hours <= window.start_hours) {
    throw new CatalogValidationError(`${where}: note_window exige 0 <= start_hours < end_hours`, { where });
  }
  return window;
}

function parseDependency(rec: UnknownRecord): ElementDependency | null {
  if (rec.depends_on === undefined || rec.depends_on === null) {
    return null;
  }
  const raw = asRecord(rec.depends_on, 'depends_on');
  return {
    element_id: readString(raw, 'element_id'),
    operator: readOneOf(raw, 'operator', OPERATORS),
    threshold: readNumber(raw, 'threshold')
  };
}

// ════════════════════════════════════════════════════════════════════════════
// PARSE
// ════════════════════════════════════════════════════════════════════════════

function parseBundleElement(raw: unknown, bundleId: string): BundleElement {
  const rec = withPath(bundleId, () => asRecord(raw, 'element'));
  const elementId = withPath(bundleId, () => readString(rec, 'element_id'));
  const where = `${bundleId}.${elementId}`;

  return withPath(where, () => {
    const timeWindow = readOptionalNumber(rec, 'time_window_hours');
    if (timeWindow !== null && timeWindow < 0) {
      throw new CatalogValidationError(`${where}: time_window_hours negativo`, { where });
    }

    const dataSource = readString(rec, 'data_source');
    const check = readOptionalOneOf(rec, 'check', STRATIFIED_CHECKS);
    if (dataSource === DataSource.AGE_STRATIFIED && check === null) {
      throw new CatalogValidationError(`${where}: data_source age_stratified exige 'check'`, { where });
    }

    const minMatching = readOptionalNumber(rec, 'min_matching_notes') ?? 1;
    if (!Number.isInteger(minMatching) || minMatching < 1) {
      throw new CatalogValidationError(`${where}: min_matching_notes deve ser inteiro >= 1`, { where });
    }

    const ageGroups = rec.age_groups === undefined || rec.age_groups === null
      ? null
      : readOneOfList(rec, 'age_groups', AGE_GROUPS, where);

    const element: BundleElement = {
      element_id: elementId,
      name: readString(rec, 'name'),
      description: readOptionalString(rec, 'description') ?? '',
      required: readBoolean(rec, 'required', true),
      time_window_hours: timeWindow,
      data_source: dataSource,
      severity: readOptionalOneOf(rec, 'severity', SEVERITIES) ?? 'warning',
      recommendation: readOptionalString(rec, 'recommendation'),
      age_groups: ageGroups,
      applies_when: readOneOfList(rec, 'applies_when', CONTEXT_FLAGS, where),
      depends_on: parseDependency(rec),
      result_codes: readStringArray(rec, 'result_codes'),
      medication_category: readOptionalOneOf(rec, 'medication_category', MEDICATION_CATEGORIES),
      requires_shock: readBoolean(rec, 'requires_shock', false),
      keywords: readStringArray(rec, 'keywords').map(k => k.toLowerCase()),
      note_types: readStringArray(rec, 'note_types'),
      note_window: parseNoteWindow(rec, where),
      min_matching_notes: minMatching,
      check
    };
    return element;
  });
}

function parseBundleDefinition(raw: unknown): GuidelineBundle {
  const rec = withPath('bundle', () => asRecord(raw, 'bundle'));
  const bundleId = withPath('bundle', () => readString(rec, 'bundle_id'));

  const bundle = withPath(bundleId, (): GuidelineBundle => ({
    bundle_id: bundleId,
    name: readString(rec, 'name'),
    description: readOptionalString(rec, 'description') ?? '',
    version: readOptionalString(rec, 'version') ?? '1',
    excluded_age_groups: readOneOfList(rec, 'excluded_age_groups', AGE_GROUPS, bundleId),
    elements: readArray(rec, 'elements').map(e => parseBundleElement(e, bundleId))
  }));

  if (bundle.elements.length === 0) {
    throw new CatalogValidationError(`${bundleId}: bundle sem elementos`, { bundleId });
  }

  const ids = new Set<string>();
  for (const element of bundle.elements) {
    if (ids.has(element.element_id)) {
      throw new CatalogValidationError(
        `${bundleId}: element_id duplicado '${element.element_id}'`,
        { bundleId, elementId: element.element_id }
      );
    }
    ids.add(element.element_id);
  }

  for (const element of bundle.elements) {
    const dep = element.depends_on;
    if (dep && (dep.element_id === element.element_id || !ids.has(dep.element_id))) {
      throw new CatalogValidationError(
        `${bundleId}.${element.element_id}: depends_on aponta para '${dep.element_id}' inexistente`,
        { bundleId, elementId: element.element_id, dependsOn: dep.element_id }
      );
    }
  }

  return bundle;
}

export { parseBundleDefinition, parseBundleElement };
