// ════════════════════════════════════════════════════════════════════════
// ENUMERAÇÕES
// ════════════════════════════════════════════════════════════════════════

enum ElementStatus {
  PENDING = 'PENDING',
  MET = 'MET',
  NOT_MET = 'NOT_MET',
  NOT_APPLICABLE = 'NOT_APPLICABLE'
}

enum EpisodeStatus {
  ACTIVE = 'ACTIVE',
  COMPLETE = 'COMPLETE',
  CLOSED = 'CLOSED'
}

enum AgeGroup {
  DAYS_0_7 = '0-7',
  DAYS_8_21 = '8-21',
  DAYS_22_28 = '22-28',
  DAYS_29_60 = '29-60',
  UNKNOWN = 'unknown'
}

/**
 * Capacidades conhecidas de verificação. Um elemento pode declarar
 * outra fonte no catálogo; nesse caso cai no fallback do registry.
 */
enum DataSource {
  LAB = 'lab',
  MEDICATION = 'medication',
  NOTE = 'note',
  AGE_STRATIFIED = 'age_stratified'
}

enum MedicationCategory {
  BROAD_SPECTRUM_ANTIBIOTIC = 'broad_spectrum_antibiotic',
  PARENTERAL_ANTIBIOTIC = 'parenteral_antibiotic',
  CRYSTALLOID_BOLUS = 'crystalloid_bolus',
  ANTIVIRAL = 'antiviral'
}

/**
 * Variantes do verificador estratificado por idade.
 */
enum StratifiedCheck {
  LAB = 'lab',
  PARENTERAL_ANTIBIOTIC = 'parenteral_antibiotic',
  HSV_ASSESSMENT = 'hsv_assessment',
  ADMISSION = 'admission',
  DISCHARGE_CHECKLIST = 'discharge_checklist'
}

type DeviationSeverity = 'critical' | 'warning' | 'info';

type ComparisonOperator = 'gt' | 'gte' | 'lt' | 'lte';

/**
 * Flags booleanas do PatientContext utilizáveis em `applies_when`.
 */
type ContextFlag =
  | 'inflammatory_markers_abnormal'
  | 'ua_abnormal'
  | 'lp_performed'
  | 'disposition_home';

const CONTEXT_FLAGS: readonly ContextFlag[] = [
  'inflammatory_markers_abnormal',
  'ua_abnormal',
  'lp_performed',
  'disposition_home'
];

// ════════════════════════════════════════════════════════════════════════
// DEFINIÇÃO DE BUNDLE (imutável, vinda do catálogo)
// ════════════════════════════════════════════════════════════════════════

interface NoteWindow {
  start_hours: number;
  end_hours: number;
}

/**
 * Aresta de dependência: aplicabilidade e conclusão do elemento dependem
 * do `value` registrado em outro elemento do mesmo bundle.
 */
interface ElementDependency {
  element_id: string;
  operator: ComparisonOperator;
  threshold: number;
}

interface BundleElement {
  element_id: string;
  name: string;
  description: string;
  required: boolean;
  /** null = sem prazo */
  time_window_hours: number | null;
  data_source: string;

  severity: DeviationSeverity;
  recommendation: string | null;

  // Gating
  age_groups: AgeGroup[] | null;
  applies_when: ContextFlag[];
  depends_on: ElementDependency | null;

  // Configuração de evidência
  result_codes: string[];
  medication_category: MedicationCategory | null;
  requires_shock: boolean;
  keywords: string[];
  note_types: string[];
  note_window: NoteWindow | null;
  min_matching_notes: number;
  check: StratifiedCheck | null;
}

interface GuidelineBundle {
  bundle_id: string;
  name: string;
  description: string;
  version: string;
  excluded_age_groups: AgeGroup[];
  elements: BundleElement[];
}

// ════════════════════════════════════════════════════════════════════════
// EVIDÊNCIA CLÍNICA (leitura pontual na fonte externa)
// ════════════════════════════════════════════════════════════════════════

type EvidenceValue = string | number | null;

interface LabResult {
  code: string;
  value: EvidenceValue;
  unit: string | null;
  effective_time: Date;
}

interface MedicationAdministration {
  name: string;
  dose: string | null;
  route: string | null;
  admin_time: Date;
}

interface VitalSign {
  code: string;
  value: number | null;
  effective_time: Date;
}

interface ClinicalNote {
  type: string;
  date: Date;
  text: string;
}

interface PatientDemographics {
  patient_id: string;
  birth_date: Date | null;
  mrn: string | null;
  name: string | null;
}

interface EncounterInfo {
  encounter_id: string;
  status: string;
  encounter_class: string | null;
  disposition: string | null;
  admit_time: Date | null;
  discharge_time: Date | null;
}

// ════════════════════════════════════════════════════════════════════════
// CONTEXTO DERIVADO
// ════════════════════════════════════════════════════════════════════════

/**
 * Recalculado no início de cada ciclo: a evidência acumula com o tempo.
 */
interface PatientContext {
  age_days: number | null;
  age_group: AgeGroup;
  inflammatory_markers_abnormal: boolean;
  ua_abnormal: boolean;
  lp_performed: boolean;
  disposition_home: boolean;
}

// ════════════════════════════════════════════════════════════════════════
// ENTIDADES PRINCIPAIS
// ════════════════════════════════════════════════════════════════════════

interface ElementCheckResult {
  element_id: string;
  element_name: string;
  status: ElementStatus;
  deadline: Date | null;
  completed_at: Date | null;
  value: EvidenceValue;
  notes: string;
}

/**
 * Identidade = (patient_id, encounter_id, bundle_id).
 * Nunca deletado; CLOSED é o estado terminal de tombstone.
 */
interface Episode {
  id: string;
  patient_id: string;
  encounter_id: string;
  bundle_id: string;
  bundle_name: string;
  trigger_time: Date;
  age_days: number | null;
  patient_mrn: string | null;
  status: EpisodeStatus;
  element_results: ElementCheckResult[];
  /** element_ids cujo alerta falhou e será reenviado no próximo ciclo */
  undelivered_deviations: string[];
  created_at: Date;
  updated_at: Date;
  last_evaluated_at: Date | null;
  closed_at: Date | null;
  close_reason: string | null;
}

/**
 * Entrada do trigger finder externo.
 */
interface TriggerMatch {
  patient_id: string;
  encounter_id: string;
  onset_time: Date;
  age_days?: number | null;
  mrn?: string | null;
}

/**
 * Derivado; persistido apenas como chave de deduplicação.
 */
interface Deviation {
  key: string;
  episode_id: string;
  element_id: string;
  severity: DeviationSeverity;
  title: string;
  summary: string;
  recommendation: string;
  result: ElementCheckResult;
}

export {
  ElementStatus,
  EpisodeStatus,
  AgeGroup,
  DataSource,
  MedicationCategory,
  StratifiedCheck,
  DeviationSeverity,
  ComparisonOperator,
  ContextFlag,
  CONTEXT_FLAGS,
  NoteWindow,
  ElementDependency,
  BundleElement,
  GuidelineBundle,
  EvidenceValue,
  LabResult,
  MedicationAdministration,
  VitalSign,
  ClinicalNote,
  PatientDemographics,
  EncounterInfo,
  PatientContext,
  ElementCheckResult,
  Episode,
  TriggerMatch,
  Deviation
};
