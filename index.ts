/**
 * Motor de adesão a bundles de diretrizes clínicas.
 *
 * Ponto de entrada da biblioteca; o gateway HTTP fica em ./gateway.
 */

// Entidades
export * from './entidades/tipos';
export * from './entidades/AdherenceErrors';

// Catálogo
export { BundleCatalog, InMemoryBundleCatalog } from './catalogo/BundleCatalog';
export { DEFAULT_CATALOG_PATH, parseBundleCatalogYaml, loadBundleCatalog } from './catalogo/loadBundleCatalog';
export { parseBundleDefinition, parseBundleElement } from './catalogo/BundleDefinitionParser';

// Evidência
export { EvidenceSource } from './evidencia/EvidenceSource';
export { InMemoryEvidenceSource, EvidenceFixture } from './evidencia/InMemoryEvidenceSource';
export { FhirEvidenceSource, FhirEvidenceSourceOptions } from './evidencia/FhirEvidenceSource';

// Contexto e checkers
export { PatientContextBuilder, ageGroupFor } from './contexto/PatientContextBuilder';
export { Applicability, resolveApplicability } from './contexto/ApplicabilityResolver';
export { ElementChecker, BaseElementChecker, CheckRequest, CheckOutcome } from './checkers/ElementChecker';
export { CheckerRegistry } from './checkers/CheckerRegistry';

// Deduplicação e alertas
export { DeviationDeduplicator, DedupDecision } from './deduplicacao/DeviationDeduplicator';
export { deviationKey, DeviationLedger, LedgerTier } from './deduplicacao/DeviationLedger';
export { AlertSink, Alert, NewAlert, AlertStatus } from './alertas/AlertSink';
export { JsonFileAlertStore } from './alertas/JsonFileAlertStore';

// Persistência
export { EpisodeRepository, EpisodeQuery, episodeIdFor } from './repositorios/interfaces/EpisodeRepository';
export { EpisodeRepositoryImpl } from './repositorios/implementacao/EpisodeRepositoryImpl';
export { DeviationMarkerRepository } from './repositorios/interfaces/DeviationMarkerRepository';
export { DeviationMarkerRepositoryImpl } from './repositorios/implementacao/DeviationMarkerRepositoryImpl';
export { EventLogRepositoryImpl } from './event-log/EventLogRepositoryImpl';

// Orquestração
export {
  EpisodeEvaluator,
  EpisodeEvaluation,
  CycleReport,
  CycleOptions,
  DeviationOutcome
} from './orquestrador/EpisodeEvaluator';
export { MonitorRunner, RunnerCycleResult, RunnerStatus } from './orquestrador/MonitorRunner';
export { TriggerFinder, StaticTriggerFinder } from './orquestrador/TriggerFinder';
export { MonitorConfig, DEFAULT_MONITOR_CONFIG, loadMonitorConfig, validateMonitorConfig } from './orquestrador/MonitorConfig';
export { Engine, EngineOptions, createEngine } from './orquestrador/createEngine';

// Conformidade
export {
  ComplianceAggregator,
  BundleComplianceReport,
  EpisodeAdherence,
  episodeAdherence
} from './servicos/ComplianceAggregator';

export { Logger, createLogger } from './utilitarios/Logger';
