/**
 * Montagem do motor: catálogo, repositórios, alertas, log, deduplicação,
 * evidência e avaliador. Compartilhada pelo gateway e pela CLI.
 */

import * as fs from 'fs/promises';
import { InMemoryBundleCatalog } from '../catalogo/BundleCatalog';
import { loadBundleCatalog } from '../catalogo/loadBundleCatalog';
import { EpisodeRepositoryImpl } from '../repositorios/implementacao/EpisodeRepositoryImpl';
import { DeviationMarkerRepositoryImpl } from '../repositorios/implementacao/DeviationMarkerRepositoryImpl';
import { JsonFileAlertStore } from '../alertas/JsonFileAlertStore';
import { EventLogRepositoryImpl } from '../event-log/EventLogRepositoryImpl';
import {
  AlertSinkDeviationLedger,
  InMemoryDeviationLedger,
  PersistentDeviationLedger
} from '../deduplicacao/DeviationLedger';
import { DeviationDeduplicator } from '../deduplicacao/DeviationDeduplicator';
import { EvidenceSource } from '../evidencia/EvidenceSource';
import { FhirEvidenceSource } from '../evidencia/FhirEvidenceSource';
import { InMemoryEvidenceSource } from '../evidencia/InMemoryEvidenceSource';
import { CheckerRegistry } from '../checkers/CheckerRegistry';
import { PatientContextBuilder } from '../contexto/PatientContextBuilder';
import { ComplianceAggregator } from '../servicos/ComplianceAggregator';
import { EpisodeEvaluator } from './EpisodeEvaluator';
import { MonitorConfig } from './MonitorConfig';
import { MonitorRunner } from './MonitorRunner';
import { StaticTriggerFinder, TriggerFinder } from './TriggerFinder';
import { createLogger } from '../utilitarios/Logger';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

interface EngineOptions {
  config: MonitorConfig;
  /** Fixture JSON com pacientes e triggers; usado quando não há FHIR */
  fixturesPath?: string;
  /** Substitui a fonte derivada da config (testes) */
  evidence?: EvidenceSource;
  triggerFinder?: TriggerFinder;
  dryRun?: boolean;
  bundleIds?: string[];
  clock?: () => Date;
}

interface Engine {
  config: MonitorConfig;
  catalog: InMemoryBundleCatalog;
  episodes: EpisodeRepositoryImpl;
  markers: DeviationMarkerRepositoryImpl;
  alerts: JsonFileAlertStore;
  eventLog: EventLogRepositoryImpl;
  evidence: EvidenceSource;
  evaluator: EpisodeEvaluator;
  compliance: ComplianceAggregator;
  runner: MonitorRunner;
}

// ════════════════════════════════════════════════════════════════════════════
// EVIDÊNCIA
// ════════════════════════════════════════════════════════════════════════════

interface EvidenceSetup {
  evidence: EvidenceSource;
  triggerFinder?: TriggerFinder;
}

async function resolveEvidence(options: EngineOptions): Promise<EvidenceSetup> {
  const { config } = options;

  if (options.evidence) {
    return { evidence: options.evidence, triggerFinder: options.triggerFinder };
  }

  if (config.fhirBaseUrl) {
    return {
      evidence: new FhirEvidenceSource({
        baseUrl: config.fhirBaseUrl,
        token: config.fhirToken ?? undefined,
        timeout: config.fhirTimeoutMs
      }),
      triggerFinder: options.triggerFinder
    };
  }

  if (options.fixturesPath) {
    const fixture = await InMemoryEvidenceSource.fromFixtureFile(options.fixturesPath);
    return {
      evidence: fixture.source,
      triggerFinder: options.triggerFinder ?? new StaticTriggerFinder(fixture.triggers)
    };
  }

  // Sem FHIR e sem fixture: nenhuma evidência, episódios só expiram
  return { evidence: new InMemoryEvidenceSource(), triggerFinder: options.triggerFinder };
}

// ════════════════════════════════════════════════════════════════════════════
// MONTAGEM
// ════════════════════════════════════════════════════════════════════════════

async function createEngine(options: EngineOptions): Promise<Engine> {
  const { config } = options;
  const clock = options.clock ?? (() => new Date());

  await fs.mkdir(config.dataDir, { recursive: true });

  const catalog = await loadBundleCatalog(config.catalogPath, config.enabledBundles);
  const episodes = await EpisodeRepositoryImpl.create(config.dataDir);
  const markers = await DeviationMarkerRepositoryImpl.create(config.dataDir);
  const alerts = await JsonFileAlertStore.create(config.dataDir, clock);
  const eventLog = await EventLogRepositoryImpl.create(config.dataDir, clock);

  const { evidence, triggerFinder } = await resolveEvidence(options);

  const deduplicator = new DeviationDeduplicator(
    new InMemoryDeviationLedger(),
    new PersistentDeviationLedger(markers),
    new AlertSinkDeviationLedger(alerts),
    createLogger('dedup')
  );

  const evaluator = new EpisodeEvaluator({
    catalog,
    episodes,
    checkers: CheckerRegistry.withDefaults(evidence, createLogger('checkers')),
    contextBuilder: new PatientContextBuilder(evidence, createLogger('patient-context')),
    alerts,
    deduplicator,
    eventLog,
    logger: createLogger('evaluator'),
    clock,
    alertOnDeviation: config.alertOnFirstDeviation
  });
  await evaluator.init();

  const runner = new MonitorRunner({
    evaluator,
    catalog,
    triggerFinder,
    intervalMinutes: config.checkIntervalMinutes,
    bundleIds: options.bundleIds,
    dryRun: options.dryRun,
    logger: createLogger('runner'),
    clock
  });

  return {
    config,
    catalog,
    episodes,
    markers,
    alerts,
    eventLog,
    evidence,
    evaluator,
    compliance: new ComplianceAggregator(episodes, catalog, clock),
    runner
  };
}

export { EngineOptions, Engine, createEngine };
