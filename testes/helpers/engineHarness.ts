/**
 * Montagem do avaliador para testes: diretório temporário, evidência em
 * memória, relógio controlável e sink de alertas com falha sob demanda.
 */

import { GuidelineBundle } from '../../entidades/tipos';
import { InMemoryBundleCatalog } from '../../catalogo/BundleCatalog';
import { parseBundleDefinition } from '../../catalogo/BundleDefinitionParser';
import { EpisodeRepositoryImpl } from '../../repositorios/implementacao/EpisodeRepositoryImpl';
import { DeviationMarkerRepositoryImpl } from '../../repositorios/implementacao/DeviationMarkerRepositoryImpl';
import { JsonFileAlertStore } from '../../alertas/JsonFileAlertStore';
import { AlertSink, NewAlert } from '../../alertas/AlertSink';
import { EventLogRepositoryImpl } from '../../event-log/EventLogRepositoryImpl';
import {
  AlertSinkDeviationLedger,
  InMemoryDeviationLedger,
  PersistentDeviationLedger
} from '../../deduplicacao/DeviationLedger';
import { DeviationDeduplicator } from '../../deduplicacao/DeviationDeduplicator';
import { InMemoryEvidenceSource } from '../../evidencia/InMemoryEvidenceSource';
import { CheckerRegistry } from '../../checkers/CheckerRegistry';
import { ElementChecker } from '../../checkers/ElementChecker';
import { PatientContextBuilder } from '../../contexto/PatientContextBuilder';
import { EpisodeEvaluator } from '../../orquestrador/EpisodeEvaluator';
import { addHours } from '../../utilitarios/TimeWindow';
import { TestDataDir, createTestDataDir } from './testDataDir';

// ════════════════════════════════════════════════════════════════════════════
// BUNDLE DE TESTE
// ════════════════════════════════════════════════════════════════════════════

const T0 = new Date('2026-03-01T10:00:00.000Z');

function at(hours: number): Date {
  return addHours(T0, hours);
}

/**
 * Quatro elementos: laboratório, antibiótico, repetição condicional e nota opcional.
 */
function testBundle(): GuidelineBundle {
  return parseBundleDefinition({
    bundle_id: 'test_bundle',
    name: 'Test Bundle',
    elements: [
      {
        element_id: 'lab_first',
        name: 'First lab',
        time_window_hours: 1,
        data_source: 'lab',
        result_codes: ['L1'],
        severity: 'critical',
        recommendation: 'Draw the first lab.'
      },
      {
        element_id: 'abx',
        name: 'Antibiotics',
        time_window_hours: 2,
        data_source: 'medication',
        medication_category: 'broad_spectrum_antibiotic'
      },
      {
        element_id: 'lab_repeat',
        name: 'Repeat lab',
        time_window_hours: 6,
        data_source: 'lab',
        result_codes: ['L1'],
        depends_on: { element_id: 'lab_first', operator: 'gt', threshold: 2 }
      },
      {
        element_id: 'doc',
        name: 'Reassessment note',
        time_window_hours: 4,
        data_source: 'note',
        keywords: ['Reassessment'],
        required: false
      }
    ]
  });
}

// ════════════════════════════════════════════════════════════════════════════
// COLABORADORES CONTROLÁVEIS
// ════════════════════════════════════════════════════════════════════════════

class MutableClock {
  constructor(public now: Date = T0) {}

  set(date: Date): void {
    this.now = date;
  }

  read = (): Date => this.now;
}

/**
 * Delegação para o store real; cada operação pode falhar sob demanda.
 */
class FlakyAlertSink implements AlertSink {
  failChecks = false;
  failSaves = false;

  constructor(readonly inner: JsonFileAlertStore) {}

  async checkIfAlerted(kind: string, sourceId: string, includeResolved: boolean): Promise<boolean> {
    if (this.failChecks) throw new Error('alert sink offline');
    return this.inner.checkIfAlerted(kind, sourceId, includeResolved);
  }

  async saveAlert(alert: NewAlert): Promise<string> {
    if (this.failSaves) throw new Error('alert sink offline');
    return this.inner.saveAlert(alert);
  }

  async markSent(alertId: string): Promise<boolean> {
    return this.inner.markSent(alertId);
  }
}

// ════════════════════════════════════════════════════════════════════════════
// HARNESS
// ════════════════════════════════════════════════════════════════════════════

interface HarnessOptions {
  bundles?: GuidelineBundle[];
  alertOnDeviation?: boolean;
  checkers?: Record<string, ElementChecker>;
  /** Reaproveita um diretório existente (simula reinício) */
  dataDir?: TestDataDir;
}

interface Harness {
  dataDir: TestDataDir;
  clock: MutableClock;
  catalog: InMemoryBundleCatalog;
  evidence: InMemoryEvidenceSource;
  episodes: EpisodeRepositoryImpl;
  markers: DeviationMarkerRepositoryImpl;
  alerts: JsonFileAlertStore;
  sink: FlakyAlertSink;
  eventLog: EventLogRepositoryImpl;
  memory: InMemoryDeviationLedger;
  deduplicator: DeviationDeduplicator;
  evaluator: EpisodeEvaluator;
}

async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const dataDir = options.dataDir ?? await createTestDataDir('engine');
  const clock = new MutableClock();
  const catalog = new InMemoryBundleCatalog(options.bundles ?? [testBundle()]);
  const evidence = new InMemoryEvidenceSource();

  const episodes = await EpisodeRepositoryImpl.create(dataDir.dir);
  const markers = await DeviationMarkerRepositoryImpl.create(dataDir.dir);
  const alerts = await JsonFileAlertStore.create(dataDir.dir, clock.read);
  const eventLog = await EventLogRepositoryImpl.create(dataDir.dir, clock.read);
  const sink = new FlakyAlertSink(alerts);

  const memory = new InMemoryDeviationLedger();
  const deduplicator = new DeviationDeduplicator(
    memory,
    new PersistentDeviationLedger(markers),
    new AlertSinkDeviationLedger(sink)
  );

  const checkers = CheckerRegistry.withDefaults(evidence);
  for (const [source, checker] of Object.entries(options.checkers ?? {})) {
    checkers.register(source, checker);
  }

  const evaluator = new EpisodeEvaluator({
    catalog,
    episodes,
    checkers,
    contextBuilder: new PatientContextBuilder(evidence),
    alerts: sink,
    deduplicator,
    eventLog,
    clock: clock.read,
    alertOnDeviation: options.alertOnDeviation
  });
  await evaluator.init();

  return { dataDir, clock, catalog, evidence, episodes, markers, alerts, sink, eventLog, memory, deduplicator, evaluator };
}

export { T0, at, testBundle, MutableClock, FlakyAlertSink, HarnessOptions, Harness, createHarness };
