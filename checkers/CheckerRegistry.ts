/**
 * Despacho de verificadores por data_source.
 *
 * Uma implementação por variante conhecida e um fallback explícito para
 * fontes sem verificador: o elemento fica PENDING com nota de diagnóstico,
 * sem derrubar o ciclo.
 */

import { DataSource } from '../entidades/tipos';
import { EvidenceSource } from '../evidencia/EvidenceSource';
import { Logger, createLogger } from '../utilitarios/Logger';
import { CheckOutcome, CheckRequest, ElementChecker, pending } from './ElementChecker';
import { LabChecker } from './LabChecker';
import { MedicationChecker } from './MedicationChecker';
import { NoteChecker } from './NoteChecker';
import { AgeStratifiedChecker } from './AgeStratifiedChecker';

class UnknownSourceChecker implements ElementChecker {
  constructor(private readonly logger: Logger) {}

  async check(request: CheckRequest): Promise<CheckOutcome> {
    const source = request.element.data_source;
    this.logger.warn(
      { episode_id: request.episode.id, element_id: request.element.element_id, data_source: source },
      'no checker registered for data source'
    );
    return pending(`No checker registered for data source '${source}'`);
  }
}

class CheckerRegistry {
  private readonly checkers = new Map<string, ElementChecker>();
  private readonly fallback: ElementChecker;

  constructor(logger: Logger = createLogger('checkers')) {
    this.fallback = new UnknownSourceChecker(logger);
  }

  register(dataSource: string, checker: ElementChecker): this {
    this.checkers.set(dataSource, checker);
    return this;
  }

  has(dataSource: string): boolean {
    return this.checkers.has(dataSource);
  }

  resolve(dataSource: string): ElementChecker {
    return this.checkers.get(dataSource) ?? this.fallback;
  }

  /**
   * Registry com as quatro variantes sobre a mesma fonte de evidência.
   */
  static withDefaults(evidence: EvidenceSource, logger: Logger = createLogger('checkers')): CheckerRegistry {
    const labs = new LabChecker(evidence, logger);
    const medications = new MedicationChecker(evidence, logger);
    const notes = new NoteChecker(evidence, logger);

    return new CheckerRegistry(logger)
      .register(DataSource.LAB, labs)
      .register(DataSource.MEDICATION, medications)
      .register(DataSource.NOTE, notes)
      .register(DataSource.AGE_STRATIFIED, new AgeStratifiedChecker(evidence, logger, labs, medications, notes));
  }
}

export { CheckerRegistry, UnknownSourceChecker };
