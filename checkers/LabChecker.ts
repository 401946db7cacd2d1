/**
 * Verificador de resultados laboratoriais.
 *
 * O resultado mais antigo com timestamp <= prazo satisfaz o elemento.
 * Elementos dependentes (depends_on) exigem um segundo resultado,
 * estritamente posterior ao que completou o pré-requisito.
 */

import { LabResult } from '../entidades/tipos';
import {
  BaseElementChecker,
  CheckOutcome,
  CheckRequest,
  Completion,
  normalizeValue,
  pending
} from './ElementChecker';
import { byTime, isOnTime } from '../utilitarios/TimeWindow';

class LabChecker extends BaseElementChecker {
  async check(request: CheckRequest): Promise<CheckOutcome> {
    const { element } = request;
    if (element.result_codes.length === 0) {
      return pending('No result codes configured');
    }

    const results = await this.fetchResults(request);
    const repeat = element.depends_on !== null;

    return this.conclude(
      request,
      repeat ? this.findRepeat(request, results) : this.findFirst(request, results),
      repeat ? `repeat result (${element.result_codes.join(', ')})` : `result (${element.result_codes.join(', ')})`
    );
  }

  async fetchResults(request: CheckRequest, codes = request.element.result_codes): Promise<LabResult[]> {
    const { episode } = request;
    const results = await this.safely(request, 'labs', () =>
      this.evidence.getLabResults(episode.patient_id, codes, episode.trigger_time)
    );
    return results
      .filter(r => r.effective_time >= episode.trigger_time)
      .sort(byTime(r => r.effective_time));
  }

  /**
   * Primeiro resultado dentro do prazo.
   */
  findFirst(request: CheckRequest, sorted: LabResult[]): Completion | null {
    const limit = this.deadlineOf(request);
    const first = sorted.find(r => isOnTime(r.effective_time, limit));
    return first ? toCompletion(first, 'Result') : null;
  }

  private findRepeat(request: CheckRequest, sorted: LabResult[]): Completion | null {
    const limit = this.deadlineOf(request);
    const after = request.prerequisite?.completed_at ?? null;
    const repeat = sorted.find(r =>
      (after === null || r.effective_time > after) && isOnTime(r.effective_time, limit)
    );
    return repeat ? toCompletion(repeat, 'Repeat result') : null;
  }
}

function toCompletion(result: LabResult, label: string): Completion {
  const unit = result.unit ? ` ${result.unit}` : '';
  return {
    at: result.effective_time,
    value: normalizeValue(result.value),
    notes: `${label} ${result.code} = ${result.value ?? 'n/a'}${unit} at ${result.effective_time.toISOString()}`
  };
}

export { LabChecker };
