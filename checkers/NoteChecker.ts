/**
 * Verificador de documentação em texto livre.
 *
 * Procura notas com alguma palavra-chave do elemento. Quando o elemento
 * define note_window, a janela interna [start_hours, end_hours] fica
 * aninhada no prazo externo: antes de start_hours o elemento nem abre.
 */

import { ClinicalNote } from '../entidades/tipos';
import {
  BaseElementChecker,
  CheckOutcome,
  CheckRequest,
  Completion,
  pending
} from './ElementChecker';
import { addHours, byTime, isOnTime } from '../utilitarios/TimeWindow';

function matchKeyword(text: string, keywords: readonly string[]): string | null {
  const lower = text.toLowerCase();
  return keywords.find(k => lower.includes(k)) ?? null;
}

class NoteChecker extends BaseElementChecker {
  async check(request: CheckRequest): Promise<CheckOutcome> {
    const { element, episode, now } = request;
    if (element.keywords.length === 0) {
      return pending('No documentation keywords configured');
    }

    const window = element.note_window;
    if (window) {
      const opensAt = addHours(episode.trigger_time, window.start_hours);
      if (now < opensAt) {
        return pending(`Documentation window opens at ${opensAt.toISOString()}`);
      }
    }

    return this.conclude(
      request,
      await this.findDocumentation(request),
      'documentation',
      this.effectiveWindowHours(request)
    );
  }

  /**
   * Prazo efetivo: o menor entre a janela do elemento e o fim da note_window.
   */
  private effectiveWindowHours(request: CheckRequest): number | null {
    const { element } = request;
    if (!element.note_window) return element.time_window_hours;
    if (element.time_window_hours === null) return element.note_window.end_hours;
    return Math.min(element.time_window_hours, element.note_window.end_hours);
  }

  /**
   * N-ésima nota qualificadora (N = min_matching_notes) dentro da janela.
   */
  async findDocumentation(request: CheckRequest): Promise<Completion | null> {
    const { element, episode } = request;
    const opensAt = element.note_window
      ? addHours(episode.trigger_time, element.note_window.start_hours)
      : episode.trigger_time;
    const limit = this.deadlineOf(request, this.effectiveWindowHours(request));

    const notes = await this.safely<ClinicalNote>(request, 'notes', () =>
      this.evidence.getRecentNotes(episode.patient_id, episode.trigger_time, element.note_types)
    );

    const matching = notes
      .filter(n => n.date >= opensAt && isOnTime(n.date, limit))
      .sort(byTime(n => n.date))
      .map(n => ({ note: n, keyword: matchKeyword(n.text, element.keywords) }))
      .filter(m => m.keyword !== null);

    const completing = matching[element.min_matching_notes - 1];
    if (!completing) return null;

    const count = element.min_matching_notes > 1 ? ` (${element.min_matching_notes} notes)` : '';
    return {
      at: completing.note.date,
      value: completing.keyword,
      notes: `Documented in ${completing.note.type} note at ${completing.note.date.toISOString()}${count}`
    };
  }
}

export { NoteChecker, matchKeyword };
