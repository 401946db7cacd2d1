// ════════════════════════════════════════════════════════════════════════
// ARITMÉTICA DE PRAZO E JANELA
// ════════════════════════════════════════════════════════════════════════

/**
 * Todas as comparações temporais do motor passam por estas funções.
 *
 * INVARIANTES:
 * - deadline(t, w) == t + w horas; sem janela não há prazo
 * - evidência é aceita se datada em ou antes do prazo (<=)
 * - a janela expira quando now deixa de ser < deadline
 */

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

function addHours(base: Date, hours: number): Date {
  return new Date(base.getTime() + hours * MS_PER_HOUR);
}

function deadline(triggerTime: Date, windowHours: number | null): Date | null {
  if (windowHours === null) {
    return null;
  }
  return addHours(triggerTime, windowHours);
}

function withinWindow(now: Date, triggerTime: Date, windowHours: number | null): boolean {
  const limit = deadline(triggerTime, windowHours);
  if (limit === null) {
    return true;
  }
  return now.getTime() < limit.getTime();
}

function isOnTime(evidenceTime: Date, limit: Date | null): boolean {
  return limit === null || evidenceTime.getTime() <= limit.getTime();
}

/**
 * Dias civis inteiros (UTC) entre duas datas.
 */
function wholeDaysBetween(from: Date, to: Date): number {
  const start = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  const end = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());
  return Math.floor((end - start) / MS_PER_DAY);
}

function byTime<T>(getTime: (item: T) => Date): (a: T, b: T) => number {
  return (a, b) => getTime(a).getTime() - getTime(b).getTime();
}

export { MS_PER_HOUR, MS_PER_DAY, addHours, deadline, withinWindow, isOnTime, wholeDaysBetween, byTime };
