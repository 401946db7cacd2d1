import * as path from 'path';
import { JsonFileStore } from '../../utilitarios/JsonFileStore';
import { EpisodeQuery, EpisodeRepository, episodeIdFor } from '../interfaces/EpisodeRepository';
import {
  ElementCheckResult,
  ElementStatus,
  Episode,
  EpisodeStatus
} from '../../entidades/tipos';
import {
  EpisodeAlreadyExistsError,
  EpisodeIntegrityError,
  EpisodeNotFoundError,
  InvalidTransitionError,
  RepositoryNotInitializedError
} from '../../entidades/AdherenceErrors';
import {
  asRecord,
  readArray,
  readDate,
  readOneOf,
  readOptionalDate,
  readOptionalNumber,
  readOptionalString,
  readString,
  readStringArray
} from '../../utilitarios/Revive';

// ════════════════════════════════════════════════════════════════════════
// FUNÇÕES DE RE-HIDRATAÇÃO E CÓPIA
// ════════════════════════════════════════════════════════════════════════

const ELEMENT_STATUSES: readonly ElementStatus[] = Object.values(ElementStatus);
const EPISODE_STATUSES: readonly EpisodeStatus[] = Object.values(EpisodeStatus);

function reviveResult(raw: unknown): ElementCheckResult {
  const rec = asRecord(raw, 'element_results[]');
  const value = rec.value;
  return {
    element_id: readString(rec, 'element_id'),
    element_name: readOptionalString(rec, 'element_name') ?? readString(rec, 'element_id'),
    status: readOneOf(rec, 'status', ELEMENT_STATUSES),
    deadline: readOptionalDate(rec, 'deadline'),
    completed_at: readOptionalDate(rec, 'completed_at'),
    value: typeof value === 'number' || typeof value === 'string' ? value : null,
    notes: readOptionalString(rec, 'notes') ?? ''
  };
}

function reviveEpisode(raw: unknown): Episode {
  const rec = asRecord(raw, 'episode');
  return {
    id: readString(rec, 'id'),
    patient_id: readString(rec, 'patient_id'),
    encounter_id: readString(rec, 'encounter_id'),
    bundle_id: readString(rec, 'bundle_id'),
    bundle_name: readOptionalString(rec, 'bundle_name') ?? readString(rec, 'bundle_id'),
    trigger_time: readDate(rec, 'trigger_time'),
    age_days: readOptionalNumber(rec, 'age_days'),
    patient_mrn: readOptionalString(rec, 'patient_mrn'),
    status: readOneOf(rec, 'status', EPISODE_STATUSES),
    element_results: readArray(rec, 'element_results').map(reviveResult),
    undelivered_deviations: readStringArray(rec, 'undelivered_deviations'),
    created_at: readDate(rec, 'created_at'),
    updated_at: readDate(rec, 'updated_at'),
    last_evaluated_at: readOptionalDate(rec, 'last_evaluated_at'),
    closed_at: readOptionalDate(rec, 'closed_at'),
    close_reason: readOptionalString(rec, 'close_reason')
  };
}

function cloneDate(d: Date | null): Date | null {
  return d ? new Date(d.getTime()) : null;
}

function cloneResult(r: ElementCheckResult): ElementCheckResult {
  return { ...r, deadline: cloneDate(r.deadline), completed_at: cloneDate(r.completed_at) };
}

function cloneEpisode(e: Episode): Episode {
  return {
    ...e,
    trigger_time: new Date(e.trigger_time.getTime()),
    element_results: e.element_results.map(cloneResult),
    undelivered_deviations: [...e.undelivered_deviations],
    created_at: new Date(e.created_at.getTime()),
    updated_at: new Date(e.updated_at.getTime()),
    last_evaluated_at: cloneDate(e.last_evaluated_at),
    closed_at: cloneDate(e.closed_at)
  };
}

// ════════════════════════════════════════════════════════════════════════
// TRANSIÇÕES VÁLIDAS
// ════════════════════════════════════════════════════════════════════════

const TRANSICOES_EPISODE: Record<EpisodeStatus, EpisodeStatus[]> = {
  [EpisodeStatus.ACTIVE]: [EpisodeStatus.COMPLETE, EpisodeStatus.CLOSED],
  [EpisodeStatus.COMPLETE]: [EpisodeStatus.CLOSED],
  [EpisodeStatus.CLOSED]: []
};

function isTerminal(status: ElementStatus): boolean {
  return status !== ElementStatus.PENDING;
}

// ════════════════════════════════════════════════════════════════════════
// CURSOR (PAGINAÇÃO)
// ════════════════════════════════════════════════════════════════════════

interface ParsedCursor {
  ts: number;
  id: string;
}

function parseCursor(cursor?: string): ParsedCursor | null {
  if (!cursor) return null;
  const sep = cursor.indexOf('|');
  if (sep <= 0) return null;
  const ts = Number(cursor.slice(0, sep));
  const id = cursor.slice(sep + 1);
  if (!Number.isFinite(ts) || !id) return null;
  return { ts, id };
}

function makeCursor(e: Episode): string {
  return `${e.trigger_time.getTime()}|${e.id}`;
}

/**
 * Ordenação: trigger_time DESC, id DESC (mais recente primeiro)
 */
function compareDesc(a: Episode, b: Episode): number {
  const diff = b.trigger_time.getTime() - a.trigger_time.getTime();
  if (diff !== 0) return diff;
  return b.id.localeCompare(a.id);
}

// ════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════

class EpisodeRepositoryImpl implements EpisodeRepository {
  private store: Map<string, Episode> = new Map();
  private fileStore: JsonFileStore;
  private initialized: boolean = false;

  // Índice por status: Map<status, Set<episode_id>>
  private byStatus: Map<EpisodeStatus, Set<string>> = new Map();

  constructor(dataDir: string = './data') {
    this.fileStore = new JsonFileStore(path.join(dataDir, 'episodes.json'));
    this.resetIndexes();
  }

  static async create(dataDir: string = './data'): Promise<EpisodeRepositoryImpl> {
    const repo = new EpisodeRepositoryImpl(dataDir);
    await repo.init();
    return repo;
  }

  async init(): Promise<void> {
    const items = await this.fileStore.readAll();
    this.store.clear();
    this.resetIndexes();

    for (const raw of items) {
      const episode = reviveEpisode(raw);
      this.store.set(episode.id, episode);
      this.indexStatus(episode.id, null, episode.status);
    }

    this.initialized = true;
  }

  private resetIndexes(): void {
    this.byStatus.clear();
    for (const status of EPISODE_STATUSES) {
      this.byStatus.set(status, new Set());
    }
  }

  private indexStatus(id: string, previous: EpisodeStatus | null, next: EpisodeStatus): void {
    if (previous !== null) {
      this.byStatus.get(previous)?.delete(id);
    }
    this.byStatus.get(next)?.add(id);
  }

  private checkInitialized(): void {
    if (!this.initialized) {
      throw new RepositoryNotInitializedError('EpisodeRepository');
    }
  }

  private async persist(): Promise<void> {
    await this.fileStore.writeAll(Array.from(this.store.values()));
  }

  async create(episode: Episode): Promise<void> {
    this.checkInitialized();

    if (this.store.has(episode.id)) {
      throw new EpisodeAlreadyExistsError(episode.id);
    }

    this.validateEpisode(episode);

    const clone = cloneEpisode(episode);
    this.store.set(clone.id, clone);
    this.indexStatus(clone.id, null, clone.status);

    await this.persist();
  }

  async getById(id: string): Promise<Episode | null> {
    this.checkInitialized();

    const episode = this.store.get(id);
    return episode ? cloneEpisode(episode) : null;
  }

  async getByIdentity(patientId: string, encounterId: string, bundleId: string): Promise<Episode | null> {
    return this.getById(episodeIdFor(patientId, encounterId, bundleId));
  }

  async save(episode: Episode): Promise<void> {
    this.checkInitialized();

    const current = this.store.get(episode.id);
    if (!current) {
      throw new EpisodeNotFoundError(episode.id);
    }

    this.validateEpisode(episode);
    this.validateTransition(current, episode);

    const clone = cloneEpisode(episode);
    this.store.set(clone.id, clone);
    this.indexStatus(clone.id, current.status, clone.status);

    await this.persist();
  }

  async listByStatus(statuses: EpisodeStatus[], bundleId?: string): Promise<Episode[]> {
    this.checkInitialized();

    const result: Episode[] = [];
    for (const status of statuses) {
      for (const id of this.byStatus.get(status) ?? []) {
        const episode = this.store.get(id);
        if (episode && (bundleId === undefined || episode.bundle_id === bundleId)) {
          result.push(cloneEpisode(episode));
        }
      }
    }
    return result.sort(compareDesc);
  }

  async listWithUndeliveredDeviations(): Promise<Episode[]> {
    this.checkInitialized();

    return Array.from(this.store.values())
      .filter(e => e.undelivered_deviations.length > 0)
      .map(cloneEpisode)
      .sort(compareDesc);
  }

  async find(query: EpisodeQuery): Promise<{ episodes: Episode[]; next_cursor?: string }> {
    this.checkInitialized();

    const candidates = query.status !== undefined
      ? Array.from(this.byStatus.get(query.status) ?? [])
          .map(id => this.store.get(id))
          .filter((e): e is Episode => e !== undefined)
      : Array.from(this.store.values());

    const cursor = parseCursor(query.cursor);
    const filtered = candidates
      .filter(e => query.bundle_id === undefined || e.bundle_id === query.bundle_id)
      .filter(e => query.patient_id === undefined || e.patient_id === query.patient_id)
      .filter(e => query.trigger_from === undefined || e.trigger_time >= query.trigger_from)
      .filter(e => query.trigger_to === undefined || e.trigger_time <= query.trigger_to)
      .filter(e => {
        if (!cursor) return true;
        const ts = e.trigger_time.getTime();
        return ts < cursor.ts || (ts === cursor.ts && e.id < cursor.id);
      })
      .sort(compareDesc);

    const limit = query.limit ?? filtered.length;
    const page = filtered.slice(0, limit);
    const hasMore = filtered.length > page.length;

    return {
      episodes: page.map(cloneEpisode),
      next_cursor: hasMore && page.length > 0 ? makeCursor(page[page.length - 1]) : undefined
    };
  }

  async count(): Promise<number> {
    this.checkInitialized();
    return this.store.size;
  }

  // ════════════════════════════════════════════════════════════════════════
  // VALIDAÇÃO
  // ════════════════════════════════════════════════════════════════════════

  private validateEpisode(episode: Episode): void {
    if (episode.id !== episodeIdFor(episode.patient_id, episode.encounter_id, episode.bundle_id)) {
      throw new EpisodeIntegrityError(episode.id, `Episode id ${episode.id} não corresponde à identidade (patient, encounter, bundle)`);
    }

    const seen = new Set<string>();
    for (const result of episode.element_results) {
      if (seen.has(result.element_id)) {
        throw new EpisodeIntegrityError(episode.id, `Episode ${episode.id}: element_id duplicado ${result.element_id}`);
      }
      seen.add(result.element_id);
    }

    if (episode.status !== EpisodeStatus.CLOSED) {
      const anyPending = episode.element_results.some(r => r.status === ElementStatus.PENDING);
      const expected = anyPending ? EpisodeStatus.ACTIVE : EpisodeStatus.COMPLETE;
      if (episode.status !== expected) {
        throw new EpisodeIntegrityError(episode.id, `Episode ${episode.id}: status ${episode.status} inconsistente com elementos (esperado ${expected})`);
      }
    }
  }

  private validateTransition(current: Episode, next: Episode): void {
    if (current.status !== next.status && !TRANSICOES_EPISODE[current.status].includes(next.status)) {
      throw new InvalidTransitionError('Episode', current.id, current.status, next.status);
    }

    for (const before of current.element_results) {
      if (!isTerminal(before.status)) continue;
      const after = next.element_results.find(r => r.element_id === before.element_id);
      if (!after || after.status !== before.status) {
        throw new InvalidTransitionError(
          'ElementCheckResult',
          `${current.id}/${before.element_id}`,
          before.status,
          after?.status ?? 'REMOVED'
        );
      }
    }
  }
}

export { EpisodeRepositoryImpl, reviveEpisode, cloneEpisode, TRANSICOES_EPISODE };
