import * as path from 'path';
import { randomUUID } from 'crypto';
import { computeEventHash, computePayloadHash } from '../utilitarios/HashUtil';
import { JsonFileStore } from '../utilitarios/JsonFileStore';
import { asRecord, readDate, readOneOf, readOptionalString, readString } from '../utilitarios/Revive';
import { RepositoryNotInitializedError } from '../entidades/AdherenceErrors';
import { EventLogRepository } from './EventLogRepository';
import {
  ChainVerificationResult,
  EVENT_ACTORS,
  EventActor,
  EventLogEntry
} from './EventLogEntry';

// ════════════════════════════════════════════════════════════════════════
// RE-HIDRATAÇÃO
// ════════════════════════════════════════════════════════════════════════

function reviveEntry(raw: unknown): EventLogEntry {
  const rec = asRecord(raw, 'event');
  return {
    id: readString(rec, 'id'),
    timestamp: readDate(rec, 'timestamp'),
    actor: readOneOf(rec, 'actor', EVENT_ACTORS),
    evento: readString(rec, 'evento'),
    entidade: readString(rec, 'entidade'),
    entidade_id: readString(rec, 'entidade_id'),
    payload_hash: readString(rec, 'payload_hash'),
    previous_hash: readOptionalString(rec, 'previous_hash'),
    current_hash: readString(rec, 'current_hash')
  };
}

function cloneEntry(e: EventLogEntry): EventLogEntry {
  return { ...e, timestamp: new Date(e.timestamp.getTime()) };
}

function generateEventId(): string {
  return `evt-${randomUUID()}`;
}

function expectedHash(entry: EventLogEntry): string {
  return computeEventHash(entry.previous_hash, entry);
}

// ════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════

/**
 * Log encadeado em um único arquivo event-log.json.
 */
class EventLogRepositoryImpl implements EventLogRepository {
  private entries: EventLogEntry[] = [];
  private fileStore: JsonFileStore;
  private initialized: boolean = false;

  constructor(dataDir: string = './data', private readonly clock: () => Date = () => new Date()) {
    this.fileStore = new JsonFileStore(path.join(dataDir, 'event-log.json'));
  }

  static async create(dataDir: string = './data', clock?: () => Date): Promise<EventLogRepositoryImpl> {
    const repo = new EventLogRepositoryImpl(dataDir, clock);
    await repo.init();
    return repo;
  }

  async init(): Promise<void> {
    const items = await this.fileStore.readAll();
    this.entries = items.map(reviveEntry);
    this.initialized = true;
  }

  private checkInitialized(): void {
    if (!this.initialized) {
      throw new RepositoryNotInitializedError('EventLogRepository');
    }
  }

  async append(
    actor: EventActor,
    evento: string,
    entidade: string,
    entidadeId: string,
    payload: unknown
  ): Promise<EventLogEntry> {
    this.checkInitialized();

    const last = this.entries[this.entries.length - 1];
    const partial = {
      id: generateEventId(),
      timestamp: this.clock(),
      actor,
      evento,
      entidade,
      entidade_id: entidadeId,
      payload_hash: computePayloadHash(payload),
      previous_hash: last ? last.current_hash : null,
      current_hash: ''
    };
    const entry: EventLogEntry = { ...partial, current_hash: expectedHash(partial) };

    this.entries.push(entry);
    try {
      await this.fileStore.writeAll(this.entries);
    } catch (error) {
      // evento não persistido sai da cadeia
      this.entries.pop();
      throw error;
    }

    return cloneEntry(entry);
  }

  async getAll(): Promise<EventLogEntry[]> {
    this.checkInitialized();
    return this.entries.map(cloneEntry);
  }

  async getByEntidade(entidade: string, entidadeId: string): Promise<EventLogEntry[]> {
    this.checkInitialized();
    return this.entries
      .filter(e => e.entidade === entidade && e.entidade_id === entidadeId)
      .map(cloneEntry);
  }

  async verifyChain(): Promise<ChainVerificationResult> {
    this.checkInitialized();

    for (let i = 0; i < this.entries.length; i++) {
      const cur = this.entries[i];
      const previousHash = i === 0 ? null : this.entries[i - 1].current_hash;

      if (cur.previous_hash !== previousHash) {
        return {
          valid: false,
          firstInvalidIndex: i,
          firstInvalidId: cur.id,
          reason: i === 0 ? 'Genesis com previous_hash não nulo' : 'previous_hash não corresponde ao evento anterior',
          totalVerified: i
        };
      }
      if (cur.current_hash !== expectedHash(cur)) {
        return {
          valid: false,
          firstInvalidIndex: i,
          firstInvalidId: cur.id,
          reason: 'current_hash não corresponde ao conteúdo',
          totalVerified: i
        };
      }
    }

    return { valid: true, totalVerified: this.entries.length };
  }

  async count(): Promise<number> {
    this.checkInitialized();
    return this.entries.length;
  }
}

export { EventLogRepositoryImpl };
