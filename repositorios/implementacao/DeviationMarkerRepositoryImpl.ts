import * as path from 'path';
import { JsonFileStore } from '../../utilitarios/JsonFileStore';
import { DeviationMarker, DeviationMarkerRepository } from '../interfaces/DeviationMarkerRepository';
import { RepositoryNotInitializedError } from '../../entidades/AdherenceErrors';
import { asRecord, readDate, readOptionalString, readString } from '../../utilitarios/Revive';

function markerKey(episodeId: string, elementId: string): string {
  return `${episodeId}:${elementId}`;
}

function reviveMarker(raw: unknown): DeviationMarker {
  const rec = asRecord(raw, 'deviation_marker');
  return {
    episode_id: readString(rec, 'episode_id'),
    element_id: readString(rec, 'element_id'),
    alert_id: readOptionalString(rec, 'alert_id'),
    recorded_at: readDate(rec, 'recorded_at')
  };
}

function cloneMarker(m: DeviationMarker): DeviationMarker {
  return { ...m, recorded_at: new Date(m.recorded_at.getTime()) };
}

class DeviationMarkerRepositoryImpl implements DeviationMarkerRepository {
  private store: Map<string, DeviationMarker> = new Map();
  private fileStore: JsonFileStore;
  private initialized: boolean = false;

  constructor(dataDir: string = './data') {
    this.fileStore = new JsonFileStore(path.join(dataDir, 'deviation-markers.json'));
  }

  static async create(dataDir: string = './data'): Promise<DeviationMarkerRepositoryImpl> {
    const repo = new DeviationMarkerRepositoryImpl(dataDir);
    await repo.init();
    return repo;
  }

  async init(): Promise<void> {
    const items = await this.fileStore.readAll();
    this.store.clear();

    for (const raw of items) {
      const marker = reviveMarker(raw);
      this.store.set(markerKey(marker.episode_id, marker.element_id), marker);
    }

    this.initialized = true;
  }

  private checkInitialized(): void {
    if (!this.initialized) {
      throw new RepositoryNotInitializedError('DeviationMarkerRepository');
    }
  }

  private async persist(): Promise<void> {
    await this.fileStore.writeAll(Array.from(this.store.values()));
  }

  async has(episodeId: string, elementId: string): Promise<boolean> {
    this.checkInitialized();
    return this.store.has(markerKey(episodeId, elementId));
  }

  async record(marker: DeviationMarker): Promise<void> {
    this.checkInitialized();

    const key = markerKey(marker.episode_id, marker.element_id);
    if (this.store.has(key)) {
      return;
    }

    this.store.set(key, cloneMarker(marker));
    await this.persist();
  }

  async listByEpisode(episodeId: string): Promise<DeviationMarker[]> {
    this.checkInitialized();

    return Array.from(this.store.values())
      .filter(m => m.episode_id === episodeId)
      .map(cloneMarker);
  }
}

export { DeviationMarkerRepositoryImpl, markerKey };
