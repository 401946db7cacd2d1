interface DeviationMarker {
  episode_id: string;
  element_id: string;
  alert_id: string | null;
  recorded_at: Date;
}

/**
 * Marcador durável por (episode_id, element_id): registra que o desvio
 * já foi alertado. Sobrevive a reinícios do processo.
 */
interface DeviationMarkerRepository {
  init(): Promise<void>;

  has(episodeId: string, elementId: string): Promise<boolean>;

  /**
   * Idempotente: um marcador existente é mantido como está.
   */
  record(marker: DeviationMarker): Promise<void>;

  listByEpisode(episodeId: string): Promise<DeviationMarker[]>;

  /**
   * DELETE é PROIBIDO - método não existe
   */
}

export { DeviationMarker, DeviationMarkerRepository };
