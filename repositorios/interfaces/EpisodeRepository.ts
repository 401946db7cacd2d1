import { Episode, EpisodeStatus } from '../../entidades/tipos';

/**
 * Identidade do episódio: um por (paciente, encontro, bundle).
 */
function episodeIdFor(patientId: string, encounterId: string, bundleId: string): string {
  return `${patientId}_${encounterId}_${bundleId}`;
}

interface EpisodeQuery {
  bundle_id?: string;
  status?: EpisodeStatus;
  patient_id?: string;
  /** trigger_time >= trigger_from */
  trigger_from?: Date;
  /** trigger_time <= trigger_to */
  trigger_to?: Date;
  limit?: number;
  cursor?: string;
}

interface EpisodeRepository {
  /**
   * Inicializa o repositório (carrega dados do disco)
   * OBRIGATÓRIO chamar antes de usar qualquer outro método
   * Prefira usar static create() ao invés de constructor + init()
   */
  init(): Promise<void>;

  /**
   * Cria um novo Episode
   * @throws EpisodeAlreadyExistsError se a identidade já existe
   */
  create(episode: Episode): Promise<void>;

  getById(id: string): Promise<Episode | null>;

  /**
   * Busca pela identidade (patient_id, encounter_id, bundle_id)
   */
  getByIdentity(patientId: string, encounterId: string, bundleId: string): Promise<Episode | null>;

  /**
   * Grava o estado avaliado de um episódio existente.
   * Último escritor vence; rejeita saída de estado terminal
   * (do episódio ou de qualquer elemento).
   * @throws EpisodeNotFoundError
   * @throws InvalidTransitionError
   */
  save(episode: Episode): Promise<void>;

  /**
   * Episódios em qualquer um dos status, opcionalmente de um bundle
   */
  listByStatus(statuses: EpisodeStatus[], bundleId?: string): Promise<Episode[]>;

  /**
   * Episódios com alertas de desvio ainda não entregues
   */
  listWithUndeliveredDeviations(): Promise<Episode[]>;

  /**
   * Consulta com filtros, ordenada por trigger_time desc, paginada por cursor
   */
  find(query: EpisodeQuery): Promise<{ episodes: Episode[]; next_cursor?: string }>;

  count(): Promise<number>;

  /**
   * DELETE é PROIBIDO - método não existe
   */
}

export { EpisodeRepository, EpisodeQuery, episodeIdFor };
