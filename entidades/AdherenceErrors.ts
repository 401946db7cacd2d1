/**
 * Erros do motor de adesão.
 *
 * Nenhum destes erros é fatal para o processo: o avaliador os captura na
 * fronteira de cada episódio e o gateway os traduz para códigos HTTP.
 */

// ════════════════════════════════════════════════════════════════════════════
// CLASSE BASE
// ════════════════════════════════════════════════════════════════════════════

class AdherenceError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AdherenceError';
    this.code = code;
    this.details = details;
  }
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS ESPECÍFICOS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Definição de bundle inválida no catálogo.
 */
class CatalogValidationError extends AdherenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CATALOG_INVALID', details);
    this.name = 'CatalogValidationError';
  }
}

class BundleNotFoundError extends AdherenceError {
  constructor(bundleId: string) {
    super(`Bundle ${bundleId} não encontrado no catálogo`, 'BUNDLE_NOT_FOUND', { bundleId });
    this.name = 'BundleNotFoundError';
  }
}

/**
 * Falha ao consultar a fonte de evidência clínica.
 */
class EvidenceSourceError extends AdherenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EVIDENCE_UNAVAILABLE', details);
    this.name = 'EvidenceSourceError';
  }
}

class EpisodeNotFoundError extends AdherenceError {
  constructor(episodeId: string) {
    super(`Episódio ${episodeId} não encontrado`, 'EPISODE_NOT_FOUND', { episodeId });
    this.name = 'EpisodeNotFoundError';
  }
}

class EpisodeAlreadyExistsError extends AdherenceError {
  constructor(episodeId: string) {
    super(`Episódio ${episodeId} já existe`, 'EPISODE_ALREADY_EXISTS', { episodeId });
    this.name = 'EpisodeAlreadyExistsError';
  }
}

/**
 * Episódio CLOSED nunca é reavaliado.
 */
class EpisodeClosedError extends AdherenceError {
  constructor(episodeId: string) {
    super(`Episódio ${episodeId} está encerrado`, 'EPISODE_CLOSED', { episodeId });
    this.name = 'EpisodeClosedError';
  }
}

class InvalidTransitionError extends AdherenceError {
  constructor(entity: string, id: string, from: string, to: string) {
    super(
      `Transição inválida para ${entity} ${id}: ${from} → ${to}`,
      'INVALID_TRANSITION',
      { entity, id, from, to }
    );
    this.name = 'InvalidTransitionError';
  }
}

class RepositoryNotInitializedError extends AdherenceError {
  constructor(repository: string) {
    super(`${repository} não inicializado. Chame init() primeiro.`, 'REPOSITORY_NOT_INITIALIZED');
    this.name = 'RepositoryNotInitializedError';
  }
}

class AlertNotFoundError extends AdherenceError {
  constructor(alertId: string) {
    super(`Alerta ${alertId} não encontrado`, 'ALERT_NOT_FOUND', { alertId });
    this.name = 'AlertNotFoundError';
  }
}

/**
 * Episódio que viola a própria identidade ou a consistência status/elementos.
 */
class EpisodeIntegrityError extends AdherenceError {
  constructor(episodeId: string, message: string) {
    super(message, 'EPISODE_INVALID', { episodeId });
    this.name = 'EpisodeIntegrityError';
  }
}

class ConfigValidationError extends AdherenceError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Erros de fs e fetch nascem no realm do Node e falham `instanceof Error`
 * dentro de um vm (Jest); por isso a checagem é pela forma.
 */
function isErrorLike(error: unknown): error is { name: string; message: string } {
  return typeof error === 'object' && error !== null
    && 'message' in error && typeof error.message === 'string'
    && 'name' in error && typeof error.name === 'string';
}

function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

// ════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ════════════════════════════════════════════════════════════════════════════

export {
  AdherenceError,
  CatalogValidationError,
  BundleNotFoundError,
  EvidenceSourceError,
  EpisodeNotFoundError,
  EpisodeAlreadyExistsError,
  EpisodeClosedError,
  InvalidTransitionError,
  RepositoryNotInitializedError,
  AlertNotFoundError,
  EpisodeIntegrityError,
  ConfigValidationError,
  isErrorLike,
  errorMessage
};
