/**
 * Configuração do monitor (ciclo de avaliação e CLI).
 */

import { ConfigValidationError } from '../entidades/AdherenceErrors';
import { DEFAULT_CATALOG_PATH } from '../catalogo/loadBundleCatalog';
import { LogLevel, resolveLogLevel } from '../utilitarios/Logger';
import { oneOf } from '../utilitarios/Revive';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

type NodeEnv = 'development' | 'production' | 'test';

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

interface MonitorConfig {
  /**
   * Diretório dos arquivos JSON (default: './data')
   */
  dataDir: string;

  catalogPath: string;

  /**
   * Bundles monitorados; vazio = todo o catálogo
   */
  enabledBundles: string[];

  /**
   * Intervalo entre ciclos no modo daemon (default: 15)
   */
  checkIntervalMinutes: number;

  /**
   * false: desvios só vão para o log, sem alerta
   */
  alertOnFirstDeviation: boolean;

  /**
   * Servidor FHIR R4; null = evidência por fixture
   */
  fhirBaseUrl: string | null;
  fhirToken: string | null;
  fhirTimeoutMs: number;

  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

const CHECK_INTERVAL_MINUTES = 15;

const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  dataDir: './data',
  catalogPath: DEFAULT_CATALOG_PATH,
  enabledBundles: [],
  checkIntervalMinutes: CHECK_INTERVAL_MINUTES,
  alertOnFirstDeviation: true,
  fhirBaseUrl: null,
  fhirToken: null,
  fhirTimeoutMs: 30_000,
  logLevel: 'info',
  nodeEnv: 'development'
};

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Variáveis de ambiente:
 * - DATA_DIR
 * - CATALOG_PATH
 * - ENABLED_BUNDLES (separados por vírgula)
 * - CHECK_INTERVAL_MINUTES
 * - ALERT_ON_FIRST_DEVIATION
 * - FHIR_BASE_URL, FHIR_TOKEN, FHIR_TIMEOUT_MS
 * - LOG_LEVEL
 * - NODE_ENV
 */
function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  return {
    dataDir: env.DATA_DIR || DEFAULT_MONITOR_CONFIG.dataDir,
    catalogPath: env.CATALOG_PATH || DEFAULT_MONITOR_CONFIG.catalogPath,
    enabledBundles: splitList(env.ENABLED_BUNDLES),
    checkIntervalMinutes: parseNumber(env.CHECK_INTERVAL_MINUTES, DEFAULT_MONITOR_CONFIG.checkIntervalMinutes),
    alertOnFirstDeviation: parseFlag(env.ALERT_ON_FIRST_DEVIATION, DEFAULT_MONITOR_CONFIG.alertOnFirstDeviation),
    fhirBaseUrl: env.FHIR_BASE_URL || null,
    fhirToken: env.FHIR_TOKEN || null,
    fhirTimeoutMs: parseNumber(env.FHIR_TIMEOUT_MS, DEFAULT_MONITOR_CONFIG.fhirTimeoutMs),
    logLevel: resolveLogLevel(env),
    nodeEnv: oneOf(env.NODE_ENV, NODE_ENVS) ?? DEFAULT_MONITOR_CONFIG.nodeEnv
  };
}

/**
 * @throws ConfigValidationError
 */
function validateMonitorConfig(config: MonitorConfig): void {
  if (!config.dataDir) {
    throw new ConfigValidationError('dataDir is required');
  }
  if (!config.catalogPath) {
    throw new ConfigValidationError('catalogPath is required');
  }
  if (!Number.isFinite(config.checkIntervalMinutes) || config.checkIntervalMinutes <= 0) {
    throw new ConfigValidationError(`Invalid CHECK_INTERVAL_MINUTES: ${config.checkIntervalMinutes}`);
  }
  if (!Number.isInteger(config.fhirTimeoutMs) || config.fhirTimeoutMs <= 0) {
    throw new ConfigValidationError(`Invalid FHIR_TIMEOUT_MS: ${config.fhirTimeoutMs}`);
  }
  if (config.fhirBaseUrl !== null && !/^https?:\/\//.test(config.fhirBaseUrl)) {
    throw new ConfigValidationError(`Invalid FHIR_BASE_URL: ${config.fhirBaseUrl}`);
  }
}

export {
  NodeEnv,
  NODE_ENVS,
  MonitorConfig,
  CHECK_INTERVAL_MINUTES,
  DEFAULT_MONITOR_CONFIG,
  splitList,
  parseNumber,
  parseFlag,
  loadMonitorConfig,
  validateMonitorConfig
};
