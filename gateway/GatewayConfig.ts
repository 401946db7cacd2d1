/**
 * Configuração do gateway HTTP.
 *
 * O gateway embute a configuração do monitor: o mesmo motor atende
 * as rotas e os ciclos disparados por POST /api/v1/cycles.
 */

import { ConfigValidationError } from '../entidades/AdherenceErrors';
import {
  MonitorConfig,
  NodeEnv,
  loadMonitorConfig,
  splitList,
  validateMonitorConfig
} from '../orquestrador/MonitorConfig';
import { LogLevel } from '../utilitarios/Logger';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface GatewayConfig {
  /**
   * Porta HTTP (default: 3000)
   */
  port: number;

  /**
   * Host para bind (default: '0.0.0.0')
   */
  host: string;

  /**
   * Bearer token exigido em todas as rotas exceto /health*.
   * Obrigatorio em producao.
   */
  adminToken: string;

  /**
   * Origens CORS permitidas (default: ['*'])
   */
  corsOrigins: string[];

  nodeEnv: NodeEnv;

  logLevel: LogLevel;

  monitor: MonitorConfig;
}

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

const DEFAULT_GATEWAY_PORT = 3000;
const DEFAULT_GATEWAY_HOST = '0.0.0.0';
const DEFAULT_CORS_ORIGINS = ['*'];

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

/**
 * Variaveis de ambiente:
 * - GATEWAY_PORT
 * - GATEWAY_HOST
 * - GATEWAY_ADMIN_TOKEN
 * - GATEWAY_CORS_ORIGINS (comma-separated)
 * - e todas as do monitor (DATA_DIR, CATALOG_PATH, ...)
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const monitor = loadMonitorConfig(env);
  const corsOrigins = splitList(env.GATEWAY_CORS_ORIGINS);

  return {
    port: parseInt(env.GATEWAY_PORT || String(DEFAULT_GATEWAY_PORT), 10),
    host: env.GATEWAY_HOST || DEFAULT_GATEWAY_HOST,
    adminToken: env.GATEWAY_ADMIN_TOKEN || '',
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : [...DEFAULT_CORS_ORIGINS],
    nodeEnv: monitor.nodeEnv,
    logLevel: monitor.logLevel,
    monitor
  };
}

/**
 * @throws ConfigValidationError
 */
export function validateGatewayConfig(config: GatewayConfig): void {
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new ConfigValidationError(`Invalid port: ${config.port}`);
  }

  if (config.nodeEnv === 'production' && !config.adminToken) {
    throw new ConfigValidationError('GATEWAY_ADMIN_TOKEN is required in production');
  }

  validateMonitorConfig(config.monitor);
}

export { DEFAULT_GATEWAY_PORT, DEFAULT_GATEWAY_HOST, DEFAULT_CORS_ORIGINS };
