#!/usr/bin/env node
/**
 * Server Entrypoint
 *
 * Uso:
 *   npx ts-node gateway/server.ts
 *
 * Variaveis de ambiente:
 *   GATEWAY_PORT          - Porta HTTP (default: 3000)
 *   GATEWAY_HOST          - Host para bind (default: 0.0.0.0)
 *   GATEWAY_ADMIN_TOKEN   - Token das rotas protegidas (obrigatorio em prod)
 *   GATEWAY_CORS_ORIGINS  - Origens CORS (comma-separated, default: *)
 *   DATA_DIR, CATALOG_PATH, ENABLED_BUNDLES, FHIR_BASE_URL, ... (monitor)
 *   LOG_LEVEL             - Nivel de log (default: info)
 *   NODE_ENV              - Ambiente (development/production/test)
 */

import { loadGatewayConfig, validateGatewayConfig } from './GatewayConfig';
import { buildApp } from './app';
import { createLogger } from '../utilitarios/Logger';

const logger = createLogger('server');

// ════════════════════════════════════════════════════════════════════════════
// MAIN
// ════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const config = loadGatewayConfig();
  validateGatewayConfig(config);

  logger.info({
    port: config.port,
    host: config.host,
    dataDir: config.monitor.dataDir,
    env: config.nodeEnv,
    adminToken: config.adminToken ? 'configured' : 'not set'
  }, 'starting gateway');

  const app = await buildApp({ config });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'shutting down');
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(err => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(err => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  });

  await app.listen({
    port: config.port,
    host: config.host
  });
}

main().catch((error) => {
  logger.fatal({ err: error }, 'failed to start gateway');
  process.exit(1);
});
