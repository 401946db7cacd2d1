import pino, { Logger } from 'pino';

// ════════════════════════════════════════════════════════════════════════
// LOGGER ESTRUTURADO
// ════════════════════════════════════════════════════════════════════════

/**
 * Mesmo logger (pino) usado pelo Fastify no gateway.
 * Nível via LOG_LEVEL; silencioso em NODE_ENV=test.
 */

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = LOG_LEVELS.find(l => l === env.LOG_LEVEL);
  if (requested) {
    return requested;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let root: Logger | null = null;

function rootLogger(): Logger {
  if (!root) {
    root = pino({ name: 'adherence', level: resolveLogLevel() });
  }
  return root;
}

function createLogger(component: string): Logger {
  return rootLogger().child({ component });
}

/**
 * Substitui o logger raiz (CLI --verbose, testes).
 */
function setRootLogger(logger: Logger): void {
  root = logger;
}

export { Logger, LogLevel, LOG_LEVELS, resolveLogLevel, createLogger, setRootLogger };
