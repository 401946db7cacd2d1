#!/usr/bin/env node

/**
 * ════════════════════════════════════════════════════════════════════════════
 * MONITOR DE ADESÃO A BUNDLES
 * ════════════════════════════════════════════════════════════════════════════
 *
 * Uso:
 *   npm run monitor -- --once
 *   npm run monitor -- --daemon --interval 5
 *   npm run monitor -- --status
 *   npm run monitor -- --once --dry-run --fixtures fixtures/demo.json
 *
 * Opções:
 *   --once               um ciclo e sai (default)
 *   --daemon             ciclos a cada --interval minutos até SIGINT/SIGTERM
 *   --status             resumo dos episódios, alertas e event log
 *   --bundle <id>        restringe a um bundle (repetível)
 *   --interval <min>     sobrescreve CHECK_INTERVAL_MINUTES
 *   --dry-run            avalia sem persistir, alertar ou abrir episódios
 *   --data-dir <dir>     sobrescreve DATA_DIR
 *   --catalog <path>     sobrescreve CATALOG_PATH
 *   --fixtures <json>    evidência e triggers de um arquivo (sem FHIR)
 *   --verbose            LOG_LEVEL=debug
 */

import pino from 'pino';
import { ConfigValidationError, errorMessage } from '../entidades/AdherenceErrors';
import { EpisodeStatus } from '../entidades/tipos';
import { MonitorConfig, loadMonitorConfig, validateMonitorConfig } from '../orquestrador/MonitorConfig';
import { Engine, createEngine } from '../orquestrador/createEngine';
import { RunnerCycleResult } from '../orquestrador/MonitorRunner';
import { ALERT_STATUSES } from '../alertas/AlertSink';
import { createLogger, setRootLogger } from '../utilitarios/Logger';

// ════════════════════════════════════════════════════════════════════════════
// ARGUMENTOS
// ════════════════════════════════════════════════════════════════════════════

type MonitorMode = 'once' | 'daemon' | 'status';

interface MonitorArgs {
  mode: MonitorMode;
  bundles: string[];
  interval?: number;
  dryRun: boolean;
  dataDir?: string;
  catalog?: string;
  fixtures?: string;
  verbose: boolean;
}

/**
 * @throws ConfigValidationError para opção desconhecida ou sem valor
 */
function parseMonitorArgs(argv: string[]): MonitorArgs {
  const args: MonitorArgs = { mode: 'once', bundles: [], dryRun: false, verbose: false };

  const valueOf = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigValidationError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    switch (flag) {
      case '--once': args.mode = 'once'; break;
      case '--daemon': args.mode = 'daemon'; break;
      case '--status': args.mode = 'status'; break;
      case '--dry-run': args.dryRun = true; break;
      case '--verbose': args.verbose = true; break;
      case '--bundle': args.bundles.push(valueOf(i, flag)); i++; break;
      case '--data-dir': args.dataDir = valueOf(i, flag); i++; break;
      case '--catalog': args.catalog = valueOf(i, flag); i++; break;
      case '--fixtures': args.fixtures = valueOf(i, flag); i++; break;
      case '--interval': {
        const raw = valueOf(i, flag);
        const minutes = Number(raw);
        if (!Number.isFinite(minutes) || minutes <= 0) {
          throw new ConfigValidationError(`Invalid --interval: ${raw}`);
        }
        args.interval = minutes;
        i++;
        break;
      }
      default:
        throw new ConfigValidationError(`Unknown option: ${flag}`);
    }
  }

  return args;
}

/**
 * Flags da linha de comando têm precedência sobre o ambiente
 */
function applyArgs(config: MonitorConfig, args: MonitorArgs): MonitorConfig {
  return {
    ...config,
    dataDir: args.dataDir ?? config.dataDir,
    catalogPath: args.catalog ?? config.catalogPath,
    checkIntervalMinutes: args.interval ?? config.checkIntervalMinutes,
    logLevel: args.verbose ? 'debug' : config.logLevel
  };
}

// ════════════════════════════════════════════════════════════════════════════
// SAÍDA
// ════════════════════════════════════════════════════════════════════════════

function formatCycle(result: RunnerCycleResult): string {
  const r = result.report;
  const lines = [
    `Ciclo ${r.started_at.toISOString()}${r.dry_run ? ' (dry-run)' : ''}`,
    `  triggers: ${result.triggers_found}, episódios abertos: ${result.episodes_opened}, erros de trigger: ${result.trigger_errors}`,
    `  avaliados: ${r.episodes_evaluated}, falhas: ${r.episodes_failed}, elementos resolvidos: ${r.elements_resolved}`,
    `  desvios emitidos: ${r.deviations_emitted}, suprimidos: ${r.deviations_suppressed}, adiados: ${r.deviations_deferred}`
  ];
  for (const e of r.errors) {
    lines.push(`  ! ${e.episode_id}: ${e.error}`);
  }
  return lines.join('\n');
}

async function printStatus(engine: Engine): Promise<void> {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  STATUS DO MONITOR');
  console.log('═══════════════════════════════════════════════════════════');
  console.log(`Bundles: ${engine.catalog.list().map(b => b.bundle_id).join(', ')}`);

  for (const status of Object.values(EpisodeStatus)) {
    const episodes = await engine.episodes.listByStatus([status]);
    console.log(`Episódios ${status}: ${episodes.length}`);
  }
  const retry = await engine.episodes.listWithUndeliveredDeviations();
  console.log(`Episódios com desvio não entregue: ${retry.length}`);

  for (const status of ALERT_STATUSES) {
    const alerts = await engine.alerts.list({ status });
    console.log(`Alertas ${status}: ${alerts.length}`);
  }

  const chain = await engine.evaluator.verifyEventLog();
  console.log(`Event log: ${chain.valid ? 'íntegro' : `corrompido (${chain.reason})`}, ${chain.totalVerified} eventos verificados`);
}

// ════════════════════════════════════════════════════════════════════════════
// MAIN
// ════════════════════════════════════════════════════════════════════════════

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const args = parseMonitorArgs(argv);
  const config = applyArgs(loadMonitorConfig(), args);
  validateMonitorConfig(config);

  setRootLogger(pino({ name: 'adherence', level: config.logLevel }));
  const logger = createLogger('monitor');

  const engine = await createEngine({
    config,
    fixturesPath: args.fixtures,
    dryRun: args.dryRun,
    bundleIds: args.bundles.length > 0 ? args.bundles : undefined
  });

  if (args.mode === 'status') {
    await printStatus(engine);
    return;
  }

  if (args.mode === 'once') {
    const result = await engine.runner.runOnce();
    console.log(formatCycle(result));
    if (result.report.episodes_failed > 0) {
      process.exitCode = 1;
    }
    return;
  }

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'stopping monitor');
    engine.runner.stop()
      .then(() => process.exit(0))
      .catch(err => {
        logger.error({ err }, 'failed to stop monitor');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  engine.runner.start();
}

if (require.main === module) {
  main().catch(error => {
    console.error('Erro fatal:', errorMessage(error));
    process.exit(1);
  });
}

export { MonitorMode, MonitorArgs, parseMonitorArgs, applyArgs, formatCycle, main };
