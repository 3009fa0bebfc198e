import { loadConfig, type DashboardConfig } from './lib/config';
import { buildDashboard } from './lib/dashboard';
import { createDefaultDeps } from './lib/deps';
import { describeError, StartupError } from './lib/errors';
import { logger } from './lib/logger';
import { Scheduler } from './lib/scheduler';
import { CronTickSource } from './lib/ticker';
import { InkTerminal } from './src/ui/ink-terminal';

const QUIT_SIGNALS = ['SIGTERM', 'SIGHUP', 'SIGINT'] as const;

function flushLogs() {
  return new Promise<void>((resolve) => {
    logger.flush(() => {
      resolve();
    });
  });
}

async function runDashboard(config: DashboardConfig) {
  const { registry, layout } = buildDashboard(config, createDefaultDeps());

  const scheduler = new Scheduler({
    registry,
    layout,
    terminal: new InkTerminal(),
    ticks: new CronTickSource(config.tickIntervalMs),
    quitKeys: config.quitKeys,
  });

  for (const signal of QUIT_SIGNALS) {
    process.once(signal, () => {
      scheduler.requestQuit(signal);
    });
  }

  logger.info({
    probes: registry.names(),
    tickIntervalSeconds: config.tickIntervalMs / 1000,
    repoSearch: config.repoSearch,
    feeds: config.feedAccounts.length,
    logFile: config.logFile,
  }, 'Dashboard starting');

  return await scheduler.run();
}

async function main() {
  let code: number;
  try {
    code = await runDashboard(loadConfig());
  } catch (error) {
    if (!(error instanceof StartupError)) throw error;
    logger.fatal({ err: error }, 'Dashboard failed to start');
    process.stderr.write(`sysdash: ${describeError(error)}\n`);
    code = 1;
  }

  await flushLogs();
  process.exit(code);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Dashboard crashed');
  process.stderr.write(`sysdash: ${describeError(error)}\n`);
  process.exit(1);
});
