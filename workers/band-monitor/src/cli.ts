import { loadBandPlanFile, loadDefaultBandPlan } from '@bandwatch/shared';
import { loadConfig, toMonitorConfig, USAGE } from './config.ts';
import { FldigiClient } from './fldigi.ts';
import { createCommandNotifier } from './command.ts';
import { BandMonitor } from './monitor.ts';
import type { Logger } from './types.ts';
import { formatError } from './utils.ts';

export interface MainOptions {
  argv: string[];
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

function stopOnSignals(controller: AbortController): () => void {
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return () => {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  };
}

/**
 * Runs the band monitor CLI and resolves with the process exit code.
 * Startup problems (bad flags, unusable band plan) exit with 1 before
 * any polling starts.
 */
export async function main({ argv, env = {}, logger = console }: MainOptions): Promise<number> {
  const config = loadConfig(argv, env);
  if (config.isErr()) {
    logger.error(`Error: ${config.error.message}\n`);
    logger.error(USAGE);
    return 1;
  }

  const options = config.value;
  if (options.help) {
    logger.log(USAGE);
    return 0;
  }

  const client = new FldigiClient({ host: options.host, port: options.port });

  if (options.listMethods) {
    const methods = await client.listMethods();
    return methods.match(
      (names) => {
        logger.log(`Available methods:\n${names.join('\n')}`);
        return 0;
      },
      (error) => {
        logger.error(`Error listing methods: ${formatError(error)}`);
        return 1;
      }
    );
  }

  const monitorConfig = toMonitorConfig(options);
  if (monitorConfig.isErr()) {
    logger.error(`Error: ${monitorConfig.error.message}\n`);
    logger.error(USAGE);
    return 1;
  }

  const { bandsFile, command, intervalMs } = monitorConfig.value;
  const plan = bandsFile === null ? loadDefaultBandPlan() : loadBandPlanFile(bandsFile);
  if (plan.isErr()) {
    logger.error(`Error: ${formatError(plan.error)}`);
    return 1;
  }

  const monitor = new BandMonitor({
    plan: plan.value,
    source: () => client.getFrequency(),
    notifier: createCommandNotifier(command),
    intervalMs,
    logger,
  });

  const controller = new AbortController();
  const release = stopOnSignals(controller);
  try {
    await monitor.run(controller.signal);
  } finally {
    release();
  }
  return 0;
}
