import { parseArgs } from 'node:util';
import { Result, ok, err } from 'neverthrow';
import type { CliOptions, ConfigError, MonitorConfig } from './types.ts';
import { errorMessage, parseDuration } from './utils.ts';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 7362;
export const DEFAULT_INTERVAL = '5s';

export const USAGE = `Usage: band-monitor --command <program> [options]

Polls fldigi over XML-RPC and runs <program> <band> whenever the tuned band changes.

Options:
  -h, --host <host>          fldigi host (env FLDIGI_HOST, default ${DEFAULT_HOST})
  -p, --port <port>          fldigi XML-RPC port (env FLDIGI_PORT, default ${DEFAULT_PORT})
  -i, --interval <duration>  polling interval, e.g. 500ms, 5s, 1m (env BANDWATCH_INTERVAL, default ${DEFAULT_INTERVAL})
  -c, --command <program>    program to run on band change (env BANDWATCH_COMMAND)
  -b, --bands <file>         band plan file, name:start_mhz:end_mhz per line (env BANDWATCH_BANDS)
      --list-methods         print fldigi's XML-RPC methods and exit
      --help                 show this help
`;

const OPTIONS = {
  host: { type: 'string', short: 'h' },
  port: { type: 'string', short: 'p' },
  interval: { type: 'string', short: 'i' },
  command: { type: 'string', short: 'c' },
  bands: { type: 'string', short: 'b' },
  'list-methods': { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
} as const;

type Env = Record<string, string | undefined>;

function configError(message: string): ConfigError {
  return { type: 'CONFIG_ERROR', message };
}

const parseFlags = Result.fromThrowable(
  (args: string[]) => parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false }),
  (error) => configError(errorMessage(error, 'Invalid arguments'))
);

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function parsePort(text: string): Result<number, ConfigError> {
  const port = /^\d+$/.test(text) ? Number(text) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return err(configError(`Invalid port '${text}': expected an integer between 1 and 65535`));
  }
  return ok(port);
}

function parseInterval(text: string): Result<number, ConfigError> {
  const ms = parseDuration(text);
  if (ms === null) {
    return err(configError(`Invalid interval '${text}': expected a duration such as 5s or 500ms`));
  }
  if (ms <= 0) {
    return err(configError(`Invalid interval '${text}': must be positive`));
  }
  return ok(ms);
}

/**
 * Resolves options from command-line flags, then environment variables,
 * then defaults.
 */
export function loadConfig(argv: string[], env: Env = {}): Result<CliOptions, ConfigError> {
  return parseFlags(argv).andThen(({ values }) => {
    const host = nonEmpty(values.host) ?? nonEmpty(env.FLDIGI_HOST) ?? DEFAULT_HOST;
    const command = nonEmpty(values.command) ?? nonEmpty(env.BANDWATCH_COMMAND);
    const bandsFile = nonEmpty(values.bands) ?? nonEmpty(env.BANDWATCH_BANDS);
    const listMethods = values['list-methods'] === true;
    const help = values.help === true;

    if (command === null && !listMethods && !help) {
      return err(configError('--command/-c flag is required'));
    }

    const portText = nonEmpty(values.port) ?? nonEmpty(env.FLDIGI_PORT) ?? String(DEFAULT_PORT);
    const intervalText = nonEmpty(values.interval) ?? nonEmpty(env.BANDWATCH_INTERVAL) ?? DEFAULT_INTERVAL;

    return parsePort(portText).andThen((port) =>
      parseInterval(intervalText).map((intervalMs): CliOptions => ({
        host,
        port,
        intervalMs,
        command,
        bandsFile,
        listMethods,
        help,
      }))
    );
  });
}

// Narrows CLI options to what the monitor needs once a command is known
export function toMonitorConfig(options: CliOptions): Result<MonitorConfig, ConfigError> {
  if (options.command === null) {
    return err(configError('--command/-c flag is required'));
  }
  return ok({
    host: options.host,
    port: options.port,
    intervalMs: options.intervalMs,
    command: options.command,
    bandsFile: options.bandsFile,
  });
}
