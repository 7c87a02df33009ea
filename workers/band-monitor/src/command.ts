import { spawn } from 'node:child_process';
import { Result, ok, err } from 'neverthrow';
import type { BandNotifier, MonitorError } from './types.ts';
import { notifyError } from './utils.ts';

/**
 * Runs `command <band>` without a shell and waits for it to exit.
 * Output goes straight to this process's stdout/stderr.
 */
export function runExternalCommand(command: string, band: string): Promise<Result<void, MonitorError>> {
  return new Promise((resolve) => {
    const child = spawn(command, [band], { stdio: 'inherit' });

    child.once('error', (error) => {
      resolve(err(notifyError(`Failed to start ${command}: ${error.message}`)));
    });

    child.once('close', (code, signal) => {
      if (code === 0) {
        resolve(ok(undefined));
      } else if (signal !== null) {
        resolve(err(notifyError(`${command} terminated by ${signal}`)));
      } else {
        resolve(err(notifyError(`${command} exited with status ${code ?? 'unknown'}`)));
      }
    });
  });
}

export function createCommandNotifier(command: string): BandNotifier {
  return (band) => runExternalCommand(command, band);
}
