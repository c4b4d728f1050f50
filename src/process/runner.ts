/**
 * Child process execution.
 *
 * Every external program termdeck starts (image viewer, OS launcher) runs to
 * completion before the presentation continues. There is no cancellation: a
 * hung child hangs the presenter.
 */

import { spawn } from 'child_process';

export interface RunOptions {
  /** 'inherit' hands the terminal to the child; 'ignore' runs it headless. */
  stdio: 'inherit' | 'ignore';
}

export interface ProcessRunner {
  /** Resolves on exit code 0; rejects on spawn failure, a signal or a nonzero exit. */
  run(command: string, args: readonly string[], options: RunOptions): Promise<void>;
}

export function describeCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

export class SpawnRunner implements ProcessRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<void> {
    const label = describeCommand(command, args);
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: options.stdio });

      child.once('error', (err) => {
        reject(new Error(`Failed to start ${label}: ${err.message}`, { cause: err }));
      });

      child.once('exit', (code, signal) => {
        if (code === 0) {
          resolve();
        } else if (signal) {
          reject(new Error(`${label} was killed by ${signal}`));
        } else {
          reject(new Error(`${label} exited with code ${code}`));
        }
      });
    });
  }
}
