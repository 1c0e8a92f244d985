import execa from 'execa';
import getStream from 'get-stream';
import os from 'os';
import type { Readable } from 'stream';
import { ExecError, ExecErrorCode, describeCause } from '../shared/errors.js';

export interface ProcessCompletion {
  exitCode: number;
  stderr: string;
}

export interface SpawnedProcess {
  readonly stdout: Readable;
  /** Settles once the child has terminated; rejects when it could not be started. */
  readonly completion: Promise<ProcessCompletion>;
  kill(): void;
}

/** Starts child processes. `argv[0]` is the absolute path of the executable. */
export interface ProcessSpawner {
  spawn(argv: readonly string[]): SpawnedProcess;
}

// Shell convention: a child killed by signal N exits with 128 + N.
export function signalExitCode(signal: string): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

export class ExecaSpawner implements ProcessSpawner {
  spawn(argv: readonly string[]): SpawnedProcess {
    const [file, ...args] = argv;
    if (file === undefined) {
      throw new ExecError(ExecErrorCode.INVALID_INVOCATION, 'No command specified for execution');
    }

    // stdout is streamed by the caller, so execa must not buffer it
    const child = execa(file, args, {
      reject: false,
      buffer: false,
      stdin: 'inherit',
    });
    if (!child.stdout || !child.stderr) {
      child.kill();
      throw new ExecError(ExecErrorCode.SPAWN_FAILED, `${file}: output of child process is not readable`);
    }

    // execa settles on exit; stderr is only complete once its stream has ended
    const completion = Promise.allSettled([child, getStream(child.stderr)]).then(
      ([run, stderr]): ProcessCompletion => {
        if (run.status === 'rejected') {
          throw new ExecError(ExecErrorCode.SPAWN_FAILED, `${file}: ${describeCause(run.reason)}`);
        }
        const result = run.value;
        let exitCode: number;
        if (typeof result.exitCode === 'number') {
          exitCode = result.exitCode;
        } else if (result.signal !== undefined) {
          exitCode = signalExitCode(result.signal);
        } else {
          // With reject: false, execa resolves a start-up failure as its error object
          throw new ExecError(ExecErrorCode.SPAWN_FAILED, `${file}: ${describeCause(result)}`, {
            command: result.command,
          });
        }
        if (stderr.status === 'rejected') {
          throw new ExecError(ExecErrorCode.SPAWN_FAILED, `${file}: cannot read stderr: ${describeCause(stderr.reason)}`);
        }
        return { exitCode, stderr: stderr.value };
      }
    );

    return {
      stdout: child.stdout,
      completion,
      kill: () => {
        child.kill();
      },
    };
  }
}
