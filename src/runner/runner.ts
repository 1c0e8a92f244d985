import type { Writable } from 'stream';
import { ExecError, ExecErrorCode, describeCause } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { splitQuoted, toQuotedString } from '../shared/quoting.js';
import type { ExecutableLocator } from '../locator/locator.js';
import type { TargetRegistry } from '../targets/types.js';
import { CaptureSink, EchoSink, drainLines } from './lines.js';
import type { LineSink } from './lines.js';
import { ExecaSpawner } from './process.js';
import type { ProcessCompletion, ProcessSpawner, SpawnedProcess } from './process.js';

export type InvocationArg = string | number | bigint | boolean;

/** A command as an argument list, or as one shell-quoted string. */
export type Invocation = string | readonly InvocationArg[];

export interface ExecuteOptions {
  /** Do not echo the child's stdout. */
  quiet?: boolean;
  /** Return the child's stdout along with its exit code. */
  captureStdout?: boolean;
  /** Report a non-zero exit code instead of throwing. */
  allowFailure?: boolean;
  /** Above 0, print the command line before running it. */
  verbosity?: number;
  /** Print the command line without running it. */
  simulate?: boolean;
  prefix?: string | null;
  registry?: TargetRegistry | null;
}

export interface CapturedExecution {
  exitCode: number;
  stdout: string;
}

export interface RunnerOptions {
  locator: ExecutableLocator;
  spawner?: ProcessSpawner;
  stdout?: Writable;
  stderr?: Writable;
  /** Applied beneath the options of each call. */
  defaults?: Pick<ExecuteOptions, 'quiet' | 'verbosity' | 'simulate'>;
}

export class ProcessRunner {
  private readonly locator: ExecutableLocator;
  private readonly spawner: ProcessSpawner;
  private readonly stdout: Writable;
  private readonly stderr: Writable;
  private readonly defaults: Pick<ExecuteOptions, 'quiet' | 'verbosity' | 'simulate'>;

  constructor(options: RunnerOptions) {
    this.locator = options.locator;
    this.spawner = options.spawner ?? new ExecaSpawner();
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.defaults = options.defaults ?? {};
  }

  /**
   * Run a command and wait for it to terminate.
   *
   * The command is located through the build-target registry or the PATH
   * first. Its stdout is echoed line by line unless `quiet`; its stderr is
   * forwarded once it has exited.
   *
   * @throws ExecError COMMAND_NOT_FOUND when the command cannot be located,
   *   even with `allowFailure`; SPAWN_FAILED when it cannot be started or read;
   *   COMMAND_FAILED when it exits non-zero and `allowFailure` is not set.
   */
  execute(invocation: Invocation, options: ExecuteOptions & { captureStdout: true }): Promise<CapturedExecution>;
  execute(invocation: Invocation, options?: ExecuteOptions): Promise<number>;
  async execute(invocation: Invocation, options: ExecuteOptions = {}): Promise<number | CapturedExecution> {
    const opts: ExecuteOptions = {
      ...options,
      quiet: options.quiet ?? this.defaults.quiet,
      verbosity: options.verbosity ?? this.defaults.verbosity,
      simulate: options.simulate ?? this.defaults.simulate,
    };
    const args = normalizeInvocation(invocation);

    const [command] = args;
    if (command === undefined) {
      throw new ExecError(ExecErrorCode.INVALID_INVOCATION, 'No command specified for execution');
    }

    const exePath = await this.locator.locate(command, { prefix: options.prefix, registry: options.registry });
    if (exePath === undefined) {
      throw new ExecError(ExecErrorCode.COMMAND_NOT_FOUND, `${command}: Command not found`, { command });
    }
    const argv = [exePath, ...args.slice(1)];

    if ((opts.verbosity ?? 0) > 0 || opts.simulate) {
      this.stdout.write(`$ ${toQuotedString(argv)}${opts.simulate ? ' (simulated)' : ''}\n`);
    }

    let exitCode = 0;
    const capture = new CaptureSink();
    if (!opts.simulate) {
      const sinks: LineSink[] = [];
      if (opts.captureStdout) sinks.push(capture);
      if (!opts.quiet) sinks.push(new EchoSink(this.stdout));
      exitCode = await this.run(argv, sinks);
    }

    if (exitCode !== 0 && !opts.allowFailure) {
      throw new ExecError(ExecErrorCode.COMMAND_FAILED, `Command failed with exit code ${exitCode}: ${toQuotedString(argv)}`, {
        exitCode,
        command: toQuotedString(argv),
      });
    }

    return opts.captureStdout ? { exitCode, stdout: capture.text } : exitCode;
  }

  private async run(argv: string[], sinks: readonly LineSink[]): Promise<number> {
    logger.debug({ argv }, 'Spawning child process');

    let child: SpawnedProcess;
    try {
      child = this.spawner.spawn(argv);
    } catch (err) {
      throw spawnFailure(argv, err);
    }

    let streamError: unknown;
    try {
      await drainLines(child.stdout, sinks);
    } catch (err) {
      streamError = err;
      child.kill();
    }

    // The child is always awaited, so it never outlives a thrown error.
    let completion: ProcessCompletion;
    try {
      completion = await child.completion;
    } catch (err) {
      throw spawnFailure(argv, err);
    }
    if (completion.stderr.length > 0) this.stderr.write(completion.stderr);
    if (streamError !== undefined) throw spawnFailure(argv, streamError);

    logger.debug({ command: argv[0], exitCode: completion.exitCode }, 'Child process exited');
    return completion.exitCode;
  }
}

export function normalizeInvocation(invocation: unknown): string[] {
  if (Array.isArray(invocation)) return invocation.map((arg) => String(arg));
  if (typeof invocation === 'string') return splitQuoted(invocation);
  throw new ExecError(
    ExecErrorCode.INVALID_INVOCATION,
    `Command must be given as an argument list or a string, but ${describeType(invocation)} was given`
  );
}

function describeType(value: unknown): string {
  return value === null ? 'null' : typeof value;
}

function spawnFailure(argv: readonly string[], err: unknown): ExecError {
  if (err instanceof ExecError && err.code === ExecErrorCode.SPAWN_FAILED) return err;
  return new ExecError(ExecErrorCode.SPAWN_FAILED, `Failed to execute "${argv[0]}": ${describeCause(err)}`, {
    arguments: toQuotedString(argv.slice(1)),
    cause: describeCause(err),
  });
}
