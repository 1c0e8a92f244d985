import { PassThrough, Readable } from 'stream';
import { ExecutableLocator } from '../../../src/locator/locator.js';
import type { PathSearch } from '../../../src/locator/path-search.js';
import { ProcessRunner, normalizeInvocation } from '../../../src/runner/runner.js';
import type { ProcessCompletion, ProcessSpawner, SpawnedProcess } from '../../../src/runner/process.js';
import { ExecErrorCode } from '../../../src/shared/errors.js';
import { MemoryStream } from '../../helpers/memory-stream.js';

interface Script {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  startError?: Error;
  readError?: Error;
}

// Plays back a scripted child instead of starting a process.
class FakeSpawner implements ProcessSpawner {
  readonly calls: string[][] = [];
  killed = 0;

  constructor(private readonly script: Script = {}) {}

  spawn(argv: readonly string[]): SpawnedProcess {
    this.calls.push([...argv]);
    const { readError, startError } = this.script;

    let stdout: Readable;
    if (readError) {
      stdout = new Readable({
        read() {
          this.destroy(readError);
        },
      });
    } else {
      const pass = new PassThrough();
      pass.end(this.script.stdout ?? '');
      stdout = pass;
    }

    const completion: Promise<ProcessCompletion> = startError
      ? Promise.reject(startError)
      : Promise.resolve({ exitCode: this.script.exitCode ?? 0, stderr: this.script.stderr ?? '' });
    // the runner awaits completion after draining stdout
    completion.catch(() => undefined);

    return {
      stdout,
      completion,
      kill: () => {
        this.killed += 1;
      },
    };
  }
}

const commands: Record<string, string> = { echo: '/bin/echo', tool: '/usr/local/bin/tool' };
const pathSearch: PathSearch = {
  async find(name: string) {
    return commands[name];
  },
};

function makeRunner(script?: Script) {
  const spawner = new FakeSpawner(script);
  const stdout = new MemoryStream();
  const stderr = new MemoryStream();
  const locator = new ExecutableLocator({
    baseDir: '/opt/build',
    pathSearch,
    prefix: 'myproj',
    registry: new Map([['myproj.gen', 'bin/generator']]),
  });
  const runner = new ProcessRunner({ locator, spawner, stdout, stderr });
  return { runner, spawner, stdout, stderr };
}

describe('normalizeInvocation', () => {
  it('stringifies argument lists', () => {
    expect(normalizeInvocation(['tool', 3, true, 10n])).toEqual(['tool', '3', 'true', '10']);
  });

  it('splits quoted strings', () => {
    expect(normalizeInvocation('tool "a b" c')).toEqual(['tool', 'a b', 'c']);
  });

  it('rejects other shapes', () => {
    expect(() => normalizeInvocation(42)).toThrow('Command must be given as an argument list or a string, but number was given');
    expect(() => normalizeInvocation(null)).toThrow(expect.objectContaining({ code: ExecErrorCode.INVALID_INVOCATION }));
  });
});

describe('ProcessRunner.execute', () => {
  it('spawns the located executable with the remaining arguments', async () => {
    const { runner, spawner } = makeRunner();
    const status = await runner.execute(['tool', '--flag', 42]);

    expect(status).toBe(0);
    expect(spawner.calls).toEqual([['/usr/local/bin/tool', '--flag', '42']]);
  });

  it('resolves build targets through the registry', async () => {
    const { runner, spawner } = makeRunner();
    await runner.execute('gen --out "build dir"');

    expect(spawner.calls).toEqual([['/opt/build/bin/generator', '--out', 'build dir']]);
  });

  it('forwards per-call prefix and registry to the locator', async () => {
    const { runner, spawner } = makeRunner();
    await runner.execute(['tool'], { prefix: 'other', registry: new Map([['other.tool', 'x/tool']]) });

    expect(spawner.calls).toEqual([['/opt/build/x/tool']]);
  });

  it('echoes stdout and returns captured output', async () => {
    const { runner, stdout } = makeRunner({ stdout: 'hello\n' });
    const result = await runner.execute(['echo', 'hello'], { captureStdout: true });

    expect(result).toEqual({ exitCode: 0, stdout: 'hello\n' });
    expect(stdout.text).toBe('hello\n');
  });

  it('does not echo stdout when quiet', async () => {
    const { runner, stdout } = makeRunner({ stdout: 'line 1\nline 2\n' });
    const result = await runner.execute(['tool'], { quiet: true, captureStdout: true });

    expect(result.stdout).toBe('line 1\nline 2\n');
    expect(stdout.text).toBe('');
  });

  it('forwards stderr even when quiet', async () => {
    const { runner, stderr } = makeRunner({ stderr: 'warning: deprecated\n' });
    await runner.execute(['tool'], { quiet: true });

    expect(stderr.text).toBe('warning: deprecated\n');
  });

  it('prints the command line when verbose', async () => {
    const { runner, stdout } = makeRunner();
    await runner.execute(['tool', 'a b', ''], { verbosity: 1, quiet: true });

    expect(stdout.text).toBe('$ /usr/local/bin/tool "a b" ""\n');
  });

  it('only prints the command line when simulating', async () => {
    const { runner, spawner, stdout } = makeRunner({ exitCode: 5 });
    const result = await runner.execute(['tool', 'x'], { simulate: true, captureStdout: true });

    expect(result).toEqual({ exitCode: 0, stdout: '' });
    expect(spawner.calls).toEqual([]);
    expect(stdout.text).toBe('$ /usr/local/bin/tool x (simulated)\n');
  });

  it('raises COMMAND_NOT_FOUND even when failure is allowed', async () => {
    const { runner, spawner } = makeRunner();

    await expect(runner.execute(['frobnicate'], { allowFailure: true })).rejects.toMatchObject({
      code: ExecErrorCode.COMMAND_NOT_FOUND,
      message: 'frobnicate: Command not found',
    });
    expect(spawner.calls).toEqual([]);
  });

  it('raises INVALID_INVOCATION for an empty command', async () => {
    const { runner } = makeRunner();

    await expect(runner.execute([])).rejects.toMatchObject({ code: ExecErrorCode.INVALID_INVOCATION });
    await expect(runner.execute('   ')).rejects.toMatchObject({ code: ExecErrorCode.INVALID_INVOCATION });
  });

  it('raises COMMAND_FAILED on a non-zero exit', async () => {
    const { runner } = makeRunner({ exitCode: 2 });

    await expect(runner.execute(['tool', 'two words'])).rejects.toMatchObject({
      code: ExecErrorCode.COMMAND_FAILED,
      message: 'Command failed with exit code 2: /usr/local/bin/tool "two words"',
      context: { exitCode: 2, command: '/usr/local/bin/tool "two words"' },
    });
  });

  it('returns the non-zero exit code when failure is allowed', async () => {
    const { runner } = makeRunner({ exitCode: 1, stdout: 'partial\n' });

    expect(await runner.execute(['tool'], { allowFailure: true })).toBe(1);
    expect(await runner.execute(['tool'], { allowFailure: true, captureStdout: true })).toEqual({
      exitCode: 1,
      stdout: 'partial\n',
    });
  });

  it('wraps start-up failures as SPAWN_FAILED', async () => {
    const { runner } = makeRunner({ startError: new Error('spawn EACCES') });

    await expect(runner.execute(['tool', '-v'], { allowFailure: true })).rejects.toMatchObject({
      code: ExecErrorCode.SPAWN_FAILED,
      message: 'Failed to execute "/usr/local/bin/tool": spawn EACCES',
      context: { arguments: '-v', cause: 'spawn EACCES' },
    });
  });

  it('kills and waits for the child when reading stdout fails', async () => {
    const { runner, spawner } = makeRunner({ readError: new Error('read failed'), stderr: 'boom\n' });

    await expect(runner.execute(['tool'])).rejects.toMatchObject({
      code: ExecErrorCode.SPAWN_FAILED,
      message: 'Failed to execute "/usr/local/bin/tool": read failed',
    });
    expect(spawner.killed).toBe(1);
  });

  it('applies runner defaults beneath per-call options', async () => {
    const spawner = new FakeSpawner();
    const stdout = new MemoryStream();
    const locator = new ExecutableLocator({ baseDir: '/opt/build', pathSearch });
    const runner = new ProcessRunner({ locator, spawner, stdout, defaults: { simulate: true } });

    await runner.execute(['tool']);
    expect(spawner.calls).toEqual([]);

    await runner.execute(['tool'], { simulate: false, quiet: true });
    expect(spawner.calls).toEqual([['/usr/local/bin/tool']]);
  });

  it('keeps runner defaults for options passed as undefined', async () => {
    const spawner = new FakeSpawner({ stdout: 'out\n' });
    const stdout = new MemoryStream();
    const locator = new ExecutableLocator({ baseDir: '/opt/build', pathSearch });
    const runner = new ProcessRunner({ locator, spawner, stdout, defaults: { quiet: true, verbosity: 1 } });

    await runner.execute(['tool'], { quiet: undefined, verbosity: undefined });
    expect(stdout.text).toBe('$ /usr/local/bin/tool\n');
  });
});
