import path from 'path';
import which from 'which';

/** Looks a command up on the system PATH. */
export interface PathSearch {
  /** Resolves to `undefined` when the command is not on the PATH. */
  find(name: string): Promise<string | undefined>;
}

export class WhichPathSearch implements PathSearch {
  constructor(private readonly searchPath?: string) {}

  async find(name: string): Promise<string | undefined> {
    try {
      // names containing a slash come back relative to the cwd
      return path.resolve(await which(name, { path: this.searchPath }));
    } catch (err) {
      // which signals a miss with ENOENT; anything else is a real failure
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }
  }
}
