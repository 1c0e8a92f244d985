/** Maps target identifiers to executable paths, relative to the registry's base directory. */
export type TargetRegistry = ReadonlyMap<string, string>;

export const NAMESPACE_SEPARATOR = '.';

/**
 * A target identifier. Qualified identifiers are written with a leading
 * separator (e.g. `.myproj.tool`) and are never re-prefixed.
 */
export type TargetId =
  | { kind: 'qualified'; path: string }
  | { kind: 'unqualified'; name: string };

export interface TargetScope {
  prefix?: string | null;
  registry?: TargetRegistry | null;
}
