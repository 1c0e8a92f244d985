import { NAMESPACE_SEPARATOR } from './types.js';
import type { TargetId, TargetRegistry } from './types.js';

export function parseTargetId(raw: string): TargetId {
  return raw.startsWith(NAMESPACE_SEPARATOR)
    ? { kind: 'qualified', path: raw.slice(NAMESPACE_SEPARATOR.length) }
    : { kind: 'unqualified', name: raw };
}

export function formatTargetId(id: TargetId): string {
  return id.kind === 'qualified' ? NAMESPACE_SEPARATOR + id.path : id.name;
}

// Registry keys are stored without the leading separator of a qualified id.
export function registryKey(id: TargetId): string {
  return id.kind === 'qualified' ? id.path : id.name;
}

/**
 * Get the identifier of a build target.
 *
 * Unqualified names are looked up under the caller's namespace first. When
 * `prefix + '.' + name` is not a registry key, the prefix is cut back to its
 * first segment and tried once more; a single-segment prefix is tried once.
 * Without a match the name is returned unchanged.
 */
export function resolveIdentifier(
  name: string | null | undefined,
  prefix?: string | null,
  registry?: TargetRegistry | null
): string | undefined {
  if (!name) return undefined;

  const id = parseTargetId(name);
  if (id.kind === 'qualified') return name;
  if (!prefix || !registry || registry.size === 0) return name;

  let namespace = prefix;
  for (;;) {
    const candidate = namespace + NAMESPACE_SEPARATOR + id.name;
    if (registry.has(candidate)) return candidate;
    const cut = namespace.indexOf(NAMESPACE_SEPARATOR);
    if (cut === -1) break;
    namespace = namespace.slice(0, cut);
  }
  return name;
}

export function isKnownTarget(
  name: string | null | undefined,
  prefix?: string | null,
  registry?: TargetRegistry | null
): boolean {
  const uid = resolveIdentifier(name, prefix, registry);
  if (!uid || !registry || registry.size === 0) return false;
  return registry.has(registryKey(parseTargetId(uid)));
}
