import type { Writable } from 'stream';
import { ExecError, ExecErrorCode } from './shared/errors.js';

export interface BannerDefaults {
  contact: string;
  copyright: string;
  license: string;
}

export const DEFAULT_BANNER: BannerDefaults = {
  contact: '',
  copyright: '',
  license: '',
};

export interface VersionInfo {
  /** Program name as it should be shown; pass a literal rather than argv[0]. */
  name: string;
  version: string;
  /** Project the program belongs to, shown in parentheses when set. */
  project?: string | null;
  /** Copyright holder, without the "Copyright (c) " prefix and ". All rights reserved." suffix. */
  copyright?: string | null;
  license?: string | null;
}

export function printContact(contact: string = DEFAULT_BANNER.contact, out: Writable = process.stdout): void {
  out.write(`Contact:\n  ${contact}\n`);
}

// Empty or null copyright/license suppress their line; omitted ones fall back to the defaults.
export function printVersion(
  info: VersionInfo,
  out: Writable = process.stdout,
  defaults: BannerDefaults = DEFAULT_BANNER
): void {
  if (!info.version) {
    throw new ExecError(ExecErrorCode.INVALID_ARGUMENT, `printVersion(): Missing version of ${info.name}`);
  }
  const copyright = info.copyright === undefined ? defaults.copyright : info.copyright;
  const license = info.license === undefined ? defaults.license : info.license;

  let text = info.name;
  if (info.project) text += ` (${info.project})`;
  text += ` ${info.version}\n`;
  if (copyright) text += `Copyright (c) ${copyright}. All rights reserved.\n`;
  if (license) text += `${license}\n`;
  out.write(text);
}
