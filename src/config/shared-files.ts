/**
 * Shared configuration and credentials file loading.
 *
 * Reads the INI-style files used by AWS tooling (`~/.aws/config` and
 * `~/.aws/credentials`) into a merged, read-only set of profiles.
 *
 * @module config/shared-files
 */

import { readFile } from 'fs/promises';
import {
  cancelledError,
  configurationError,
  isCancellationError,
} from '../error/index.js';

/**
 * Parsed INI data: section name to key/value pairs.
 */
export type IniData = Record<string, Record<string, string>>;

/**
 * A profile merged from every shared file that mentions it.
 */
export interface SharedProfile {
  readonly name: string;
  readonly values: Readonly<Record<string, string>>;
  /** Path of the file each key was last read from. */
  readonly origins: Readonly<Record<string, string>>;
}

/**
 * Keys that make a profile a credential source on its own.
 */
export const CREDENTIAL_DIRECTIVES = [
  'aws_access_key_id',
  'role_arn',
  'source_profile',
  'credential_source',
  'web_identity_token_file',
] as const;

/**
 * Parse INI file content.
 *
 * Blank lines and lines starting with `#` or `;` are skipped. Keys before the
 * first section header are dropped.
 */
export function parseIni(content: string): IniData {
  const result: IniData = {};
  let currentSection: string | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const sectionMatch = line.match(/^\[([^\]]+)\]$/);
    if (sectionMatch?.[1]) {
      currentSection = sectionMatch[1].trim().replace(/\s+/g, ' ');
      result[currentSection] = result[currentSection] ?? {};
      continue;
    }

    if (currentSection === null) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    const section = result[currentSection];
    if (section && key) {
      section[key] = value;
    }
  }

  return result;
}

/**
 * Profile name of a config-file section, or undefined for sections that are
 * not profiles (`sso-session`, `services`, bare names other than `default`).
 */
function configSectionProfile(section: string): string | undefined {
  if (section === 'default') {
    return 'default';
  }
  if (section.startsWith('profile ')) {
    const name = section.slice('profile '.length).trim();
    return name || undefined;
  }
  return undefined;
}

interface MutableProfile {
  values: Record<string, string>;
  origins: Record<string, string>;
}

/**
 * Read-only collection of merged shared profiles.
 */
export class SharedProfiles {
  private readonly profiles: ReadonlyMap<string, SharedProfile>;

  constructor(profiles: Iterable<SharedProfile> = []) {
    const map = new Map<string, SharedProfile>();
    for (const profile of profiles) {
      map.set(profile.name, Object.freeze({
        name: profile.name,
        values: Object.freeze({ ...profile.values }),
        origins: Object.freeze({ ...profile.origins }),
      }));
    }
    this.profiles = map;
    Object.freeze(this);
  }

  static empty(): SharedProfiles {
    return new SharedProfiles();
  }

  get(name: string): SharedProfile | undefined {
    return this.profiles.get(name);
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  names(): string[] {
    return [...this.profiles.keys()];
  }

  /**
   * True when the profile exists and carries at least one credential directive.
   */
  hasCredentialDirectives(name: string): boolean {
    const profile = this.profiles.get(name);
    if (!profile) {
      return false;
    }
    return CREDENTIAL_DIRECTIVES.some((key) => Boolean(profile.values[key]));
  }
}

async function readOptionalFile(path: string, signal?: AbortSignal): Promise<string | undefined> {
  try {
    return await readFile(path, { encoding: 'utf-8', signal });
  } catch (error) {
    if (isCancellationError(error)) {
      throw cancelledError(signal?.reason);
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw configurationError(`failed to read shared file ${path}`, error);
  }
}

/**
 * Load and merge shared profiles.
 *
 * Config files are applied first, then credentials files; within each kind,
 * later files override earlier ones key by key. Missing files are skipped.
 */
export async function loadSharedProfiles(
  configFiles: readonly string[],
  credentialsFiles: readonly string[],
  options: { signal?: AbortSignal } = {}
): Promise<SharedProfiles> {
  const merged = new Map<string, MutableProfile>();

  const apply = (name: string, section: Record<string, string>, path: string): void => {
    const profile = merged.get(name) ?? { values: {}, origins: {} };
    for (const [key, value] of Object.entries(section)) {
      profile.values[key] = value;
      profile.origins[key] = path;
    }
    merged.set(name, profile);
  };

  for (const path of configFiles) {
    const content = await readOptionalFile(path, options.signal);
    if (content === undefined) {
      continue;
    }
    for (const [section, values] of Object.entries(parseIni(content))) {
      const name = configSectionProfile(section);
      if (name !== undefined) {
        apply(name, values, path);
      }
    }
  }

  for (const path of credentialsFiles) {
    const content = await readOptionalFile(path, options.signal);
    if (content === undefined) {
      continue;
    }
    for (const [section, values] of Object.entries(parseIni(content))) {
      apply(section, values, path);
    }
  }

  return new SharedProfiles(
    [...merged.entries()].map(([name, profile]) => ({ name, ...profile }))
  );
}
