import { readFileSync } from 'node:fs';

// Injected by tsup at build time; undefined when running from sources.
declare const __AVRO_NAMES_VERSION__: string | undefined;

function readPackageVersion(): string | null {
  try {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
    const { version } = JSON.parse(raw) as { version?: unknown };
    return typeof version === 'string' && version.length > 0 ? version : null;
  } catch {
    return null;
  }
}

const resolvedVersion = typeof __AVRO_NAMES_VERSION__ === 'string'
  ? __AVRO_NAMES_VERSION__
  : readPackageVersion();

if (!resolvedVersion) {
  throw new Error('Unable to determine avro-names version.');
}

export const AVRO_NAMES_VERSION: string = resolvedVersion;
