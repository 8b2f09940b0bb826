import { describe, it, expect } from 'vitest';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { AVRO_NAMES_VERSION } from '../../../src/index.js';

describe('version', () => {
  it('should report the packaged version', async () => {
    const packagePath = fileURLToPath(new URL('../../../package.json', import.meta.url));
    const raw = await readFile(packagePath, 'utf8');
    const packageJson = JSON.parse(raw) as { version?: string };

    expect(AVRO_NAMES_VERSION).toBe(packageJson.version);
  });
});
