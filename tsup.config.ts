import { readFileSync } from 'node:fs';
import { defineConfig } from 'tsup';

function readPackageVersion(): string {
  const raw = readFileSync(new URL('./package.json', import.meta.url), 'utf8');
  const { version } = JSON.parse(raw) as { version?: unknown };
  if (typeof version !== 'string' || version.length === 0) {
    throw new Error('package.json has no version to inject into the build.');
  }
  return version;
}

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  dts: true,
  sourcemap: true,
  clean: true,
  define: {
    __AVRO_NAMES_VERSION__: JSON.stringify(readPackageVersion()),
  },
});
