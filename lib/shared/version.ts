/**
 * Version constant read from package.json at module load time
 */
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

// Sources run from lib/shared and the build from dist/lib/shared, so search
// upwards instead of assuming a depth.
function findPackageJson(start: string): string | null {
  let dir = start;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function readVersion(): string {
  const packageJsonPath = findPackageJson(
    dirname(fileURLToPath(import.meta.url))
  );
  if (packageJsonPath === null) {
    return 'unknown';
  }
  const json: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  if (
    typeof json === 'object' && json !== null && 'version' in json &&
    typeof json.version === 'string'
  ) {
    return json.version;
  }
  return 'unknown';
}

export const VERSION = readVersion();
