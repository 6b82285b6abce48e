import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export const FALLBACK_VERSION = 'unknown';

function readVersion(packageJsonPath: string): string | null {
  if (!fs.existsSync(packageJsonPath)) {
    return null;
  }
  const json: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof json === 'object' && json !== null && 'version' in json && typeof json.version === 'string') {
    return json.version;
  }
  return null;
}

/** Version of the nearest package.json above the given module. */
export function resolvePackageVersion(moduleUrl: string = import.meta.url): string {
  let dir = path.dirname(fileURLToPath(moduleUrl));
  while (true) {
    const version = readVersion(path.join(dir, 'package.json'));
    if (version) {
      return version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return FALLBACK_VERSION;
    }
    dir = parent;
  }
}

export function getCliVersion(): string {
  return resolvePackageVersion(import.meta.url);
}
