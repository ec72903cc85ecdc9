import { readFileSync } from 'node:fs';

function getVersion(): string {
  // Compiled output lives in dist/src, sources in src; both sit below the package root
  for (const relative of ['../package.json', '../../package.json']) {
    try {
      const packageJson: unknown = JSON.parse(readFileSync(new URL(relative, import.meta.url), 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'name' in packageJson &&
        packageJson.name === 'tock' &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      continue;
    }
  }
  return 'unknown';
}

export const VERSION = getVersion();
