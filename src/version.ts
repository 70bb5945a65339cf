import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readPackageVersion(relative: string): string | undefined {
  const pkgPath = new URL(relative, import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Used by /healthz.
 *
 * Resolved relative to this file so both layouts work:
 * - tsx src/server.ts (package.json one level up)
 * - node dist/src/server.js (package.json two levels up)
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readPackageVersion('../package.json') ?? '0.0.0';
    } catch {
      try {
        return readPackageVersion('../../package.json') ?? '0.0.0';
      } catch {
        return '0.0.0';
      }
    }
  })();

export const SERVICE_NAME = 'support-workflow-service';
