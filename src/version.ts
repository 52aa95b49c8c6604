import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readPackageVersion(relative: string): string | null {
  try {
    const pkgPath = new URL(relative, import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolved relative to this file so it works from both src/ (tsx, vitest)
 * and dist/ (compiled).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  readPackageVersion('../package.json') ??
  readPackageVersion('../../package.json') ??
  '0.0.0';
