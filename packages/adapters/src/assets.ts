import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Reads a non-TypeScript file shipped with the adapters package (SQL, .proto).
 * Looks beside the sources first, then relative to the working directory for
 * the compiled dist layout.
 */
export function readPackageAsset(relativePath: string): string {
  const besideSources = resolve(__dirname, '..', relativePath);
  const path = existsSync(besideSources)
    ? besideSources
    : resolve(process.cwd(), 'packages/adapters', relativePath);
  return readFileSync(path, 'utf-8');
}
