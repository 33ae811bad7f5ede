import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { PackageJsonSchema } from './types/validators.js';

const FALLBACK_VERSION = '0.0.0';

/**
 * Get the package version from package.json
 * Works from both src/ (tests) and dist/ (compiled)
 */
export function getVersion(): string {
  try {
    const moduleDir = dirname(fileURLToPath(import.meta.url));
    const packageJsonPath = join(moduleDir, '..', 'package.json');
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(packageJsonPath, 'utf-8')),
    );

    return parsed.success ? parsed.data.version : FALLBACK_VERSION;
  } catch {
    // Fallback if package.json can't be read
    return FALLBACK_VERSION;
  }
}
