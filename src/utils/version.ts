import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Get package version from package.json
 * Works from both src/ (ts-jest) and dist/ builds, which sit one level below the root
 */
function getPackageVersion(): string {
  try {
    const packagePath = join(__dirname, '..', '..', 'package.json');

    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    if (
      typeof packageJson !== 'object' ||
      packageJson === null ||
      !('version' in packageJson) ||
      typeof packageJson.version !== 'string'
    ) {
      throw new Error('Version not found in package.json');
    }

    return packageJson.version;
  } catch (error) {
    // Fallback for edge cases
    console.warn(
      'Could not read version from package.json, using fallback:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    return '0.1.0';
  }
}

// Export as constant so it's only read once
export const PACKAGE_VERSION = getPackageVersion();
