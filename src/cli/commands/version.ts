/**
 * Version command handler for the asterism CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  let packageJson: unknown;
  try {
    const packageJsonPath = join(__dirname, '../../../package.json');
    packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  } catch {
    return '(unknown)';
  }
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return typeof packageJson.version === 'string' ? packageJson.version : '(unknown)';
  }
  return '(unknown)';
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  const version = getVersionFromPackageJson();
  console.log(`asterism v${version}`);
  return { exitCode: 0 };
}
