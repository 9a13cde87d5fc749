/**
 * Load a .env file from the project root, wherever the daemon is started from
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Walk up from startPath until a directory holding a .env file is found
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);

  for (;;) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    const parent = resolve(current, '..');
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Load environment variables from the nearest .env above startDir
 * (defaults to this module's directory, then the working directory).
 * Variables already set in the environment win.
 *
 * @returns Path of the loaded file, or null when none was found
 */
export function loadEnvFromRoot(startDir?: string): string | null {
  const from = startDir ?? dirname(fileURLToPath(import.meta.url));
  const projectRoot = findProjectRoot(from) ?? findProjectRoot(process.cwd());

  if (!projectRoot) {
    return null;
  }

  const envPath = join(projectRoot, '.env');
  dotenv.config({ path: envPath });
  return envPath;
}
