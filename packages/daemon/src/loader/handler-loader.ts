/**
 * Handler Loader - turns configured search paths into loaded handler modules
 */

import { existsSync } from 'fs';
import { readdir, stat } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import type { Logger } from '@broker-daemon/shared';
import { HandlerLoadError } from '../errors.js';
import {
  HandlerDescriptorSchema,
  type Collect,
  type HandlerModuleExports,
  type SetupHook,
} from '../registry/types.js';

// What Node imports without a loader hook
const HANDLER_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);
const SKIPPED_DIRECTORIES = new Set(['node_modules']);

/**
 * Outcome of loading one handler file
 */
export interface LoadResult {
  path: string;
  exports?: HandlerModuleExports;
  error?: HandlerLoadError;
}

const isFunction = (value: unknown): boolean => typeof value === 'function';

const HandlerModuleSchema = z.object({
  handlers: z.array(HandlerDescriptorSchema).optional(),
  register: z.custom<(collect: Collect) => unknown>(isFunction, { message: 'register must be a function' }).optional(),
  setup: z.custom<SetupHook>(isFunction, { message: 'setup must be a function' }).optional(),
  default: z.unknown().optional(),
});

/**
 * Whether a file follows the handler-file convention: a JavaScript module that
 * is not an index/aggregator file
 */
export function isHandlerFile(path: string): boolean {
  const name = basename(path);
  const ext = extname(name);
  if (!HANDLER_EXTENSIONS.has(ext)) return false;

  return basename(name, ext) !== 'index';
}

/**
 * Handler files under a path: the file itself, or every handler file below a
 * directory (hidden and node_modules directories skipped), sorted
 */
export async function collectHandlerFiles(path: string): Promise<string[]> {
  const info = await stat(path);

  if (info.isFile()) {
    return isHandlerFile(path) ? [resolve(path)] : [];
  }
  if (!info.isDirectory()) {
    return [];
  }

  const files: string[] = [];
  const entries = await readdir(path, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const full = join(path, entry.name);
    if (entry.isDirectory()) {
      if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) continue;
      files.push(...(await collectHandlerFiles(full)));
    } else if (entry.isFile() && isHandlerFile(entry.name)) {
      files.push(resolve(full));
    }
  }

  return files;
}

/**
 * Read what a handler module contributes: `handlers`, `register`, `setup`,
 * either as named exports or on a default-exported object. A default-exported
 * array is taken as the descriptor list.
 *
 * The default export is read only when there are no named handler exports:
 * a CommonJS module shows its `exports` object both ways.
 *
 * @throws {Error} If an export has the wrong shape
 */
export function readHandlerModule(namespace: unknown): HandlerModuleExports {
  const named = parseModuleShape(namespace, '');
  if (named.handlers !== undefined || named.register !== undefined || named.setup !== undefined) {
    return toModuleExports(named);
  }

  const fallback = named.default;
  if (Array.isArray(fallback)) {
    return toModuleExports(parseModuleShape({ handlers: fallback }, 'default.'));
  }
  if (typeof fallback === 'object' && fallback !== null) {
    return toModuleExports(parseModuleShape(fallback, 'default.'));
  }
  return { descriptors: [], register: undefined, setup: undefined };
}

type ModuleShape = z.infer<typeof HandlerModuleSchema>;

function parseModuleShape(value: unknown, prefix: string): ModuleShape {
  const result = HandlerModuleSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${prefix}${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid handler module exports (${issues.join('; ')})`);
  }
  return result.data;
}

function toModuleExports({ handlers, register, setup }: ModuleShape): HandlerModuleExports {
  return { descriptors: handlers ?? [], register, setup };
}

/**
 * HandlerLoader - discovers handler files and imports each one in isolation
 *
 * A file that fails to load (syntax error, missing dependency, throwing at load
 * time, malformed exports) yields a LoadResult with an error; the remaining
 * files are still loaded.
 *
 * @example
 * ```typescript
 * const loader = new HandlerLoader(logger);
 * const results = await loader.discover(['/srv/handlers', '/opt/extra/orders.mjs']);
 * ```
 */
export class HandlerLoader {
  constructor(private readonly logger: Logger) {}

  /**
   * Load every handler file under the search paths, in path order
   */
  async discover(searchPaths: readonly string[]): Promise<LoadResult[]> {
    const files = await this.collectFiles(searchPaths);
    const results: LoadResult[] = [];

    for (const file of files) {
      results.push(await this.load(file));
    }

    return results;
  }

  /**
   * Candidate files under the search paths. Missing paths are skipped with a
   * warning; a file reachable through several paths is listed once.
   */
  async collectFiles(searchPaths: readonly string[]): Promise<string[]> {
    this.logger.info('Loading handlers from paths', { paths: searchPaths });

    const existing = searchPaths.filter((path) => {
      if (existsSync(path)) return true;
      this.logger.warn('Handler path does not exist, skipping', { path });
      return false;
    });

    if (existing.length === 0) {
      this.logger.warn('No valid handler paths found');
      return [];
    }

    const seen = new Set<string>();
    const files: string[] = [];

    for (const path of existing) {
      const found = await collectHandlerFiles(path);
      if (found.length === 0) {
        this.logger.warn('No handler files found', { path });
        continue;
      }
      this.logger.debug('Found handler files', { path, count: found.length });

      for (const file of found) {
        if (seen.has(file)) {
          this.logger.debug('Handler file already listed, skipping', { file });
          continue;
        }
        seen.add(file);
        files.push(file);
      }
    }

    this.logger.info('Collected handler files', { count: files.length });
    return files;
  }

  /**
   * Import one handler file
   */
  async load(file: string): Promise<LoadResult> {
    try {
      const namespace: unknown = await import(pathToFileURL(file).href);
      const exports = readHandlerModule(namespace);
      this.logger.debug('Loaded handler file', {
        path: file,
        descriptors: exports.descriptors.length,
        register: exports.register !== undefined,
        setup: exports.setup !== undefined,
      });
      return { path: file, exports };
    } catch (cause) {
      const error = new HandlerLoadError(file, { cause });
      this.logger.error(error.message, { path: file });
      return { path: file, error };
    }
  }
}
