import { promises as fs } from 'node:fs';
import { createRequire } from 'node:module';
import { join } from 'node:path';
import * as vm from 'node:vm';
import { statOrNull } from '../../infra/fs-utils.js';
import { err, ok } from '../../infra/types.js';
import {
  PluginImportError, PluginLoadError, PluginRuntimeError, PluginSyntaxError, errorMessage,
} from '../../errors.js';
import { ENTRY_FILE, PLUGIN_URL_SCHEME } from '../../constants.js';
import type { LoadResult, LoadedModule, PluginDescriptor } from './types.js';

/** Parameters of the CommonJS wrapper every plugin unit is compiled into. */
export const UNIT_WRAPPER_PARAMS = ['exports', 'require', 'module', '__filename', '__dirname'];

interface Unit {
  exports: unknown;
}

/** Runs a compiled unit's top-level code against its own `module`. */
type UnitFactory = (unit: Unit, require: NodeJS.Require, filename: string, dirname: string) => void;

function compileUnit(source: string, filename: string): UnitFactory {
  const compiled = vm.compileFunction(source, UNIT_WRAPPER_PARAMS, { filename });
  return (unit, require, entryFile, dirname) => {
    Reflect.apply(compiled, unit.exports, [unit.exports, require, unit, entryFile, dirname]);
  };
}

const IMPORT_ERROR_CODES = new Set([
  'MODULE_NOT_FOUND',
  'ERR_MODULE_NOT_FOUND',
  'ERR_REQUIRE_ESM',
  'ERR_PACKAGE_PATH_NOT_EXPORTED',
]);

export function entryFileOf(descriptor: PluginDescriptor): string {
  return join(descriptor.location, ENTRY_FILE);
}

/** Virtual file name each plugin's code is compiled under. */
export function unitFilename(pluginId: string): string {
  return `${PLUGIN_URL_SCHEME}${pluginId}/${ENTRY_FILE}`;
}

/**
 * Compiles plugin entry files as CommonJS units. Every plugin gets its own
 * `module`, `exports` and a `require` rooted at its directory, so same-named
 * internals in two plugins never meet. Each load compiles and runs the
 * unit's top-level code afresh.
 */
export class PluginModuleLoader {
  async load(descriptor: PluginDescriptor): Promise<LoadResult> {
    const id = descriptor.id;
    const entryFile = entryFileOf(descriptor);

    try {
      const stat = await statOrNull(entryFile);
      if (!stat) return err(new PluginLoadError(`Plugin ${id} has no ${ENTRY_FILE}`, id));
      if (!stat.isFile()) return err(new PluginLoadError(`Plugin ${id} ${ENTRY_FILE} is not a file`, id));
    } catch (e) {
      return err(new PluginLoadError(`Could not read plugin ${id}: ${errorMessage(e)}`, id, 'io', 'LOAD_ERROR', { cause: e }));
    }

    let source: string;
    try {
      source = await fs.readFile(entryFile, 'utf-8');
    } catch (e) {
      return err(new PluginLoadError(`Could not read plugin ${id}: ${errorMessage(e)}`, id, 'io', 'LOAD_ERROR', { cause: e }));
    }

    const filename = unitFilename(id);
    let factory: UnitFactory;
    try {
      factory = compileUnit(source, filename);
    } catch (e) {
      return err(new PluginSyntaxError(id, errorMessage(e), syntaxErrorLine(e, filename), { cause: e }));
    }

    const unit: Unit = { exports: {} };
    try {
      factory(unit, createRequire(entryFile), entryFile, descriptor.location);
    } catch (e) {
      return err(classifyInitFailure(id, e));
    }

    const loaded: LoadedModule = { descriptor, entryFile, exports: unit.exports };
    return ok(loaded);
  }
}

/** Reads a named export off whatever the unit exported. */
export function readExport(moduleExports: unknown, name: string): unknown {
  if ((typeof moduleExports === 'object' && moduleExports !== null) || typeof moduleExports === 'function') {
    return Reflect.get(moduleExports, name);
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Compile errors carry `<filename>:<line>` as the first line of their stack. */
export function syntaxErrorLine(error: unknown, filename: string): number | undefined {
  if (!(error instanceof Error) || !error.stack) return undefined;
  const firstLine = error.stack.split('\n', 1)[0];
  if (!firstLine.startsWith(`${filename}:`)) return undefined;
  const line = Number.parseInt(firstLine.slice(filename.length + 1), 10);
  return Number.isNaN(line) ? undefined : line;
}

function classifyInitFailure(pluginId: string, error: unknown): PluginLoadError {
  const code = errorCode(error);
  const message = errorMessage(error);
  if (code !== undefined && IMPORT_ERROR_CODES.has(code)) {
    const match = /Cannot find (?:module|package) '([^']+)'/.exec(message);
    return new PluginImportError(pluginId, match?.[1], message.split('\n', 1)[0], { cause: error });
  }
  const name = error instanceof Error ? error.name : typeof error;
  return new PluginRuntimeError(pluginId, name, message, { cause: error });
}
