import { validate, type Schema } from '../../infra/validator.js';
import { isPlainObject } from '../../infra/types.js';
import { ValidationError } from '../../errors.js';
import { DEFAULT_PLUGIN_AUTHOR, DEFAULT_PLUGIN_VERSION } from '../../constants.js';
import type { PluginDescriptor, PluginManifest } from './types.js';

/** Only the id is strict: it becomes a registry key. */
const MANIFEST_SCHEMA: Schema = {
  id: { type: 'string', required: false },
};

const TEXT_FIELDS = ['name', 'description', 'version', 'author', 'icon'] as const;

export interface ParsedManifest {
  manifest: PluginManifest;
  /** Fields that were coerced or dropped in favour of their defaults */
  warnings: string[];
}

/** Returns the reason an id is unsafe, or null when it may be used as a key. */
export function checkPluginId(id: string): string | null {
  if (id.length === 0) return 'id is empty';
  if (id.includes('/') || id.includes('\\')) return 'id contains a path separator';
  if (id.includes('..')) return 'id contains a parent-directory token';
  return null;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Parses plugin.json. A non-object root or a non-string id rejects the
 * manifest; other fields of the wrong type are coerced to text (numbers,
 * booleans) or left to their defaults, with a warning each.
 */
export function parseManifest(raw: string): ParsedManifest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ValidationError('Invalid JSON in manifest', [e instanceof Error ? e.message : String(e)], { cause: e });
  }
  if (!isPlainObject(parsed)) {
    throw new ValidationError('Invalid manifest', ['root must be an object']);
  }
  const errors = validate(parsed, MANIFEST_SCHEMA);
  if (errors.length > 0) {
    throw new ValidationError('Invalid manifest', errors);
  }

  const manifest: PluginManifest = {};
  const warnings: string[] = [];
  const id = parsed['id'];
  if (typeof id === 'string') manifest.id = id;

  for (const field of TEXT_FIELDS) {
    const value = parsed[field];
    if (value === undefined) continue;
    if (typeof value === 'string') {
      manifest[field] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      manifest[field] = String(value);
      warnings.push(`${field} should be a string, got ${typeof value}`);
    } else {
      warnings.push(`${field} should be a string, got ${describeType(value)}; using the default`);
    }
  }

  const admin = parsed['requires_admin'];
  if (typeof admin === 'boolean') {
    manifest.requires_admin = admin;
  } else if (admin !== undefined) {
    warnings.push(`requires_admin should be a boolean, got ${describeType(admin)}; using the default`);
  }

  return { manifest, warnings };
}

/**
 * Builds the frozen descriptor for a plugin directory. The id and name
 * default to the directory name.
 */
export function toDescriptor(manifest: PluginManifest, dirName: string, location: string): PluginDescriptor {
  const id = manifest.id ?? dirName;
  const problem = checkPluginId(id);
  if (problem) {
    throw new ValidationError(`Invalid plugin ID '${id}'`, [problem]);
  }
  const descriptor: PluginDescriptor = {
    id,
    name: manifest.name ?? dirName,
    description: manifest.description ?? '',
    version: manifest.version ?? DEFAULT_PLUGIN_VERSION,
    author: manifest.author ?? DEFAULT_PLUGIN_AUTHOR,
    location,
    ...(typeof manifest.icon === 'string' ? { icon: manifest.icon } : {}),
    requiresElevatedRights: manifest.requires_admin ?? false,
  };
  return Object.freeze(descriptor);
}
