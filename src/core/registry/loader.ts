/**
 * Module registry construction.
 *
 * The registry is built once at startup, validated for path-safety and
 * uniqueness, and frozen. Every downstream component iterates it in order.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ModuleDescriptorSchema, ModulesFileSchema, type ModuleDescriptor } from './schema.js';
import { DEFAULT_MODULES } from './defaults.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export type ModuleRegistry = readonly ModuleDescriptor[];

/**
 * Validate raw descriptors and freeze them into a registry.
 *
 * @throws ConfigError on an invalid name or a duplicate
 */
export function createRegistry(descriptors: readonly unknown[]): ModuleRegistry {
  const parsed = z.array(ModuleDescriptorSchema).safeParse(descriptors);
  if (!parsed.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_MODULES_FILE,
      `Invalid module list: ${formatZodError(parsed.error)}`,
      { errors: parsed.error.issues }
    );
  }

  const seen = new Set<string>();
  for (const module of parsed.data) {
    if (seen.has(module.name)) {
      throw new ConfigError(
        ErrorCodes.DUPLICATE_MODULE,
        `Duplicate module name: ${module.name}`,
        { name: module.name }
      );
    }
    seen.add(module.name);
  }

  return Object.freeze(parsed.data.map((module) => Object.freeze({ ...module })));
}

/**
 * Load a registry from a YAML modules file.
 */
export async function loadRegistryFile(projectRoot: string, modulesFile: string): Promise<ModuleRegistry> {
  const fullPath = path.resolve(projectRoot, modulesFile);
  const file = await loadYamlWithSchema(fullPath, ModulesFileSchema);
  return createRegistry(file.modules);
}

/**
 * Load the registry from a modules file if given, else the built-in list.
 */
export async function loadRegistry(projectRoot: string, modulesFile?: string): Promise<ModuleRegistry> {
  if (modulesFile) {
    return loadRegistryFile(projectRoot, modulesFile);
  }
  return createRegistry(DEFAULT_MODULES);
}

/**
 * Restrict a registry to the named modules, keeping registry order.
 *
 * @throws ConfigError when a name is not in the registry
 */
export function selectModules(registry: ModuleRegistry, names: readonly string[]): ModuleRegistry {
  const known = new Set(registry.map((m) => m.name));
  const unknown = names.filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new ConfigError(
      ErrorCodes.UNKNOWN_MODULE,
      `Unknown module(s): ${unknown.join(', ')}`,
      { unknown, available: [...known] }
    );
  }
  const wanted = new Set(names);
  return Object.freeze(registry.filter((m) => wanted.has(m.name)));
}
