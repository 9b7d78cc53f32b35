/**
 * Module registry schema.
 */
import { z } from 'zod';

/** Names that would collide with top-level output under BASE_DIR (directories and the bundle archive). */
export const RESERVED_MODULE_NAMES = ['packaging', 'logs', 'bundle'] as const;

/** Lowercase, path-safe segment: no separators, no leading dot. */
export const MODULE_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

export const ModuleDescriptorSchema = z.object({
  name: z
    .string()
    .min(1, 'module name must not be empty')
    .regex(MODULE_NAME_PATTERN, 'module name must match [a-z0-9][a-z0-9._-]*')
    .refine(
      (name) => !(RESERVED_MODULE_NAMES as readonly string[]).includes(name),
      { message: `module name is reserved (${RESERVED_MODULE_NAMES.join(', ')})` }
    ),
  description: z.string().default(''),
});

/** Shape of a modules file. */
export const ModulesFileSchema = z.object({
  modules: z.array(ModuleDescriptorSchema).min(1, 'at least one module is required'),
});

export type ModuleDescriptor = Readonly<z.infer<typeof ModuleDescriptorSchema>>;
export type ModulesFile = z.infer<typeof ModulesFileSchema>;
