/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_MODULES_FILE,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.PARSE_ERROR,
      `Failed to load YAML file: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof ConfigError) {
      // Re-throw with file path context
      throw new ConfigError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

/**
 * Stringify a value to YAML. Key order follows insertion order, so equal inputs
 * always produce equal text.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
