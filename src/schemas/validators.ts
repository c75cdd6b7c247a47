/**
 * Schema Validation with Zod
 * Runtime validation for the data dockstart reads from outside: the
 * per-container lines projected out of `docker inspect`, and the JSON
 * configuration file
 */

import { z } from 'zod';

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

function parseJson(json: string): ValidationResult<unknown> {
  try {
    return { success: true, data: JSON.parse(json) };
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
}

// =============================================================================
// Container line schema (one `jq -c` line per container)
// =============================================================================

export const containerLineSchema = z.object({
  name: z.string().min(1, 'Container name cannot be empty'),
  /** null when the runtime reports no restart policy at all */
  restartPolicy: z.string().nullable(),
  running: z.boolean(),
  exitCode: z.number().int().nullable(),
});

export type ContainerLine = z.infer<typeof containerLineSchema>;

/**
 * Validate one projected container object
 */
export function validateContainerLine(data: unknown): ValidationResult<ContainerLine> {
  const result = containerLineSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse one line of `jq -c` output
 */
export function parseContainerLine(json: string): ValidationResult<ContainerLine> {
  const parsed = parseJson(json);
  if (!parsed.success) {
    return { success: false, errors: parsed.errors };
  }
  return validateContainerLine(parsed.data);
}

// =============================================================================
// Config file schema
// =============================================================================

/** Non-zero byte count, or a count with a K/M/G suffix */
export const SIZE_PATTERN = /^(\d*[1-9]\d*)([KMG])?$/i;

export const configFileSchema = z
  .object({
    retry: z.boolean().optional(),
    /** Seconds */
    retryInterval: z.number().int().positive().optional(),
    /** Seconds */
    maxWait: z.number().int().positive().optional(),
    force: z.boolean().optional(),
    logFile: z.string().min(1).optional(),
    logSize: z
      .union([
        z.number().int().positive(),
        z.string().regex(SIZE_PATTERN, 'Expected a size such as 512K, 1M or a byte count'),
      ])
      .optional(),
    log: z.boolean().optional(),
    verbose: z.boolean().optional(),
    dockerCommand: z.string().min(1).optional(),
    jqCommand: z.string().min(1).optional(),
    containerPauseMs: z.number().int().min(0).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Validate a parsed configuration file
 */
export function validateConfigFile(data: unknown): ValidationResult<ConfigFile> {
  const result = configFileSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse configuration file content
 */
export function parseConfigFile(json: string): ValidationResult<ConfigFile> {
  const parsed = parseJson(json);
  if (!parsed.success) {
    return { success: false, errors: parsed.errors };
  }
  return validateConfigFile(parsed.data);
}
