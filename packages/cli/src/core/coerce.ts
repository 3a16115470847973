/**
 * Argument validation helpers
 *
 * Commander gives camelCase keys; these only validate values, never rename keys.
 */

import type { z } from 'zod';
import { ValidationError } from '@stratgate/utils';

/**
 * Parse raw options with a command schema; failures become a ValidationError
 * naming every offending option
 */
export function validateArgs<S extends z.ZodTypeAny>(schema: S, raw: unknown, command: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? `--${toKebab(issue.path.join('.'))}` : 'options'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid arguments for ${command}: ${details}`, { command });
  }
  return parsed.data;
}

export function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

/**
 * Parse JSON text, reporting the source on failure
 */
export function coerceJson(text: string, name: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new ValidationError(`Invalid JSON in ${name}: ${e instanceof Error ? e.message : String(e)}`, {
      name,
    });
  }
}
