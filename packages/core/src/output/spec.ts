import { z } from 'zod';
import { ParseError } from '../errors.js';
import { normalizeTreePath } from '../tree/file-tree.js';

export interface OutputEntry {
  source: string; // directory or file in the bundle tree
  dest: string;
  process: boolean;
}

/**
 * Declarative source to destination mapping, as declared by a bundle
 */
export type OutputSpec =
  | { kind: 'absent' }
  | { kind: 'parent'; path: string }
  | { kind: 'explicit'; entries: OutputEntry[] };

const OutputTargetSchema = z.union([
  z.string(),
  z
    .object({
      dest: z.string().optional(),
      process: z.boolean().optional(),
    })
    .strict(),
]);

const OutputSpecSchema = z.union([z.string(), z.record(OutputTargetSchema)]);

/**
 * Parse a raw `output` value from manifest data.
 *
 * - absent (undefined or null) → auto-discovery
 * - string → parent directory for every discovered top-level directory
 * - mapping → explicit entries; values are a destination string or `{dest, process}`
 *
 * A descriptor without `dest` keeps the source path.
 *
 * @throws ParseError for any other shape
 */
export function parseOutputSpec(raw: unknown, file?: string): OutputSpec {
  if (raw === undefined || raw === null) {
    return { kind: 'absent' };
  }

  const result = OutputSpecSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors
      .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('; ');
    throw new ParseError(`invalid output specification: ${details}`, file);
  }

  const data = result.data;
  if (typeof data === 'string') {
    return { kind: 'parent', path: normalizeTreePath(data) };
  }

  const entries = Object.entries(data).map(([key, target]): OutputEntry => {
    const source = normalizeTreePath(key);
    if (typeof target === 'string') {
      return { source, dest: normalizeTreePath(target), process: true };
    }
    return {
      source,
      dest: target.dest === undefined ? source : normalizeTreePath(target.dest),
      process: target.process ?? true,
    };
  });

  return { kind: 'explicit', entries };
}
