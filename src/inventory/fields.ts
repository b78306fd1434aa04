/**
 * Record layouts: each parser declares the exact field list it expects, how
 * a line splits into those fields, and the numeric base its size fields use.
 * A line that does not fit its layout is skipped and counted, never coerced.
 */

import { z } from 'zod';
import type { ParseIssue, ParseResult } from '../types/inventory.js';
import { parseCount, parseSize, type SizeBase } from '../utils/data-size.js';

export type Row = Record<string, string>;

/**
 * Field validators bound to a layout's size base
 */
export interface FieldKit {
  required(): z.ZodType<string, z.ZodTypeDef, string>;
  text(): z.ZodType<string | null, z.ZodTypeDef, string>;
  size(): z.ZodType<number | null, z.ZodTypeDef, string>;
  count(): z.ZodType<number, z.ZodTypeDef, string>;
  optionalCount(): z.ZodType<number | null, z.ZodTypeDef, string>;
}

export interface RecordLayout<T> {
  source: string;
  fields: readonly string[];
  /** Fields some tool versions omit; a missing one reads as empty */
  optional: ReadonlySet<string>;
  sizeBase: SizeBase;
  tokenize: (line: string) => ReadonlyArray<string | undefined>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface LayoutSpec<T> {
  source: string;
  fields: readonly string[];
  optional?: readonly string[];
  sizeBase: SizeBase;
  tokenize: (line: string) => ReadonlyArray<string | undefined>;
  build: (kit: FieldKit) => z.ZodType<T, z.ZodTypeDef, unknown>;
}

export type LineResult<T> = { ok: true; record: T } | { ok: false; message: string };

export function createFieldKit(base: SizeBase): FieldKit {
  return {
    required: () => z.string().trim().min(1, 'required field is empty'),
    text: () =>
      z.string().transform(value => {
        const trimmed = value.trim();
        return trimmed === '' ? null : trimmed;
      }),
    size: () => z.string().transform(value => parseSize(value, base)),
    count: () =>
      z.string().transform((value, ctx) => {
        const parsed = parseCount(value);
        if (parsed === null) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a whole number, got "${value}"` });
          return z.NEVER;
        }
        return parsed;
      }),
    optionalCount: () => z.string().transform(value => parseCount(value)),
  };
}

export function defineLayout<T>(spec: LayoutSpec<T>): RecordLayout<T> {
  return {
    source: spec.source,
    fields: spec.fields,
    optional: new Set(spec.optional ?? []),
    sizeBase: spec.sizeBase,
    tokenize: spec.tokenize,
    schema: spec.build(createFieldKit(spec.sizeBase)),
  };
}

/**
 * Split on a fixed separator, trimming each value
 */
export function splitOn(separator: string): (line: string) => string[] {
  return line => line.split(separator).map(value => value.trim());
}

/**
 * Validate one line against a layout
 */
export function parseLine<T>(line: string, layout: RecordLayout<T>): LineResult<T> {
  const values = layout.tokenize(line);
  if (values.length !== layout.fields.length) {
    return { ok: false, message: `expected ${layout.fields.length} fields, got ${values.length}` };
  }

  const row: Row = {};
  for (let i = 0; i < layout.fields.length; i++) {
    const field = layout.fields[i];
    if (field === undefined) continue;
    const value = values[i];
    if (value === undefined && !layout.optional.has(field)) {
      return { ok: false, message: `missing field ${field}` };
    }
    row[field] = value ?? '';
  }

  const parsed = layout.schema.safeParse(row);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
      .join('; ');
    return { ok: false, message };
  }
  return { ok: true, record: parsed.data };
}

/**
 * Parse line-oriented output where every non-blank line is one record
 */
export function parseRecords<T>(
  text: string,
  layout: RecordLayout<T>,
  options: { header?: boolean } = {}
): ParseResult<T> {
  const result: ParseResult<T> = { records: [], skipped: 0, issues: [] };
  let pendingHeader = options.header === true;

  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === '') return;
    if (pendingHeader) {
      pendingHeader = false;
      return;
    }

    const parsed = parseLine(raw, layout);
    if (parsed.ok) {
      result.records.push(parsed.record);
    } else {
      recordSkip(result, { line: index + 1, message: `${layout.source}: ${parsed.message}` });
    }
  });

  return result;
}

export function recordSkip<T>(result: ParseResult<T>, issue: ParseIssue): void {
  result.skipped++;
  result.issues.push(issue);
}
