/**
 * Zod schemas for the raw configuration document.
 *
 * The document is snake_case JSON or YAML. Unknown keys are kept
 * (passthrough) so that writing `last_run` back never drops fields the
 * analyst added by hand.
 */

import { z } from 'zod';
import { PLATFORMS, TLP_LEVELS } from '../types/config.js';

export const TlpLevelSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(TLP_LEVELS));

const PlatformSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(z.enum(PLATFORMS));

const Scalar = z.union([z.string(), z.number()]).transform((v) => String(v));

const NoteItemSchema = z.union([
  z.string(),
  z.object({ text: z.string(), tlp_level: TlpLevelSchema.optional() }),
]);

const ReferenceItemSchema = z.union([
  z.string(),
  z.object({ url: z.string(), tlp_level: TlpLevelSchema.optional() }),
]);

const TagItemSchema = z.union([
  z.string(),
  z.object({ tag: z.string(), tlp_level: TlpLevelSchema.optional() }),
]);

const TitleItemSchema = z.union([
  z.string(),
  z.object({ title: z.string(), tlp_level: TlpLevelSchema.optional() }),
]);

const metadataShape = {
  description: z.string().optional(),
  description_tlp_level: TlpLevelSchema.optional(),
  notes: z.union([z.string(), z.array(NoteItemSchema)]).optional(),
  notes_tlp_level: TlpLevelSchema.optional(),
  references: z.union([z.string(), z.array(ReferenceItemSchema)]).optional(),
  references_tlp_level: TlpLevelSchema.optional(),
  frequency: Scalar.optional(),
  frequency_tlp_level: TlpLevelSchema.optional(),
  priority: Scalar.optional(),
  priority_tlp_level: TlpLevelSchema.optional(),
  tags: z.union([z.string(), z.array(TagItemSchema)]).optional(),
  tags_tlp_level: TlpLevelSchema.optional(),
  titles: z.array(TitleItemSchema).optional(),
  titles_tlp_level: TlpLevelSchema.optional(),
  last_run: z.string().nullable().optional(),
  default_tlp_level: TlpLevelSchema.optional(),
  template_path: z.string().min(1).optional(),
};

export const RawQuerySchema = z
  .object({
    type: z.literal('query').optional(),
    query: z.string().min(1, 'query string must not be empty'),
    query_tlp_level: TlpLevelSchema.optional(),
    platform: PlatformSchema.default('urlscan'),
    endpoint: z.string().min(1).optional(),
    days: z.number().int().positive().optional(),
    ...metadataShape,
  })
  .passthrough();

export const RawGroupSchema = z
  .object({
    type: z.literal('query_group'),
    queries: z.array(z.string().min(1)).min(1, 'a query group needs at least one member'),
    ...metadataShape,
  })
  .passthrough();

export const RawDocumentSchema = z
  .object({
    output_directory: z.string().min(1).default('output'),
    default_days: z.number().int().positive().default(7),
    report_username: z.string().default(''),
    default_tlp_level: TlpLevelSchema.default('clear'),
    default_template_path: z.string().min(1).optional(),
    queries: z.record(z.string().min(1), z.unknown()),
  })
  .passthrough();

export type RawQuery = z.infer<typeof RawQuerySchema>;
export type RawGroup = z.infer<typeof RawGroupSchema>;
export type RawDocument = z.infer<typeof RawDocumentSchema>;
export type RawMetadata = Pick<RawQuery, keyof typeof metadataShape>;

/**
 * Render zod issues as `path: message` pairs joined on one line.
 */
export function formatIssues(error: z.ZodError, prefix: Array<string | number> = []): string {
  return error.issues
    .map((issue) => {
      const path = [...prefix, ...issue.path].join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
