/**
 * Report layout templates.
 *
 * A template is an HTML file with `{{slot}}` placeholders. The renderer
 * fills a fixed set of slots; `body` must appear, and any slot name the
 * renderer does not know is rejected when the template is loaded.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { RenderError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('template');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export const TEMPLATE_SLOTS = ['title', 'tlp', 'tlp_class', 'generated_at', 'username', 'body'] as const;

export type TemplateSlot = (typeof TEMPLATE_SLOTS)[number];

export type SlotValues = Record<TemplateSlot, string>;

export interface ReportTemplate {
  /** Where the template came from, or `<inline>`. */
  path: string;
  source: string;
}

/** Layout shipped with the package. */
export const BUILTIN_TEMPLATE_PATH = fileURLToPath(
  new URL('../../templates/report_template.html', import.meta.url),
);

const SLOT_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isTemplateSlot(name: string): name is TemplateSlot {
  return (TEMPLATE_SLOTS as readonly string[]).includes(name);
}

/**
 * Validate template source and wrap it.
 *
 * @throws {RenderError} On an unknown slot or a missing `body` slot.
 */
export function parseTemplate(source: string, path = '<inline>'): ReportTemplate {
  const seen = new Set<string>();
  for (const match of source.matchAll(SLOT_PATTERN)) {
    const name = match[1] ?? '';
    if (!isTemplateSlot(name)) {
      throw new RenderError(`Unknown template slot "{{${name}}}"`, path);
    }
    seen.add(name);
  }
  if (!seen.has('body')) {
    throw new RenderError('Template has no {{body}} slot', path);
  }
  return { path, source };
}

/** Substitute every slot. Values are inserted as-is; callers escape them. */
export function fillTemplate(template: ReportTemplate, values: SlotValues): string {
  return template.source.replace(SLOT_PATTERN, (whole, name: string) =>
    isTemplateSlot(name) ? values[name] : whole,
  );
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export async function loadTemplate(path: string): Promise<ReportTemplate> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (err) {
    throw new RenderError(`Cannot read template: ${errorMessage(err)}`, path, { cause: err });
  }
  return parseTemplate(source, path);
}

/**
 * Load the override template, falling back to `defaultPath` (the bundled
 * layout when not given) if the override cannot be loaded.
 *
 * @throws {RenderError} When the default itself fails.
 */
export async function resolveTemplate(
  overridePath: string | null,
  defaultPath: string | null = null,
): Promise<ReportTemplate> {
  const fallback = defaultPath ?? BUILTIN_TEMPLATE_PATH;
  if (overridePath && overridePath !== fallback) {
    try {
      return await loadTemplate(overridePath);
    } catch (err) {
      logger.warn(`Template override failed, using ${fallback}: ${errorMessage(err)}`);
    }
  }
  return loadTemplate(fallback);
}
