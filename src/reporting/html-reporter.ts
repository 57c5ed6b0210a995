/**
 * HTML report renderer.
 *
 * Builds the report body from TLP-redacted metadata and result partials,
 * then fills it into a layout template. Rendering is a pure function of
 * its input: the only time value is the caller-supplied `generatedAt`, so
 * the same input always yields byte-identical HTML.
 */

import type { Classified, Platform, QueryMetadata, TlpLevel } from '../types/config.js';
import type { ResolvedResult } from '../types/results.js';
import { redactMetadata, tlpLabel, visibleValue, type VisibleMetadata } from '../tlp/redaction.js';
import { escapeHtml } from '../utils/html.js';
import { formatDisplayTimestamp, formatRunStamp } from '../utils/time.js';
import { createDefaultRegistry, type PartialRegistry } from './partials.js';
import { fillTemplate, type ReportTemplate } from './template.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/** A query or group as the report shows it. */
export interface SectionSource {
  name: string;
  metadata: QueryMetadata;
  /** Search string; null for groups. */
  query: Classified<string> | null;
  platform: Platform | null;
}

interface ReportInputBase {
  entry: SectionSource;
  results: ResolvedResult[];
  ceiling: TlpLevel;
  generatedAt: Date;
  username: string;
  registry?: PartialRegistry;
}

export interface SingleReportInput extends ReportInputBase {
  mode: 'single';
}

export interface GroupReportInput extends ReportInputBase {
  mode: 'group';
  /** Leaf queries in the group's declared order. */
  sections: SectionSource[];
}

export type ReportInput = SingleReportInput | GroupReportInput;

export interface ReportSection {
  source: SectionSource;
  results: ResolvedResult[];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Partition results by `sourceQuery`, one section per source in the given
 * order. Results naming an unlisted source get a section of their own,
 * appended in first-seen order.
 */
export function partitionBySource(
  sources: SectionSource[],
  results: ResolvedResult[],
): ReportSection[] {
  const sections = new Map<string, ReportSection>();
  for (const source of sources) {
    if (!sections.has(source.name)) {
      sections.set(source.name, { source, results: [] });
    }
  }
  for (const result of results) {
    let section = sections.get(result.sourceQuery);
    if (!section) {
      section = { source: orphanSource(result), results: [] };
      sections.set(result.sourceQuery, section);
    }
    section.results.push(result);
  }
  return [...sections.values()];
}

export function reportTitle(entry: SectionSource, ceiling: TlpLevel): string {
  return redactMetadata(entry.metadata, ceiling).title ?? `Masquerade Monitor Report - ${entry.name}`;
}

export function renderReport(input: ReportInput, template: ReportTemplate): string {
  const registry = input.registry ?? createDefaultRegistry();
  const body =
    input.mode === 'group'
      ? renderGroupBody(input, registry)
      : renderSingleBody(input, registry);

  return fillTemplate(template, {
    title: escapeHtml(reportTitle(input.entry, input.ceiling)),
    tlp: escapeHtml(tlpLabel(input.ceiling)),
    tlp_class: `tlp-${input.ceiling}`,
    generated_at: escapeHtml(formatDisplayTimestamp(input.generatedAt)),
    username: escapeHtml(input.username),
    body,
  });
}

/** Replace everything outside `[A-Za-z0-9._-]` so a name is path-safe. */
export function safeFileComponent(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, '_');
}

/** `<name>_<YYYYMMDD_HHMMSS>` with a `_group` suffix for groups. */
export function runDirectoryName(name: string, startedAt: Date, isGroup: boolean): string {
  return `${safeFileComponent(name)}_${formatRunStamp(startedAt)}${isGroup ? '_group' : ''}`;
}

/** `report_<name>_<YYYYMMDD_HHMMSS>_TLP-<level>.html` */
export function reportFileName(name: string, startedAt: Date, ceiling: TlpLevel): string {
  return `report_${safeFileComponent(name)}_${formatRunStamp(startedAt)}_TLP-${ceiling}.html`;
}

// ---------------------------------------------------------------------------
// Body builders
// ---------------------------------------------------------------------------

function renderSingleBody(input: SingleReportInput, registry: PartialRegistry): string {
  const lines: string[] = [];
  lines.push('<section class="report-overview">');
  lines.push(renderMetadataBlock(input.entry, input.ceiling));
  lines.push(`<p class="result-count">Results: ${input.results.length}</p>`);
  lines.push('</section>');
  lines.push(renderResults(input.results, registry));
  return lines.join('\n');
}

function renderGroupBody(input: GroupReportInput, registry: PartialRegistry): string {
  const sections = partitionBySource(input.sections, input.results);
  const lines: string[] = [];

  lines.push('<section class="report-overview">');
  lines.push(renderMetadataBlock(input.entry, input.ceiling));
  lines.push(`<p class="result-count">Total results: ${input.results.length}</p>`);
  lines.push('<nav class="toc">');
  lines.push('<ol>');
  for (const [index, section] of sections.entries()) {
    lines.push(
      `<li><a href="#${sectionAnchor(index, section.source.name)}">${escapeHtml(section.source.name)}</a> ` +
        `<span class="count">(${section.results.length})</span></li>`,
    );
  }
  lines.push('</ol>');
  lines.push('</nav>');
  lines.push('</section>');

  for (const [index, section] of sections.entries()) {
    const heading = redactMetadata(section.source.metadata, input.ceiling).title ?? section.source.name;
    lines.push(
      `<section class="query-section" id="${sectionAnchor(index, section.source.name)}" ` +
        `data-source-query="${escapeHtml(section.source.name)}" data-count="${section.results.length}">`,
    );
    lines.push(`<h2>${escapeHtml(heading)}</h2>`);
    lines.push(renderMetadataBlock(section.source, input.ceiling));
    lines.push(`<p class="result-count">Results: ${section.results.length}</p>`);
    lines.push(renderResults(section.results, registry));
    lines.push('</section>');
  }

  return lines.join('\n');
}

function renderResults(results: ResolvedResult[], registry: PartialRegistry): string {
  if (results.length === 0) {
    return '<p class="no-results">No results in this window.</p>';
  }
  return `<div class="results">\n${results.map((r) => registry.render(r)).join('\n')}\n</div>`;
}

function renderMetadataBlock(source: SectionSource, ceiling: TlpLevel): string {
  const meta: VisibleMetadata = redactMetadata(source.metadata, ceiling);
  const query = visibleValue(source.query, ceiling);
  const rows: string[] = [];

  if (query !== null) {
    rows.push(definition('Query', `<code>${escapeHtml(query)}</code>`));
  }
  if (source.platform !== null) {
    rows.push(definition('Platform', escapeHtml(source.platform)));
  }
  if (meta.description !== null) {
    rows.push(definition('Description', escapeHtml(meta.description)));
  }
  if (meta.frequency !== null) {
    rows.push(definition('Frequency', escapeHtml(meta.frequency)));
  }
  if (meta.priority !== null) {
    rows.push(definition('Priority', escapeHtml(meta.priority)));
  }
  if (meta.tags.length > 0) {
    const tags = meta.tags.map((t) => `<span class="tag">${escapeHtml(t)}</span>`).join(' ');
    rows.push(definition('Tags', tags));
  }
  if (meta.notes.length > 0) {
    rows.push(definition('Notes', list(meta.notes.map(escapeHtml))));
  }
  if (meta.references.length > 0) {
    rows.push(definition('References', list(meta.references.map(renderReference))));
  }

  return `<dl class="metadata">\n${rows.join('\n')}\n</dl>`;
}

function definition(label: string, html: string): string {
  return `<dt>${label}</dt><dd>${html}</dd>`;
}

function list(items: string[]): string {
  return `<ul>${items.map((item) => `<li>${item}</li>`).join('')}</ul>`;
}

function renderReference(reference: string): string {
  const escaped = escapeHtml(reference);
  return /^https?:\/\//i.test(reference)
    ? `<a href="${escaped}" rel="noopener noreferrer">${escaped}</a>`
    : escaped;
}

/** Position-prefixed, since distinct names can share a safe form. */
function sectionAnchor(index: number, name: string): string {
  return `section-${index + 1}-${safeFileComponent(name)}`;
}

function orphanSource(result: ResolvedResult): SectionSource {
  return {
    name: result.sourceQuery,
    metadata: {
      description: null,
      notes: [],
      references: [],
      frequency: null,
      priority: null,
      tags: [],
      titles: [],
    },
    query: null,
    platform: result.platform,
  };
}
