/**
 * HTML escaping helpers for the report renderer.
 */

const ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => ENTITIES[ch] ?? ch);
}

/** Escape a possibly-missing value, rendering `N/A` for null. */
export function escapeOrNA(value: string | null | undefined): string {
  return value === null || value === undefined || value === '' ? 'N/A' : escapeHtml(value);
}
