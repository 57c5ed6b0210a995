/**
 * Google Tag Manager container IDs from a scanned page's DOM.
 *
 * Masquerade kits are often cloned together with the victim's or the
 * operator's GTM container, which makes the ID a useful pivot.
 */

import * as cheerio from 'cheerio';

const GTM_ID = /\bGTM-[A-Z0-9]{4,10}\b/g;

/**
 * Extract unique GTM IDs in order of first appearance. Tag-manager
 * `src` attributes, inline scripts and `<noscript>` fallbacks are searched
 * first; the whole document is scanned only when they yield nothing.
 */
export function extractGtmIds(html: string): string[] {
  if (html.trim() === '') return [];

  const $ = cheerio.load(html);
  const places: string[] = [];

  $('iframe[src], script[src]').each((_, el) => {
    const src = $(el).attr('src');
    if (src && src.includes('googletagmanager.com')) places.push(src);
  });
  $('script:not([src])').each((_, el) => {
    places.push($(el).text());
  });
  $('noscript').each((_, el) => {
    places.push($(el).html() ?? '');
  });

  const found = matchAll(places.join('\n'));
  return found.length > 0 ? found : matchAll(html);
}

function matchAll(text: string): string[] {
  return [...new Set(text.match(GTM_ID) ?? [])];
}
