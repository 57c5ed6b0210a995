/**
 * Unit tests for the result partial registry.
 *
 * Tests: lookup precedence, built-in partials, escaping
 */

import { describe, it, expect } from 'vitest';

import {
  PartialRegistry,
  createDefaultRegistry,
  genericPartial,
  urlscanScanPartial,
  type PartialEntry,
} from '@/reporting/partials.js';
import { normalize } from '@/extraction/normalizer.js';
import { makeScanResult } from '../../helpers/fixtures.js';

const stub = (id: string): PartialEntry => ({ id, render: () => `<p>${id}</p>` });

describe('PartialRegistry.lookup', () => {
  it('falls back to the (*, *) entry', () => {
    const registry = new PartialRegistry();
    expect(registry.lookup('urlscan', 'scan')).toBe(genericPartial);
  });

  it('prefers exact, then platform wildcard, then data type wildcard', () => {
    const registry = new PartialRegistry()
      .register('*', 'whois', stub('any-whois'))
      .register('silentpush', '*', stub('any-silentpush'))
      .register('silentpush', 'whois', stub('exact'));

    expect(registry.lookup('silentpush', 'whois').id).toBe('exact');
    expect(registry.lookup('silentpush', 'webscan').id).toBe('any-silentpush');
    expect(registry.lookup('urlscan', 'whois').id).toBe('any-whois');
    expect(registry.lookup('urlscan', 'scan').id).toBe('generic');
  });

  it('accepts a custom fallback', () => {
    const registry = new PartialRegistry(stub('custom'));
    expect(registry.lookup('urlscan', 'generic').id).toBe('custom');
  });
});

describe('PartialRegistry.render', () => {
  it('wraps the fragment in an article tagged with the partial id', () => {
    const registry = new PartialRegistry().register('urlscan', 'scan', stub('mine'));
    const html = registry.render(makeScanResult('q', 'a.example.net', 'id-1'));
    expect(html).toBe('<article class="result" data-partial="mine">\n<p>mine</p>\n</article>');
  });
});

describe('built-in partials', () => {
  const registry = createDefaultRegistry();

  it('renders urlscan scans with defanged fields and a screenshot placeholder', () => {
    const html = registry.render(makeScanResult('q', 'usaa-login.example.net', 'aaaa-1111'));
    expect(html).toContain('data-partial="urlscan-scan"');
    expect(html).toContain('<h3>usaa-login[.]example[.]net</h3>');
    expect(html).toContain('<tr><th>URL</th><td>hxxps://usaa-login[.]example[.]net/login</td></tr>');
    expect(html).toContain('<tr><th>Scan ID</th><td>aaaa-1111</td></tr>');
    expect(html).toContain('<div class="no-screenshot">No screenshot available</div>');
    expect(html).not.toContain('https://usaa-login.example.net');
  });

  it('embeds a screenshot data URI when present', () => {
    const result = {
      ...makeScanResult('q', 'a.example.net', 'id-1'),
      screenshot: { fileName: 'images/id-1.png', dataUri: 'data:image/png;base64,AAAA' },
    };
    expect(urlscanScanPartial.render(result)).toContain(
      '<img class="screenshot" src="data:image/png;base64,AAAA" alt="Screenshot of a[.]example[.]net">',
    );
  });

  it('escapes markup coming from results', () => {
    const result = { ...makeScanResult('q', 'a.example.net', 'id-1'), title: '<script>x</script>' };
    expect(registry.render(result)).toContain('<tr><th>Title</th><td>&lt;script&gt;x&lt;/script&gt;</td></tr>');
  });

  it('renders whois results with joined lists and N/A for gaps', () => {
    const result = normalize(
      {
        payload: {
          domain: 'brand-secure.example',
          registrar: 'Example Registrar',
          nameserver: ['ns1.host.example', 'ns2.host.example'],
          country: 'PA',
        },
        screenshotRef: null,
      },
      { platform: 'silentpush', dataType: 'whois' },
      { sourceQuery: 'w' },
    );
    const html = registry.render(result);
    expect(html).toContain('data-partial="silentpush-whois"');
    expect(html).toContain('<tr><th>Nameservers</th><td>ns1[.]host[.]example, ns2[.]host[.]example</td></tr>');
    expect(html).toContain('<tr><th>Email</th><td>N/A</td></tr>');
    expect(html).toContain('<tr><th>Location</th><td>PA</td></tr>');
  });

  it('renders generic results as a flattened field table', () => {
    const result = normalize(
      { payload: { hostname: 'odd.example', score: 7 }, screenshotRef: null },
      { platform: 'silentpush', dataType: 'generic' },
      { sourceQuery: 'g' },
    );
    const html = registry.render(result);
    expect(html).toContain('data-partial="generic"');
    expect(html).toContain('<tr><th>score</th><td>7</td></tr>');
  });

  it('defangs whois contact emails', () => {
    const result = normalize(
      { payload: { domain: 'brand-secure.example', email: 'ops@brand-secure.example' }, screenshotRef: null },
      { platform: 'silentpush', dataType: 'whois' },
      { sourceQuery: 'w' },
    );
    expect(registry.render(result)).toContain('<tr><th>Email</th><td>ops[@]brand-secure[.]example</td></tr>');
  });

  it('defangs URLs and hosts in generic field tables', () => {
    const result = normalize(
      {
        payload: {
          url: 'http://evil.example.com/login',
          domain: 'evil.example.com',
          links: [{ href: 'http://cdn.evil.example.com/kit.js' }],
        },
        screenshotRef: null,
      },
      { platform: 'silentpush', dataType: 'generic' },
      { sourceQuery: 'g' },
    );
    const html = registry.render(result);
    expect(html).toContain('<tr><th>url</th><td>hxxp://evil[.]example[.]com/login</td></tr>');
    expect(html).toContain('<tr><th>domain</th><td>evil[.]example[.]com</td></tr>');
    expect(html).toContain(
      '<tr><th>links</th><td>[{&quot;href&quot;:&quot;hxxp://cdn[.]evil[.]example[.]com/kit.js&quot;}]</td></tr>',
    );
    expect(html).not.toContain('http://');
    expect(html).not.toContain('evil.example.com');
  });
});
