/**
 * Defang/refang indicators for safe display in shared reports.
 * Prevents accidental clicks or resolution of masquerade infrastructure.
 */

import { isValidDomain, isValidEmail, isValidIPv4 } from './network.js';

const SCHEME_URL = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/([^/?#]*)(.*)$/s;

/**
 * Defang a bare hostname: every dot becomes `[.]`.
 *   usaa-login.example.net → usaa-login[.]example[.]net
 */
export function defangDomain(domain: string): string {
  return domain.replace(/\./g, '[.]');
}

/**
 * Defang a URL, touching only the scheme and the host portion.
 *   http://evil.example.com/a.php?x=1 → hxxp://evil[.]example[.]com/a.php?x=1
 *
 * Strings without a `scheme://` prefix (file names such as `report.html`,
 * relative paths) are returned unchanged.
 */
export function defangUrl(url: string): string {
  const match = SCHEME_URL.exec(url);
  if (!match) return url;

  const [, scheme, authority, rest] = match;
  const safeScheme = scheme.replace(/^http/i, 'hxxp').replace(/^ftp/i, 'fxp');
  return `${safeScheme}://${defangDomain(authority)}${rest}`;
}

/**
 * Defang an arbitrary indicator value.
 * Examples:
 *   evil.com → evil[.]com
 *   http://evil.com/x → hxxp://evil[.]com/x
 *   203.0.113.7 → 203.0.113[.]7
 *   ops@evil.com → ops[@]evil[.]com
 */
export function defang(ioc: string): string {
  if (SCHEME_URL.test(ioc)) {
    return defangUrl(ioc);
  }

  if (isValidIPv4(ioc)) {
    const lastDot = ioc.lastIndexOf('.');
    return ioc.substring(0, lastDot) + '[.]' + ioc.substring(lastDot + 1);
  }

  if (isValidEmail(ioc)) {
    const at = ioc.lastIndexOf('@');
    return `${ioc.substring(0, at)}[@]${defangDomain(ioc.substring(at + 1))}`;
  }

  if (isValidDomain(ioc)) {
    return defangDomain(ioc);
  }

  return ioc;
}

const TEXT_SEPARATORS = /([\s,;"'(){}[\]<>]+)/;

/**
 * Defang every indicator-shaped token in free text or encoded JSON,
 * keeping the separators.
 *   ns1.evil.com, ops@evil.com → ns1[.]evil[.]com, ops[@]evil[.]com
 *   {"url":"http://evil.com/x"} → {"url":"hxxp://evil[.]com/x"}
 */
export function defangText(text: string): string {
  return text
    .split(TEXT_SEPARATORS)
    .map((part, index) => (index % 2 === 0 ? defang(part) : part))
    .join('');
}

/**
 * Refang a defanged indicator back to its original form.
 * Examples:
 *   evil[.]com → evil.com
 *   hxxp://evil[.]com → http://evil.com
 *   203.0.113[.]7 → 203.0.113.7
 */
export function refang(ioc: string): string {
  let result = ioc;

  // Refang protocols
  result = result.replace(/^hxxp/i, 'http');
  result = result.replace(/^fxp/i, 'ftp');

  // Refang dots
  result = result.replace(/\[\.\]/g, '.');
  result = result.replace(/\(\.\)/g, '.');
  result = result.replace(/\[dot\]/gi, '.');

  // Refang @
  result = result.replace(/\[@\]/g, '@');
  result = result.replace(/\[at\]/gi, '@');

  // Refang :// variants
  result = result.replace(/\[:\/\/\]/g, '://');

  return result;
}
