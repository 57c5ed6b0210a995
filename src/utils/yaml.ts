/**
 * YAML parsing and serialization utilities.
 * Wraps the 'yaml' package for YAML-format configuration documents.
 */

import { parse, stringify } from 'yaml';

export function parseYaml(input: string): unknown {
  return parse(input, { uniqueKeys: true });
}

export function serializeYaml(data: unknown): string {
  return stringify(data, {
    lineWidth: 0,
    defaultKeyType: 'PLAIN',
  });
}
