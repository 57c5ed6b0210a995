/**
 * Indicator types extracted from resolved results.
 */

export const IOC_TYPES = [
  'domain',
  'ip',
  'url',
  'title',
  'server',
  'email',
  'registrar',
  'nameserver',
  'organization',
] as const;

export type IocType = (typeof IOC_TYPES)[number];

export interface IocRecord {
  type: IocType;
  value: string;
  sourceScanId: string | null;
  sourceQuery: string;
}
