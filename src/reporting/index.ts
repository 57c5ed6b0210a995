/**
 * Barrel exports for the report modules.
 */

export {
  PartialRegistry,
  createDefaultRegistry,
  genericPartial,
  type PartialEntry,
  type PartialRenderer,
} from './partials.js';

export {
  BUILTIN_TEMPLATE_PATH,
  TEMPLATE_SLOTS,
  fillTemplate,
  loadTemplate,
  parseTemplate,
  resolveTemplate,
  type ReportTemplate,
} from './template.js';

export {
  partitionBySource,
  renderReport,
  reportFileName,
  reportTitle,
  runDirectoryName,
  safeFileComponent,
  type ReportInput,
  type SectionSource,
} from './html-reporter.js';

export { exportIocs, buildIocJson, collectScanIds, IOC_DIRECTORY } from './ioc-exporter.js';

export { formatSummaryTable, printSummary } from './summary-reporter.js';
