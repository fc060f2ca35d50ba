export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH } from "./config/loader.js";
export type { CodecheckConfig, ManifestEntry, Person } from "./config/types.js";
export {
  ReportBuilder,
  nameOrcid,
  DEFAULT_FIGURE_EXTENSIONS,
} from "./certificate/report_builder.js";
export type { ReportBuilderOptions } from "./certificate/report_builder.js";
export { markdown, latex, toMarkdownSource } from "./certificate/fragments.js";
export type { OutputFragment, FragmentFormat } from "./certificate/fragments.js";
export { ManifestProcessor } from "./manifest/processor.js";
export type {
  ResolvedManifestEntry,
  ManifestSummary,
  SizeMismatch,
  CopiedFile,
} from "./manifest/processor.js";
export { DEFAULT_NA_VALUES } from "./data/csv_reader.js";
export type { CsvReadOptions } from "./data/csv_reader.js";
export { describe as describeColumn } from "./analytics/stats.js";
export type { DescriptiveStats } from "./analytics/stats.js";
export { escapeMarkdown, unescapeMarkdown, escapeLatex } from "./shared/markup.js";
export {
  CertificateError,
  ConfigParseError,
  FileResolutionError,
  DataParseError,
} from "./shared/errors.js";
