/**
 * qsprobe - batch RCE payload testing through qsreplace and gf
 *
 * @packageDocumentation
 */

export * from "./engine/index.js";
export * from "./lib/index.js";

export { loadConfigFile, parseConfig, resolveRunConfig, FileConfigSchema } from "./cli/config.js";
export type { FileConfig, RunFlags, ResolvedRunConfig } from "./cli/config.js";
export { formatCsv, formatJsonReport, writeReports } from "./cli/report-formatters.js";
export type { ReportPaths } from "./cli/report-formatters.js";
export { formatHtml } from "./cli/html-formatter.js";
