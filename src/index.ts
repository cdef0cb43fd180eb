export {
  STYLE_END_MARKER,
  STYLE_FALLBACK_TOKENS,
  STYLE_START_MARKER,
  applyStyleRegion,
  extractStyleRegion,
  findStyleRegion,
  removeStyleBlocks,
} from "./style-region.js";
export type { StyleMarkers, StyleRegion } from "./style-region.js";
export {
  MODULES_LIST_KEY,
  USAGE_MODULES,
  WaybarConfigDocument,
  parseJsoncObject,
} from "./waybar-config.js";
export { createBackup, latestBackup, listBackups, restoreFromBackup } from "./backups.js";
export {
  createBundledTemplateSource,
  createStaticTemplateSource,
  resolveTemplates,
} from "./templates.js";
export type { SetupTemplates, TemplateSource } from "./templates.js";
export { applyCleanup, applyRestore, applySetup } from "./setup.js";
export type { CommandReport, FileOutcome, FileStatus } from "./setup.js";
export { runCli } from "./cli.js";
export { formatEta, parseWindowPercent } from "./usage-window.js";
export type { WindowUsage } from "./usage-window.js";
export { readCachedOrFetch } from "./usage-cache.js";
export type { Logger } from "./logger.js";
