import { existsSync, readFileSync } from "node:fs";

import { createBackup, latestBackup, restoreFromBackup } from "./backups.js";
import { joinLines, splitLines, writeFileAtomicSync } from "./fs-utils.js";
import type { Logger, OutputSink } from "./logger.js";
import { applyStyleRegion, removeStyleBlocks } from "./style-region.js";
import { createBundledTemplateSource } from "./templates.js";
import type { TemplateSource } from "./templates.js";
import { MODULES_LIST_KEY, USAGE_MODULES, WaybarConfigDocument } from "./waybar-config.js";

export type FileStatus = "updated" | "unchanged" | "would-update" | "missing" | "no-backup";

export interface FileOutcome {
  path: string;
  status: FileStatus;
  /** Backup taken before the write, if any. */
  backup: string | null;
  /** Backup read from, for `restore`. */
  source?: string;
}

export interface CommandReport {
  config: FileOutcome;
  style: FileOutcome;
  /** True when at least one file was, or in a dry run would be, rewritten. */
  changed: boolean;
}

export interface CommandOptions {
  configPath: string;
  stylePath: string;
  dryRun?: boolean;
  logger?: Logger;
  /** Receives the progress lines. Defaults to `console.log`. */
  out?: OutputSink;
  /** Clock used for backup names. */
  now?: () => Date;
}

export interface SetupOptions extends CommandOptions {
  templates?: TemplateSource;
  browsers?: readonly string[];
}

export interface RestoreOptions extends CommandOptions {
  configBackup?: string;
  styleBackup?: string;
}

type PlannedWrite = {
  path: string;
  before: string | null;
  after: string;
  changed: boolean;
};

function sameLines(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, idx) => line === b[idx]);
}

function readTextOrNull(path: string): string | null {
  return existsSync(path) ? readFileSync(path, "utf8") : null;
}

function outcome(path: string, status: FileStatus, backup: string | null = null): FileOutcome {
  return { path, status, backup };
}

function buildReport(config: FileOutcome, style: FileOutcome): CommandReport {
  const changed = [config, style].some(
    (item) => item.status === "updated" || item.status === "would-update"
  );
  return { config, style, changed };
}

/**
 * Writes one planned file: dry-run report, or backup (when the file exists)
 * followed by the write. A failing backup throws before anything is written.
 */
function commitWrite(plan: PlannedWrite, options: CommandOptions, out: OutputSink): FileOutcome {
  if (!plan.changed) {
    out(`No changes needed in: ${plan.path}`);
    return outcome(plan.path, "unchanged");
  }

  if (options.dryRun) {
    out(`[dry-run] Would update: ${plan.path}`);
    return outcome(plan.path, "would-update");
  }

  let backup: string | null = null;
  if (plan.before !== null) {
    backup = createBackup(plan.path, options.now?.() ?? new Date());
    out(`Backup created: ${backup}`);
  }

  writeFileAtomicSync(plan.path, plan.after, { createParents: true });
  out(`Updated: ${plan.path}`);
  options.logger?.debug?.("file rewritten", { path: plan.path, backup });
  return outcome(plan.path, "updated", backup);
}

function planSetupConfig(options: SetupOptions, templateConfig: Record<string, unknown>): PlannedWrite {
  const before = readTextOrNull(options.configPath);
  const doc = new WaybarConfigDocument(options.configPath, before ?? "");
  doc.ensureEntries(MODULES_LIST_KEY, USAGE_MODULES);
  doc.ensureDefinitions(USAGE_MODULES, templateConfig);
  doc.applyBrowserFlags(USAGE_MODULES, options.browsers ?? []);
  return { path: options.configPath, before, after: doc.content, changed: doc.content !== before };
}

function planSetupStyle(options: SetupOptions, styleRegion: readonly string[]): PlannedWrite {
  const before = readTextOrNull(options.stylePath);
  const lines = before === null ? [] : splitLines(before);
  const updated = applyStyleRegion(lines, styleRegion);
  return {
    path: options.stylePath,
    before,
    after: joinLines(updated),
    changed: !sameLines(lines, updated),
  };
}

/**
 * Installs the usage modules into the Waybar config and their styles into the
 * stylesheet. Running it again changes nothing.
 */
export function applySetup(options: SetupOptions): CommandReport {
  const out = options.out ?? console.log;
  const templates = (options.templates ?? createBundledTemplateSource()).load();
  if (templates.styleRegion.length === 0) {
    options.logger?.warn?.("style template has no managed region; stylesheet left as is");
  }

  // Both plans are computed first so a parse failure aborts before any write.
  const configPlan = planSetupConfig(options, templates.config);
  const stylePlan = planSetupStyle(options, templates.styleRegion);

  return buildReport(commitWrite(configPlan, options, out), commitWrite(stylePlan, options, out));
}

/** Removes the usage modules and their styles. Running it again changes nothing. */
export function applyCleanup(options: CommandOptions): CommandReport {
  const out = options.out ?? console.log;

  const configText = readTextOrNull(options.configPath);
  let configPlan: PlannedWrite | null = null;
  if (configText !== null) {
    const doc = new WaybarConfigDocument(options.configPath, configText);
    const removedEntries = doc.removeEntries(MODULES_LIST_KEY, USAGE_MODULES);
    const removedDefinitions = doc.removeDefinitions(USAGE_MODULES);
    configPlan = {
      path: options.configPath,
      before: configText,
      after: doc.content,
      changed: removedEntries || removedDefinitions,
    };
  }

  const styleText = readTextOrNull(options.stylePath);
  let stylePlan: PlannedWrite | null = null;
  if (styleText !== null) {
    const lines = splitLines(styleText);
    const updated = removeStyleBlocks(lines);
    stylePlan = {
      path: options.stylePath,
      before: styleText,
      after: joinLines(updated),
      changed: !sameLines(lines, updated),
    };
  }

  let config: FileOutcome;
  if (configPlan) {
    config = commitWrite(configPlan, options, out);
  } else {
    out(`Config not found: ${options.configPath}`);
    config = outcome(options.configPath, "missing");
  }

  let style: FileOutcome;
  if (stylePlan) {
    style = commitWrite(stylePlan, options, out);
  } else {
    out(`Style not found: ${options.stylePath}`);
    style = outcome(options.stylePath, "missing");
  }

  return buildReport(config, style);
}

function restoreOne(
  path: string,
  explicitBackup: string | undefined,
  options: RestoreOptions,
  out: OutputSink
): FileOutcome {
  const source = explicitBackup ?? latestBackup(path);
  if (!source || !existsSync(source)) {
    out(`No backup found for: ${path}`);
    return outcome(path, "no-backup");
  }

  const current = readTextOrNull(path);
  if (current !== null && current === readFileSync(source, "utf8")) {
    out(`No changes needed in: ${path}`);
    return { ...outcome(path, "unchanged"), source };
  }

  if (options.dryRun) {
    out(`[dry-run] Would restore: ${path} from ${source}`);
    return { ...outcome(path, "would-update"), source };
  }

  const { backup } = restoreFromBackup(path, source, options.now?.() ?? new Date());
  if (backup) out(`Backup created: ${backup}`);
  out(`Updated: ${path}`);
  options.logger?.debug?.("file restored", { path, source, backup });
  return { ...outcome(path, "updated", backup), source };
}

/**
 * Puts back the named backups, or the latest backup of each file. The state
 * being replaced is itself backed up first.
 */
export function applyRestore(options: RestoreOptions): CommandReport {
  const out = options.out ?? console.log;
  return buildReport(
    restoreOne(options.configPath, options.configBackup, options, out),
    restoreOne(options.stylePath, options.styleBackup, options, out)
  );
}
