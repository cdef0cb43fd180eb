import { homedir } from "node:os";
import { join, resolve } from "node:path";

function normalizeDirOverride(value: string | undefined): string | null {
  const trimmed = (value ?? "").trim();
  if (!trimmed) return null;
  if (trimmed.includes("\0")) return null;
  return trimmed;
}

/**
 * Expands a leading `~` the way a shell would. Everything else is returned as-is.
 */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Waybar configuration directory.
 *
 * Default: `~/.config/waybar`
 * Override: `WAYBAR_CONFIG_DIR`
 */
export function getWaybarConfigDir(): string {
  const override = normalizeDirOverride(process.env.WAYBAR_CONFIG_DIR);
  if (override) return resolve(expandHome(override));
  return join(homedir(), ".config", "waybar");
}

export function getDefaultWaybarConfigPath(): string {
  return join(getWaybarConfigDir(), "config.jsonc");
}

export function getDefaultWaybarStylePath(): string {
  return join(getWaybarConfigDir(), "style.css");
}

/**
 * Cache directory shared by every bar instance (one per monitor).
 *
 * Default: `~/.cache/waybar-ai-usage`
 * Override: `WAYBAR_AI_USAGE_CACHE_DIR`
 */
export function getUsageCacheDir(): string {
  const override = normalizeDirOverride(process.env.WAYBAR_AI_USAGE_CACHE_DIR);
  if (override) return resolve(expandHome(override));
  return join(homedir(), ".cache", "waybar-ai-usage");
}

/**
 * Prefix put in front of the module commands written into the Waybar config.
 * Empty when the commands are expected on `PATH`.
 *
 * Override: `WAYBAR_AI_USAGE_BIN_DIR`
 */
export function getCommandPrefix(): string {
  const override = normalizeDirOverride(process.env.WAYBAR_AI_USAGE_BIN_DIR);
  if (!override) return "";
  const dir = resolve(expandHome(override));
  return dir.endsWith("/") ? dir : `${dir}/`;
}
