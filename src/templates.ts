import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { splitLines } from "./fs-utils.js";
import { getCommandPrefix } from "./paths.js";
import { extractStyleRegion } from "./style-region.js";
import { parseJsoncObject } from "./waybar-config.js";

export const BIN_PREFIX_PLACEHOLDER = "{{BIN_PREFIX}}";

/** The fragments `setup` copies into the user's files. */
export interface SetupTemplates {
  /** Top-level mapping of the example config, placeholders already resolved. */
  config: Record<string, unknown>;
  /** Managed style region lines; empty when the example has no marked region. */
  styleRegion: string[];
}

export interface TemplateSource {
  load(): SetupTemplates;
}

const TEMPLATE_DIR = new URL("../templates/", import.meta.url);

export function resolveTemplates(input: {
  configText: string;
  styleText: string;
  commandPrefix?: string;
  configLabel?: string;
}): SetupTemplates {
  const prefix = input.commandPrefix ?? "";
  const configText = input.configText.split(BIN_PREFIX_PLACEHOLDER).join(prefix);
  return {
    config: parseJsoncObject(configText, input.configLabel ?? "<template>"),
    styleRegion: extractStyleRegion(splitLines(input.styleText)),
  };
}

/** Reads the example config and stylesheet shipped in `templates/`. */
export function createBundledTemplateSource(options?: {
  commandPrefix?: string;
  dir?: URL;
}): TemplateSource {
  const dir = options?.dir ?? TEMPLATE_DIR;
  return {
    load() {
      const configUrl = new URL("waybar-config.jsonc", dir);
      const styleUrl = new URL("waybar-style.css", dir);
      return resolveTemplates({
        configText: readFileSync(configUrl, "utf8"),
        styleText: readFileSync(styleUrl, "utf8"),
        commandPrefix: options?.commandPrefix ?? getCommandPrefix(),
        configLabel: fileURLToPath(configUrl),
      });
    },
  };
}

/** In-memory source, mainly for tests and embedding. */
export function createStaticTemplateSource(templates: SetupTemplates): TemplateSource {
  return {
    load: () => ({
      config: structuredClone(templates.config),
      styleRegion: [...templates.styleRegion],
    }),
  };
}
