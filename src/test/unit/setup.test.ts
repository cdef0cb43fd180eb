import { expect } from "chai";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { listBackups } from "../../backups.js";
import { joinLines } from "../../fs-utils.js";
import { applyCleanup, applyRestore, applySetup } from "../../setup.js";
import { STYLE_END_MARKER, STYLE_START_MARKER } from "../../style-region.js";
import { createBundledTemplateSource, createStaticTemplateSource } from "../../templates.js";
import type { TemplateSource } from "../../templates.js";
import { parseJsoncObject } from "../../waybar-config.js";

const NOON = new Date(2026, 9, 19, 12, 0, 0);
const USER_STYLE = "/* user styles */\nbody { color: white; }\n";

describe("setup / cleanup / restore", () => {
  let dir: string;
  let configPath: string;
  let stylePath: string;
  let lines: string[];
  let templates: TemplateSource;

  const out = (line: string) => {
    lines.push(line);
  };
  const base = () => ({ configPath, stylePath, out, now: () => NOON });
  const readConfig = () => parseJsoncObject(readFileSync(configPath, "utf8"), configPath);

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "waybar-ai-usage-setup-"));
    configPath = join(dir, "config.jsonc");
    stylePath = join(dir, "style.css");
    lines = [];
    templates = createBundledTemplateSource({ commandPrefix: "" });
    writeFileSync(configPath, `${JSON.stringify({ "modules-left": ["clock"] })}\n`);
    writeFileSync(stylePath, USER_STYLE);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("adds both modules and the managed style block", () => {
    const report = applySetup({ ...base(), templates });

    const config = readConfig();
    expect(config["modules-left"]).to.deep.equal([
      "clock",
      "custom/claude-usage",
      "custom/codex-usage",
    ]);
    expect(config["custom/claude-usage"]).to.deep.include({ exec: "claude-usage --waybar" });
    expect(config["custom/codex-usage"]).to.deep.include({ exec: "codex-usage --waybar" });

    const region = templates.load().styleRegion;
    expect(readFileSync(stylePath, "utf8")).to.equal(`${USER_STYLE}\n${joinLines(region)}`);
    expect(region[0]).to.equal(STYLE_START_MARKER);
    expect(region.join("\n")).to.include("#custom-claude-usage").and.include("#custom-codex-usage");

    expect(report.changed).to.equal(true);
    expect(lines).to.deep.equal([
      `Backup created: ${configPath}.bak.20261019-120000`,
      `Updated: ${configPath}`,
      `Backup created: ${stylePath}.bak.20261019-120000`,
      `Updated: ${stylePath}`,
    ]);
    expect(readFileSync(`${stylePath}.bak.20261019-120000`, "utf8")).to.equal(USER_STYLE);
  });

  it("is a no-op the second time", () => {
    applySetup({ ...base(), templates });
    const firstConfig = readFileSync(configPath, "utf8");
    const firstStyle = readFileSync(stylePath, "utf8");
    lines = [];

    const report = applySetup({ ...base(), templates });

    expect(readFileSync(configPath, "utf8")).to.equal(firstConfig);
    expect(readFileSync(stylePath, "utf8")).to.equal(firstStyle);
    expect(report.changed).to.equal(false);
    expect(lines).to.deep.equal([
      `No changes needed in: ${configPath}`,
      `No changes needed in: ${stylePath}`,
    ]);
    expect(listBackups(configPath)).to.have.lengthOf(1);
    expect(listBackups(stylePath)).to.have.lengthOf(1);
  });

  it("replaces an outdated managed block instead of appending another", () => {
    writeFileSync(
      stylePath,
      `${USER_STYLE}${STYLE_START_MARKER}\n#custom-claude-usage { color: red; }\n${STYLE_END_MARKER}\n#custom-claude-usage.critical { color: red; }\n/* after */\n`
    );
    applySetup({ ...base(), templates });

    const region = templates.load().styleRegion;
    expect(readFileSync(stylePath, "utf8")).to.equal(`${USER_STYLE}${joinLines(region)}/* after */\n`);
  });

  it("creates missing files without backups", () => {
    configPath = join(dir, "fresh", "config.jsonc");
    stylePath = join(dir, "fresh", "style.css");

    const report = applySetup({ ...base(), templates });

    expect(report.config.status).to.equal("updated");
    expect(report.config.backup).to.equal(null);
    expect(readConfig()["modules-left"]).to.deep.equal(["custom/claude-usage", "custom/codex-usage"]);
    expect(readFileSync(stylePath, "utf8")).to.equal(joinLines(templates.load().styleRegion));
    expect(lines).to.deep.equal([`Updated: ${configPath}`, `Updated: ${stylePath}`]);
  });

  it("writes nothing in a dry run", () => {
    const configBefore = readFileSync(configPath, "utf8");
    const report = applySetup({ ...base(), templates, dryRun: true });

    expect(report.config.status).to.equal("would-update");
    expect(report.style.status).to.equal("would-update");
    expect(readFileSync(configPath, "utf8")).to.equal(configBefore);
    expect(readFileSync(stylePath, "utf8")).to.equal(USER_STYLE);
    expect(listBackups(configPath)).to.deep.equal([]);
    expect(lines).to.deep.equal([
      `[dry-run] Would update: ${configPath}`,
      `[dry-run] Would update: ${stylePath}`,
    ]);
  });

  it("aborts before any write when the config does not parse", () => {
    writeFileSync(configPath, '{ "modules-left": [ }');

    expect(() => applySetup({ ...base(), templates })).to.throw(/^Failed to parse JSONC: /);
    expect(readFileSync(stylePath, "utf8")).to.equal(USER_STYLE);
    expect(listBackups(stylePath)).to.deep.equal([]);
    expect(lines).to.deep.equal([]);
  });

  it("passes browser flags into the module commands", () => {
    applySetup({ ...base(), templates, browsers: ["chromium"] });
    expect(readConfig()["custom/codex-usage"]).to.deep.include({
      exec: "codex-usage --waybar --browser chromium",
    });
  });

  it("uses an injected template source", () => {
    const source = createStaticTemplateSource({
      config: { "custom/claude-usage": { exec: "x" }, "custom/codex-usage": { exec: "y" } },
      styleRegion: [STYLE_START_MARKER, STYLE_END_MARKER, "#custom-codex-usage.critical { color: red; }"],
    });
    applySetup({ ...base(), templates: source });

    expect(readConfig()["custom/codex-usage"]).to.deep.equal({ exec: "y" });
    expect(readFileSync(stylePath, "utf8")).to.equal(
      `${USER_STYLE}\n${STYLE_START_MARKER}\n${STYLE_END_MARKER}\n#custom-codex-usage.critical { color: red; }\n`
    );
  });

  it("leaves the stylesheet alone when the template has no managed block", () => {
    const source = createStaticTemplateSource({ config: {}, styleRegion: [] });
    const report = applySetup({ ...base(), templates: source });

    expect(report.style.status).to.equal("unchanged");
    expect(readFileSync(stylePath, "utf8")).to.equal(USER_STYLE);
  });

  it("undoes setup with cleanup and keeps user content", () => {
    applySetup({ ...base(), templates });
    lines = [];

    const report = applyCleanup(base());

    const config = readConfig();
    expect(config).to.deep.equal({ "modules-left": ["clock"] });
    expect(readFileSync(stylePath, "utf8")).to.equal(`${USER_STYLE}\n`);
    expect(report.changed).to.equal(true);
    expect(lines).to.deep.equal([
      `Backup created: ${configPath}.bak.20261019-120000-01`,
      `Updated: ${configPath}`,
      `Backup created: ${stylePath}.bak.20261019-120000-01`,
      `Updated: ${stylePath}`,
    ]);
  });

  it("gives back the original config bytes after setup and cleanup", () => {
    const pristine =
      '// my bar\n{\n  "layer": "top",\n  "modules-left": ["clock", "tray"],\n' +
      '  // clock\n  "clock": { "format": "{:%H:%M}" }\n}\n';
    writeFileSync(configPath, pristine);

    applySetup({ ...base(), templates });
    const installed = readFileSync(configPath, "utf8").split("\n");
    expect(installed.slice(0, 6)).to.deep.equal([
      "// my bar",
      "{",
      '  "layer": "top",',
      '  "modules-left": ["clock", "tray", "custom/claude-usage", "custom/codex-usage"],',
      "  // clock",
      '  "clock": { "format": "{:%H:%M}" },',
    ]);
    expect(installed.slice(6, 8)).to.deep.equal([
      '  "custom/claude-usage": {',
      '    "exec": "claude-usage --waybar",',
    ]);

    applyCleanup(base());

    expect(readFileSync(configPath, "utf8")).to.equal(pristine);
    expect(readFileSync(stylePath, "utf8")).to.equal(`${USER_STYLE}\n`);
  });

  it("is a no-op to clean up twice", () => {
    applySetup({ ...base(), templates });
    applyCleanup(base());
    const config = readFileSync(configPath, "utf8");
    const style = readFileSync(stylePath, "utf8");
    lines = [];

    const report = applyCleanup(base());

    expect(report.changed).to.equal(false);
    expect(readFileSync(configPath, "utf8")).to.equal(config);
    expect(readFileSync(stylePath, "utf8")).to.equal(style);
    expect(lines).to.deep.equal([
      `No changes needed in: ${configPath}`,
      `No changes needed in: ${stylePath}`,
    ]);
  });

  it("removes an unmarked usage block and nothing else", () => {
    writeFileSync(
      stylePath,
      `${USER_STYLE}#custom-codex-usage {\n  padding: 0 8px;\n}\n#clock { color: red; }\n`
    );

    const report = applyCleanup(base());

    expect(report.config.status).to.equal("unchanged");
    expect(report.style.status).to.equal("updated");
    expect(readFileSync(stylePath, "utf8")).to.equal(`${USER_STYLE}#clock { color: red; }\n`);
  });

  it("reports missing files during cleanup", () => {
    rmSync(configPath);
    rmSync(stylePath);

    const report = applyCleanup(base());

    expect(report.config.status).to.equal("missing");
    expect(report.style.status).to.equal("missing");
    expect(lines).to.deep.equal([`Config not found: ${configPath}`, `Style not found: ${stylePath}`]);
  });

  it("restores the latest backup and backs up the state it replaces", () => {
    writeFileSync(configPath, '{"v": 3}\n');
    writeFileSync(`${configPath}.bak.20261018-090000`, '{"v": 1}\n');
    writeFileSync(`${configPath}.bak.20261019-080000`, '{"v": 2}\n');

    const report = applyRestore(base());

    expect(readFileSync(configPath, "utf8")).to.equal('{"v": 2}\n');
    expect(report.config).to.deep.equal({
      path: configPath,
      status: "updated",
      backup: `${configPath}.bak.20261019-120000`,
      source: `${configPath}.bak.20261019-080000`,
    });
    expect(readFileSync(`${configPath}.bak.20261019-120000`, "utf8")).to.equal('{"v": 3}\n');
    expect(listBackups(configPath)).to.have.lengthOf(3);

    expect(report.style.status).to.equal("no-backup");
    expect(readFileSync(stylePath, "utf8")).to.equal(USER_STYLE);
    expect(lines).to.deep.equal([
      `Backup created: ${configPath}.bak.20261019-120000`,
      `Updated: ${configPath}`,
      `No backup found for: ${stylePath}`,
    ]);
  });

  it("restores a named backup", () => {
    const named = join(dir, "saved.css");
    writeFileSync(named, "saved {}\n");
    writeFileSync(`${stylePath}.bak.20261019-080000`, "latest {}\n");

    applyRestore({ ...base(), styleBackup: named });

    expect(readFileSync(stylePath, "utf8")).to.equal("saved {}\n");
  });

  it("reports a restore in a dry run without writing", () => {
    writeFileSync(`${stylePath}.bak.20261019-080000`, "latest {}\n");

    const report = applyRestore({ ...base(), dryRun: true });

    expect(report.style.status).to.equal("would-update");
    expect(readFileSync(stylePath, "utf8")).to.equal(USER_STYLE);
    expect(existsSync(`${stylePath}.bak.20261019-120000`)).to.equal(false);
    expect(lines).to.deep.equal([
      `No backup found for: ${configPath}`,
      `[dry-run] Would restore: ${stylePath} from ${stylePath}.bak.20261019-080000`,
    ]);
  });

  it("skips a restore whose backup matches the current file", () => {
    writeFileSync(`${stylePath}.bak.20261019-080000`, USER_STYLE);

    const report = applyRestore(base());

    expect(report.style.status).to.equal("unchanged");
    expect(listBackups(stylePath)).to.have.lengthOf(1);
  });
});
