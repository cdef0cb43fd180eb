/**
 * Line-oriented editing of the managed block in a Waybar stylesheet.
 *
 * CSS is not parsed. The block is found by two comment markers, and its end is
 * extended past the end marker by counting `{` and `}` per line. Braces inside
 * strings or comments are counted too.
 */

export const STYLE_START_MARKER = "/* AI Usage Monitor Styling */";
export const STYLE_END_MARKER = "/* Error state (network failures, auth errors, etc.) */";

/** Selector tokens matched when the marker pair is missing. */
export const STYLE_FALLBACK_TOKENS: readonly string[] = [
  "#custom-claude-usage",
  "#custom-codex-usage",
];

export interface StyleMarkers {
  start: string;
  end: string;
}

/** Half-open line range `[start, end)`. */
export interface StyleRegion {
  start: number;
  end: number;
}

const DEFAULT_MARKERS: StyleMarkers = {
  start: STYLE_START_MARKER,
  end: STYLE_END_MARKER,
};

function braceDelta(line: string): number {
  let delta = 0;
  for (const ch of line) {
    if (ch === "{") delta += 1;
    else if (ch === "}") delta -= 1;
  }
  return delta;
}

export function findStyleRegion(
  lines: readonly string[],
  markers: StyleMarkers = DEFAULT_MARKERS
): StyleRegion | null {
  let startIdx = -1;
  let endIdx = -1;

  for (let i = 0; i < lines.length; i += 1) {
    if (startIdx === -1) {
      if (lines[i].includes(markers.start)) startIdx = i;
      else continue;
    }
    if (lines[i].includes(markers.end)) {
      endIdx = i;
      break;
    }
  }

  if (startIdx === -1 || endIdx === -1) return null;

  let depth = 0;
  for (let j = endIdx; j < lines.length; j += 1) {
    depth += braceDelta(lines[j]);
    if (depth <= 0 && lines[j].includes("}")) {
      return { start: startIdx, end: j + 1 };
    }
  }

  return { start: startIdx, end: endIdx + 1 };
}

export function extractStyleRegion(
  lines: readonly string[],
  markers: StyleMarkers = DEFAULT_MARKERS
): string[] {
  const region = findStyleRegion(lines, markers);
  if (!region) return [];
  return lines.slice(region.start, region.end);
}

/**
 * Inserts or replaces the managed region. An empty `regionLines` returns the
 * input unchanged. A start marker with no end marker after it is replaced by
 * the region, so the next run locates the region there.
 */
export function applyStyleRegion(
  lines: readonly string[],
  regionLines: readonly string[],
  markers: StyleMarkers = DEFAULT_MARKERS
): string[] {
  if (regionLines.length === 0) return [...lines];

  const region = findStyleRegion(lines, markers);
  if (!region) {
    const stray = lines.findIndex((line) => line.includes(markers.start));
    if (stray >= 0) {
      return [...lines.slice(0, stray), ...regionLines, ...lines.slice(stray + 1)];
    }
    const out = [...lines];
    if (out.length > 0 && out[out.length - 1].trim().length > 0) {
      out.push("");
    }
    out.push(...regionLines);
    return out;
  }

  return [...lines.slice(0, region.start), ...regionLines, ...lines.slice(region.end)];
}

/**
 * Removes the managed region, or, without one, every brace block whose header
 * line mentions one of `tokens`.
 */
export function removeStyleBlocks(
  lines: readonly string[],
  options?: { markers?: StyleMarkers; tokens?: readonly string[] }
): string[] {
  const region = findStyleRegion(lines, options?.markers ?? DEFAULT_MARKERS);
  if (region) {
    return [...lines.slice(0, region.start), ...lines.slice(region.end)];
  }

  const tokens = options?.tokens ?? STYLE_FALLBACK_TOKENS;
  const out: string[] = [];
  let skipping = false;
  let depth = 0;

  for (const line of lines) {
    if (!skipping && tokens.some((token) => line.includes(token))) {
      depth = braceDelta(line);
      // A one-line rule closes on its own header.
      skipping = !(depth <= 0 && line.includes("}"));
      continue;
    }

    if (skipping) {
      depth += braceDelta(line);
      if (depth <= 0 && line.includes("}")) {
        skipping = false;
      }
      continue;
    }

    out.push(line);
  }

  return out;
}
