import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { writeJsonFileAtomicSync } from "./fs-utils.js";
import type { Logger } from "./logger.js";
import { getUsageCacheDir } from "./paths.js";

export const DEFAULT_CACHE_TTL_MS = 60_000;
const UPDATE_MARKER_STALE_MS = 5_000;
const WAIT_POLL_MS = 500;
const WAIT_POLLS = 6;
const WAIT_GRACE_MS = 10_000;

export interface UsageCacheOptions {
  ttlMs?: number;
  dir?: string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function isSafeCacheName(value: string): boolean {
  const normalized = value.trim();
  if (!normalized || normalized === "." || normalized === "..") return false;
  return !/[/\\\0]/.test(normalized);
}

function ageMs(path: string, now: number): number | null {
  try {
    // mtime has sub-millisecond precision and can sit ahead of `now`.
    return Math.max(0, now - statSync(path).mtimeMs);
  } catch {
    return null;
  }
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch {
    return undefined;
  }
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Returns the cached usage payload for `name` while it is fresh, otherwise calls
 * `fetch` and stores the result. Concurrent callers (one bar per monitor) see an
 * `<name>.updating` marker and wait briefly for the first caller's result.
 */
export async function readCachedOrFetch<T>(
  name: string,
  fetch: () => Promise<T>,
  options: UsageCacheOptions = {}
): Promise<T> {
  if (!isSafeCacheName(name)) {
    throw new Error(`Invalid cache name: ${name}`);
  }
  const ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const dir = options.dir ?? getUsageCacheDir();
  mkdirSync(dir, { recursive: true });

  const cacheFile = join(dir, `${name}.json`);
  const updatingFile = join(dir, `${name}.updating`);

  const readFresh = (maxAgeMs: number): T | undefined => {
    const age = ageMs(cacheFile, now());
    if (age === null || age >= maxAgeMs) return undefined;
    const cached = readJson(cacheFile);
    // Cached payloads are whatever `fetch` returned for this name.
    return cached === undefined ? undefined : (cached as T);
  };

  const fresh = readFresh(ttlMs);
  if (fresh !== undefined) return fresh;

  const markerAge = ageMs(updatingFile, now());
  if (markerAge !== null && markerAge < UPDATE_MARKER_STALE_MS) {
    for (let i = 0; i < WAIT_POLLS; i += 1) {
      await sleep(WAIT_POLL_MS);
      const waited = readFresh(ttlMs + WAIT_GRACE_MS);
      if (waited !== undefined) return waited;
    }
  }

  try {
    writeFileSync(updatingFile, "");
  } catch (err: unknown) {
    options.logger?.debug?.("usage cache: could not create update marker", {
      path: updatingFile,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  try {
    const data = await fetch();
    try {
      writeJsonFileAtomicSync(cacheFile, data, 0o600);
    } catch (err: unknown) {
      options.logger?.warn?.("usage cache: write failed", {
        path: cacheFile,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return data;
  } finally {
    if (existsSync(updatingFile)) {
      rmSync(updatingFile, { force: true });
    }
  }
}
