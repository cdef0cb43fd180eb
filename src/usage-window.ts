export interface WindowUsage {
  /** 0–100, may be fractional. */
  utilization: number;
  /** ISO string or Unix seconds, as returned by the service. */
  resetsAt: string | number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

export function parseWindowPercent(
  raw: unknown,
  keys: { utilization?: string; resetsAt?: string } = {}
): WindowUsage {
  const record: Record<string, unknown> = isRecord(raw) ? raw : {};
  const utilRaw = record[keys.utilization ?? "utilization"];
  const resetRaw = record[keys.resetsAt ?? "resets_at"];

  const parsed = typeof utilRaw === "number" ? utilRaw : Number(utilRaw ?? 0);
  const resetsAt =
    typeof resetRaw === "string" || (typeof resetRaw === "number" && Number.isFinite(resetRaw))
      ? resetRaw
      : null;

  return {
    utilization: Number.isFinite(parsed) ? parsed : 0,
    resetsAt,
  };
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function toEpochMs(resetAt: string | number): number {
  return typeof resetAt === "number" ? resetAt * 1000 : Date.parse(resetAt);
}

/** Time left until `resetAt`: `4d03h`, `4h19m` or `19m30s`. */
export function formatEta(resetAt: string | number | null | undefined, now: Date = new Date()): string {
  if (resetAt === null || resetAt === undefined || resetAt === "" || resetAt === 0) {
    return "0′00″";
  }

  const target = toEpochMs(resetAt);
  if (!Number.isFinite(target)) return "??′??″";

  const secs = Math.trunc((target - now.getTime()) / 1000);
  if (secs <= 0) return "0m00s";

  if (secs >= 86_400) {
    const days = Math.floor(secs / 86_400);
    const hours = Math.floor((secs % 86_400) / 3600);
    return `${days}d${pad(hours)}h`;
  }

  if (secs >= 3600) {
    const hours = Math.floor(secs / 3600);
    const mins = Math.floor((secs % 3600) / 60);
    return `${hours}h${pad(mins)}m`;
  }

  const mins = Math.floor(secs / 60);
  return `${mins}m${pad(secs % 60)}s`;
}
