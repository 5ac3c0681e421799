import type { AccessPointReading, LogSink, WifiReading } from "./schema.js";

export function nowMs(): number {
  return Date.now();
}

export function safeJsonParse(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, error: errorMessage(err, "invalid_json") };
  }
}

export function asNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim()) {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function errorMessage(err: unknown, fallback = "unknown error"): string {
  if (err instanceof Error) return err.message || fallback;
  if (typeof err === "string" && err) return err;
  return fallback;
}

export function normalizeBssid(bssid: string) {
  return bssid.trim().toLowerCase();
}

// Prototype-free, so identifiers such as "__proto__" or "constructor" stay plain keys.
export function emptyReading(): AccessPointReading {
  return Object.create(null);
}

export function readingFromScan(results: WifiReading[]): AccessPointReading {
  const reading = emptyReading();
  for (const r of results) {
    if (!r?.bssid || !Number.isFinite(r.level)) continue;
    const bssid = normalizeBssid(r.bssid);
    const level = Math.round(r.level);
    if (!Object.hasOwn(reading, bssid) || level > reading[bssid]) reading[bssid] = level;
  }
  return reading;
}

export function copyReading(source: AccessPointReading): AccessPointReading {
  const reading = emptyReading();
  for (const [bssid, level] of Object.entries(source)) reading[bssid] = level;
  return reading;
}

export function isoFromMs(ms: number): string {
  return new Date(ms).toISOString();
}

export const consoleSink: LogSink = (level, message) => {
  const line = `[${isoFromMs(nowMs())}] ${level}: ${message}`;
  if (level === "info") console.log(line);
  else console.error(line);
};

export const silentSink: LogSink = () => {};
