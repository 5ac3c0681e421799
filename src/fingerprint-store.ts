import type { AccessPointReading, Fingerprint, LoadIssue } from "./schema.js";
import type { PreferenceStore } from "./preferences.js";
import { copyReading, emptyReading, isRecord, safeJsonParse } from "./util.js";

export const FINGERPRINTS_KEY = "fingerprints";

export type DecodeResult = { ok: true; fingerprint: Fingerprint } | { ok: false; reason: string };

export function encodeFingerprint(fp: Fingerprint): string {
  return JSON.stringify({ room: fp.room, location: fp.location, signals: fp.signals });
}

export function decodeFingerprint(raw: string): DecodeResult {
  const parsed = safeJsonParse(raw);
  if (!parsed.ok) return { ok: false, reason: parsed.error };
  const value = parsed.value;
  if (!isRecord(value)) return { ok: false, reason: "record is not an object" };

  const { room, location, signals } = value;
  if (typeof room !== "string" || !room.trim()) return { ok: false, reason: "missing room" };
  if (typeof location !== "string" || !location.trim()) return { ok: false, reason: "missing location" };
  if (!isRecord(signals)) return { ok: false, reason: "signals is not an object" };

  const reading: AccessPointReading = emptyReading();
  for (const [bssid, level] of Object.entries(signals)) {
    if (typeof level !== "number" || !Number.isInteger(level)) {
      return { ok: false, reason: `signal for ${bssid} is not an integer` };
    }
    reading[bssid] = level;
  }
  return { ok: true, fingerprint: { room, location, signals: reading } };
}

export class FingerprintStore {
  private items: Fingerprint[] = [];
  private issues: LoadIssue[] = [];

  constructor(private prefs: PreferenceStore, private key = FINGERPRINTS_KEY) {}

  get size() {
    return this.items.length;
  }

  fingerprints(): readonly Fingerprint[] {
    return this.items;
  }

  fingerprintsFor(room: string): Fingerprint[] {
    return this.items.filter((fp) => fp.room === room);
  }

  rooms(): string[] {
    const seen = new Set<string>();
    for (const fp of this.items) seen.add(fp.room);
    return Array.from(seen);
  }

  loadIssues(): LoadIssue[] {
    return [...this.issues];
  }

  async load(): Promise<readonly Fingerprint[]> {
    const raw = (await this.prefs.getStringList(this.key)) ?? [];
    this.items = [];
    this.issues = [];
    raw.forEach((record, index) => {
      const decoded = decodeFingerprint(record);
      if (!decoded.ok) {
        this.issues.push({ index, reason: decoded.reason });
        return;
      }
      this.replaceInMemory(decoded.fingerprint);
    });
    return this.items;
  }

  async save(): Promise<void> {
    await this.prefs.setStringList(this.key, this.items.map(encodeFingerprint));
  }

  async addOrReplace(fp: Fingerprint): Promise<void> {
    this.replaceInMemory({ room: fp.room, location: fp.location, signals: copyReading(fp.signals) });
    await this.save();
  }

  async deleteRoom(room: string): Promise<number> {
    const before = this.items.length;
    this.items = this.items.filter((fp) => fp.room !== room);
    const removed = before - this.items.length;
    await this.save();
    return removed;
  }

  private replaceInMemory(fp: Fingerprint) {
    this.items = this.items.filter((f) => !(f.room === fp.room && f.location === fp.location));
    this.items.push(fp);
  }
}
