import type { AccessPointReading, Detection, Fingerprint, RoomEnvelope } from "./schema.js";

export const UNKNOWN_ROOM = "unknown";

export function buildEnvelope(fingerprints: Iterable<Fingerprint>): RoomEnvelope {
  const envelope: RoomEnvelope = new Map();
  for (const fp of fingerprints) {
    for (const [bssid, level] of Object.entries(fp.signals)) {
      const range = envelope.get(bssid);
      if (!range) {
        envelope.set(bssid, { min: level, max: level });
        continue;
      }
      if (level < range.min) range.min = level;
      if (level > range.max) range.max = level;
    }
  }
  return envelope;
}

// Rooms keep the order in which they first appear in the collection.
export function roomEnvelopes(collection: readonly Fingerprint[]): Map<string, RoomEnvelope> {
  const grouped = new Map<string, Fingerprint[]>();
  for (const fp of collection) {
    const list = grouped.get(fp.room);
    if (list) list.push(fp);
    else grouped.set(fp.room, [fp]);
  }
  const envelopes = new Map<string, RoomEnvelope>();
  for (const [room, fps] of grouped) envelopes.set(room, buildEnvelope(fps));
  return envelopes;
}

export function isCandidate(reading: AccessPointReading, envelope: RoomEnvelope): boolean {
  for (const [bssid, level] of Object.entries(reading)) {
    const range = envelope.get(bssid);
    if (!range) continue;
    if (level < range.min || level > range.max) return false;
  }
  return true;
}

export function detectRoom(reading: AccessPointReading, collection: readonly Fingerprint[]): Detection {
  if (collection.length === 0) return { status: "no_data" };
  for (const [room, envelope] of roomEnvelopes(collection)) {
    if (isCandidate(reading, envelope)) return { status: "matched", room };
  }
  return { status: "unknown" };
}

export function classify(reading: AccessPointReading, collection: readonly Fingerprint[]): string {
  const detection = detectRoom(reading, collection);
  return detection.status === "matched" ? detection.room : UNKNOWN_ROOM;
}
