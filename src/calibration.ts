import { CalibrationStateError } from "./errors.js";
import type { FingerprintStore } from "./fingerprint-store.js";
import type { AccessPointReading, CalibrationStatus, CaptureResult, Fingerprint } from "./schema.js";
import { copyReading } from "./util.js";

export const CALIBRATION_LOCATIONS = ["corner1", "corner2", "corner3", "corner4", "center"] as const;

type Session = { id: number; room: string; index: number };

/**
 * Walks an operator through the fixed location sequence of one room and
 * stores one fingerprint per location.
 *
 * Starting a new session while one is running replaces it. A capture whose
 * persistence fails leaves the session on the same location. Callers that
 * scan before capturing pass the `sessionId` they saw, and the capture is
 * rejected if the session changed in between.
 */
export class CalibrationController {
  private session: Session | null = null;
  private sessions = 0;

  constructor(
    private store: FingerprintStore,
    private locations: readonly string[] = CALIBRATION_LOCATIONS,
  ) {
    if (locations.length === 0) throw new Error("calibration needs at least one location");
  }

  get active() {
    return this.session !== null;
  }

  get sessionId() {
    return this.session?.id ?? null;
  }

  get targetRoom() {
    return this.session?.room ?? null;
  }

  get currentLocation() {
    return this.session ? this.locations[this.session.index] : null;
  }

  status(): CalibrationStatus {
    return {
      active: this.session !== null,
      room: this.targetRoom,
      location: this.currentLocation,
      index: this.session?.index ?? 0,
      total: this.locations.length,
    };
  }

  startCalibration(roomName: string): string {
    const room = roomName.trim();
    if (!room) throw new CalibrationStateError("room name must not be empty");
    this.sessions += 1;
    this.session = { id: this.sessions, room, index: 0 };
    return this.locations[0];
  }

  cancelCalibration() {
    this.session = null;
  }

  async captureLocation(reading: AccessPointReading, expectedSession?: number): Promise<CaptureResult> {
    const session = this.session;
    if (!session) throw new CalibrationStateError("captureLocation called while not calibrating");
    if (expectedSession !== undefined && session.id !== expectedSession) {
      throw new CalibrationStateError("calibration session changed before the capture completed");
    }

    const captured: Fingerprint = {
      room: session.room,
      location: this.locations[session.index],
      signals: copyReading(reading),
    };
    await this.store.addOrReplace(captured);

    session.index += 1;
    if (session.index >= this.locations.length) {
      this.session = null;
      return { done: true, captured };
    }
    return { done: false, captured, next: this.locations[session.index] };
  }
}
