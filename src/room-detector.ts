import { CalibrationController, CALIBRATION_LOCATIONS } from "./calibration.js";
import { buildEnvelope, detectRoom } from "./classifier.js";
import { CalibrationStateError } from "./errors.js";
import type { FingerprintStore } from "./fingerprint-store.js";
import { ScanLoop } from "./scan-loop.js";
import { performScan, type ScanSource } from "./scan-source.js";
import type {
  AccessPointReading,
  CalibrationStatus,
  CaptureResult,
  Detection,
  DetectionState,
  DetectorState,
  LogSink,
} from "./schema.js";
import { errorMessage, nowMs, readingFromScan, silentSink } from "./util.js";

export type RoomDetectorOptions = {
  store: FingerprintStore;
  scanSource: ScanSource;
  intervalMs?: number;
  locations?: readonly string[];
  log?: LogSink;
};

export type EnvelopeRow = { bssid: string; min: number; max: number };

export type DetectorListener = (state: DetectorState) => void;

/**
 * One detection session: owns the fingerprint store, the calibration
 * controller and the scan loop, and publishes the state the presentation
 * layer renders.
 *
 * Loop cycles and operator actions run one at a time through `exclusive`,
 * so the store is never mutated from two places at once.
 */
export class RoomDetector {
  readonly store: FingerprintStore;
  readonly calibration: CalibrationController;
  private scanSource: ScanSource;
  private loop: ScanLoop;
  private log: LogSink;
  private chain: Promise<void> = Promise.resolve();
  private listeners = new Set<DetectorListener>();

  private currentRoom: string | null = null;
  private detection: DetectionState = "unset";
  private lastScanAt = 0;
  private lastAccessPoints = 0;
  private lastError: string | null = null;

  constructor(options: RoomDetectorOptions) {
    this.store = options.store;
    this.scanSource = options.scanSource;
    this.log = options.log ?? silentSink;
    this.calibration = new CalibrationController(this.store, options.locations ?? CALIBRATION_LOCATIONS);
    this.loop = new ScanLoop(
      options.intervalMs ?? 1000,
      (isCancelled) => this.cycle(isCancelled),
      (err) => this.log("error", `scan cycle failed: ${errorMessage(err)}`),
    );
  }

  async open(): Promise<void> {
    await this.store.load();
    for (const issue of this.store.loadIssues()) {
      this.log("warn", `skipped stored fingerprint #${issue.index}: ${issue.reason}`);
    }
    this.log("info", `loaded ${this.store.size} fingerprints for ${this.store.rooms().length} rooms`);
    this.emit();
  }

  start() {
    this.loop.start();
  }

  stop() {
    this.loop.stop();
  }

  get scanning() {
    return this.loop.isRunning;
  }

  getState(): DetectorState {
    return {
      current_room: this.currentRoom,
      detection: this.detection,
      rooms: this.store.rooms(),
      calibration: this.calibration.status(),
      last_scan_at: this.lastScanAt,
      last_access_points: this.lastAccessPoints,
      last_error: this.lastError,
      load_issues: this.store.loadIssues(),
    };
  }

  subscribe(listener: DetectorListener): () => void {
    this.listeners.add(listener);
    listener(this.getState());
    return () => {
      this.listeners.delete(listener);
    };
  }

  roomEnvelope(room: string): EnvelopeRow[] {
    const envelope = buildEnvelope(this.store.fingerprintsFor(room));
    return Array.from(envelope)
      .map(([bssid, range]) => ({ bssid, min: range.min, max: range.max }))
      .sort((a, b) => a.bssid.localeCompare(b.bssid));
  }

  startCalibration(room: string): CalibrationStatus {
    const previous = this.calibration.targetRoom;
    const first = this.calibration.startCalibration(room);
    if (previous) this.log("warn", `calibration of ${previous} replaced`);
    this.log("info", `calibrating ${this.calibration.targetRoom}: ${first}`);
    this.emit();
    return this.calibration.status();
  }

  cancelCalibration(): CalibrationStatus {
    if (this.calibration.active) {
      this.log("info", `calibration of ${this.calibration.targetRoom} cancelled`);
      this.calibration.cancelCalibration();
      this.emit();
    }
    return this.calibration.status();
  }

  // Captures the current location from a fresh scan, or from `reading` when given.
  captureLocation(reading?: AccessPointReading): Promise<CaptureResult> {
    return this.exclusive(async () => {
      const sessionId = this.calibration.sessionId;
      if (sessionId === null) throw new CalibrationStateError("captureLocation called while not calibrating");
      const signals = reading ?? (await this.scanForCapture());
      try {
        const result = await this.calibration.captureLocation(signals, sessionId);
        const { room, location } = result.captured;
        this.log(
          "info",
          result.done
            ? `captured ${room}/${location}, calibration complete`
            : `captured ${room}/${location}, next ${result.next}`,
        );
        return result;
      } finally {
        this.emit();
      }
    });
  }

  deleteRoom(room: string): Promise<number> {
    return this.exclusive(async () => {
      try {
        const removed = await this.store.deleteRoom(room);
        if (removed > 0) this.log("info", `deleted ${room} (${removed} fingerprints)`);
        return removed;
      } finally {
        if (this.currentRoom === room) {
          this.currentRoom = null;
          this.detection = "unset";
        }
        this.emit();
      }
    });
  }

  // Runs one scan-and-classify cycle outside the loop.
  refresh(): Promise<Detection | null> {
    return this.exclusive(() => this.scanAndClassify(() => false));
  }

  applyReading(reading: AccessPointReading): Detection {
    const detection = detectRoom(reading, this.store.fingerprints());
    this.lastAccessPoints = Object.keys(reading).length;
    if (detection.status === "matched") {
      this.currentRoom = detection.room;
      this.detection = "matched";
    } else if (detection.status === "unknown") {
      this.currentRoom = null;
      this.detection = "unknown";
    }
    this.emit();
    return detection;
  }

  private cycle(isCancelled: () => boolean): Promise<void> {
    return this.exclusive(async () => {
      if (isCancelled()) return;
      await this.scanAndClassify(isCancelled);
    });
  }

  private async scanAndClassify(isCancelled: () => boolean): Promise<Detection | null> {
    const outcome = await performScan(this.scanSource, (msg) => this.log("warn", msg));
    if (isCancelled()) return null;
    this.lastScanAt = nowMs();
    if (!outcome.ok) {
      this.lastError = outcome.error.message;
      this.log("warn", `scan failed: ${outcome.error.message}`);
      this.emit();
      return null;
    }
    this.lastError = null;
    const reading = readingFromScan(outcome.results);
    if (this.calibration.active) {
      this.lastAccessPoints = Object.keys(reading).length;
      this.emit();
      return null;
    }
    return this.applyReading(reading);
  }

  private async scanForCapture(): Promise<AccessPointReading> {
    const outcome = await performScan(this.scanSource, (msg) => this.log("warn", msg));
    this.lastScanAt = nowMs();
    if (!outcome.ok) {
      this.lastError = outcome.error.message;
      this.emit();
      throw outcome.error;
    }
    this.lastError = null;
    const reading = readingFromScan(outcome.results);
    this.lastAccessPoints = Object.keys(reading).length;
    return reading;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(fn);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private emit() {
    if (this.listeners.size === 0) return;
    const state = this.getState();
    for (const listener of this.listeners) listener(state);
  }
}
