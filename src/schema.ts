export type WifiReading = { bssid: string; level: number };

export type AccessPointReading = Record<string, number>;

export type Fingerprint = {
  room: string;
  location: string;
  signals: AccessPointReading;
};

export type SignalRange = { min: number; max: number };

export type RoomEnvelope = Map<string, SignalRange>;

export type Detection =
  | { status: "no_data" }
  | { status: "unknown" }
  | { status: "matched"; room: string };

export type DetectionState = "unset" | "unknown" | "matched";

export type CalibrationStatus = {
  active: boolean;
  room: string | null;
  location: string | null;
  index: number;
  total: number;
};

export type CaptureResult =
  | { done: false; captured: Fingerprint; next: string }
  | { done: true; captured: Fingerprint };

export type LoadIssue = {
  index: number;
  reason: string;
};

export type DetectorState = {
  current_room: string | null;
  detection: DetectionState;
  rooms: string[];
  calibration: CalibrationStatus;
  last_scan_at: number;
  last_access_points: number;
  last_error: string | null;
  load_issues: LoadIssue[];
};

export type LogLevel = "info" | "warn" | "error";

export type LogSink = (level: LogLevel, message: string) => void;
