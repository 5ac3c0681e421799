#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { classify } from "./classifier.js";
import { getArg, resolveConfig, type RoomprintConfig } from "./config.js";
import { FingerprintStore } from "./fingerprint-store.js";
import { FilePreferences } from "./preferences.js";
import { RoomDetector } from "./room-detector.js";
import { NmcliScanSource, performScan } from "./scan-source.js";
import { RoomprintServer } from "./server.js";
import { consoleSink, errorMessage, readingFromScan } from "./util.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";

function hasFlag(flag: string) {
  return args.includes(flag);
}

function positional(index: number): string | undefined {
  const list: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    if (args[i].startsWith("--")) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) i += 1;
      continue;
    }
    list.push(args[i]);
  }
  return list[index];
}

function usage(exitCode = 0): never {
  console.log(`roomprint <command> [options]

Commands:
  start [--port <port>] [--interval <ms>]
  rooms
  envelope <room>
  classify
  calibrate <room>
  delete <room>
  scan
  help

Options:
  --store <path>      fingerprint store (env ROOMPRINT_STORE_PATH)
  --nmcli <bin>       nmcli binary (env ROOMPRINT_NMCLI)
  --iface <name>      wifi interface (env ROOMPRINT_IFACE)
  --scan-timeout <ms> per-command scan timeout

Defaults:
  --store ~/.roomprint/preferences.json
  --port 9130
  --interval 1000
`);
  process.exit(exitCode);
}

if (hasFlag("--help") || cmd === "--help" || cmd === "help") {
  usage(0);
}

const config = resolveConfig(args);

function scanSourceFor(cfg: RoomprintConfig) {
  return new NmcliScanSource({ bin: cfg.nmcliBin, iface: cfg.iface, timeoutMs: cfg.scanTimeoutMs });
}

async function openDetector(cfg: RoomprintConfig) {
  const detector = new RoomDetector({
    store: new FingerprintStore(new FilePreferences(cfg.storePath)),
    scanSource: scanSourceFor(cfg),
    intervalMs: cfg.scanIntervalMs,
    log: consoleSink,
  });
  await detector.open();
  return detector;
}

async function cmdStart() {
  const detector = await openDetector(config);
  const server = new RoomprintServer(detector, {
    port: config.port,
    host: getArg(args, "--host", "127.0.0.1"),
    log: consoleSink,
  });
  const port = await server.start();
  detector.start();
  console.log(`roomprint running on http://localhost:${port}`);

  let lastRoom: string | null | undefined;
  detector.subscribe((state) => {
    const room = state.detection === "unset" ? undefined : state.current_room;
    if (room === lastRoom) return;
    lastRoom = room;
    if (state.detection !== "unset") console.log(`current room: ${room ?? "unknown"}`);
  });

  const shutdown = () => {
    detector.stop();
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(errorMessage(err));
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function cmdRooms() {
  const store = new FingerprintStore(new FilePreferences(config.storePath));
  await store.load();
  const rooms = store.rooms();
  if (rooms.length === 0) {
    console.log("no rooms calibrated");
    return;
  }
  for (const room of rooms) {
    const locations = store.fingerprintsFor(room).map((fp) => fp.location);
    console.log(`${room}\t${locations.join(",")}`);
  }
}

async function cmdEnvelope() {
  const room = positional(1);
  if (!room) return usage(1);
  const detector = await openDetector(config);
  if (!detector.store.rooms().includes(room)) {
    console.error(`unknown room: ${room}`);
    process.exit(2);
  }
  for (const row of detector.roomEnvelope(room)) {
    console.log(`${row.bssid}\t[${row.min}, ${row.max}]`);
  }
}

async function cmdClassify() {
  const store = new FingerprintStore(new FilePreferences(config.storePath));
  await store.load();
  const outcome = await performScan(scanSourceFor(config), (msg) => console.error(msg));
  if (!outcome.ok) {
    console.error(outcome.error.message);
    process.exit(2);
  }
  const reading = readingFromScan(outcome.results);
  console.log(classify(reading, store.fingerprints()));
}

async function cmdCalibrate() {
  const room = positional(1);
  if (!room) return usage(1);
  const detector = await openDetector(config);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    detector.startCalibration(room);
    while (detector.calibration.active) {
      const status = detector.calibration.status();
      await rl.question(`[${status.index + 1}/${status.total}] stand at ${status.location} and press Enter `);
      try {
        const result = await detector.captureLocation();
        console.log(`captured ${Object.keys(result.captured.signals).length} access points`);
      } catch (err) {
        console.error(`capture failed: ${errorMessage(err)}`);
      }
    }
    console.log(`calibration of ${room} complete`);
  } finally {
    rl.close();
  }
}

async function cmdDelete() {
  const room = positional(1);
  if (!room) return usage(1);
  const store = new FingerprintStore(new FilePreferences(config.storePath));
  await store.load();
  const removed = await store.deleteRoom(room);
  console.log(removed > 0 ? `deleted ${room} (${removed} fingerprints)` : `no fingerprints for ${room}`);
}

async function cmdScan() {
  const outcome = await performScan(scanSourceFor(config), (msg) => console.error(msg));
  if (!outcome.ok) {
    console.error(outcome.error.message);
    process.exit(2);
  }
  const reading = readingFromScan(outcome.results);
  const rows = Object.entries(reading).sort((a, b) => b[1] - a[1]);
  for (const [bssid, level] of rows) console.log(`${bssid}\t${level}`);
}

try {
  if (cmd === "start") {
    await cmdStart();
  } else if (cmd === "rooms") {
    await cmdRooms();
  } else if (cmd === "envelope") {
    await cmdEnvelope();
  } else if (cmd === "classify") {
    await cmdClassify();
  } else if (cmd === "calibrate") {
    await cmdCalibrate();
  } else if (cmd === "delete") {
    await cmdDelete();
  } else if (cmd === "scan") {
    await cmdScan();
  } else {
    usage(1);
  }
} catch (err) {
  console.error(errorMessage(err));
  process.exit(1);
}
