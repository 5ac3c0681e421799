import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import { FingerprintStore, FINGERPRINTS_KEY } from "../fingerprint-store.js";
import { MemoryPreferences } from "../preferences.js";
import { RoomDetector } from "../room-detector.js";
import { StaticScanSource } from "../scan-source.js";
import { RoomprintServer } from "../server.js";

describe("RoomprintServer", () => {
  let detector: RoomDetector;
  let server: RoomprintServer;
  let base = "";

  beforeEach(async () => {
    const prefs = new MemoryPreferences({
      [FINGERPRINTS_KEY]: ['{"room":"Kitchen","location":"corner1","signals":{"ap1":-50}}'],
    });
    detector = new RoomDetector({
      store: new FingerprintStore(prefs),
      scanSource: new StaticScanSource([[{ bssid: "ap1", level: -62 }]]),
    });
    await detector.open();
    server = new RoomprintServer(detector, { port: 0 });
    const port = await server.start();
    base = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  async function post(path: string, body?: unknown) {
    const res = await fetch(`${base}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, json: await res.json() };
  }

  it("serves health and state", async () => {
    const health = await (await fetch(`${base}/health`)).json();
    expect(health).toMatchObject({ ok: true, scanning: false, fingerprints: 1, rooms: 1, last_error: null });

    const state = await (await fetch(`${base}/api/state`)).json();
    expect(state).toMatchObject({ current_room: null, detection: "unset", rooms: ["Kitchen"] });
  });

  it("runs a calibration over HTTP", async () => {
    const started = await post("/api/calibration/start", { room: "Office" });
    expect(started.status).toBe(200);
    expect(started.json).toEqual({
      ok: true,
      calibration: { active: true, room: "Office", location: "corner1", index: 0, total: 5 },
    });

    const captured = await post("/api/calibration/capture");
    expect(captured.status).toBe(200);
    expect(captured.json).toMatchObject({
      ok: true,
      done: false,
      next: "corner2",
      captured: { room: "Office", location: "corner1", signals: { ap1: -62 } },
    });

    const rooms = await (await fetch(`${base}/api/rooms`)).json();
    expect(rooms).toEqual({ rooms: ["Kitchen", "Office"] });

    const envelope = await (await fetch(`${base}/api/rooms/envelope?room=Office`)).json();
    expect(envelope).toEqual({ room: "Office", envelope: [{ bssid: "ap1", min: -62, max: -62 }] });

    const cancelled = await post("/api/calibration/cancel");
    expect(cancelled.json).toMatchObject({ ok: true, calibration: { active: false, room: null } });
  });

  it("maps state misuse and bad input to client errors", async () => {
    const capture = await post("/api/calibration/capture");
    expect(capture.status).toBe(409);
    expect(capture.json).toEqual({
      ok: false,
      error: "captureLocation called while not calibrating",
      code: "state_misuse",
    });

    const empty = await post("/api/calibration/start", { room: "" });
    expect(empty.status).toBe(409);

    const missing = await post("/api/rooms/delete", {});
    expect(missing).toEqual({ status: 400, json: { ok: false, error: "missing room", code: "bad_request" } });

    const unknown = await fetch(`${base}/api/rooms/envelope?room=Attic`);
    expect(unknown.status).toBe(404);
  });

  it("deletes rooms", async () => {
    const deleted = await post("/api/rooms/delete", { room: "Kitchen" });
    expect(deleted).toEqual({ status: 200, json: { ok: true, room: "Kitchen", removed: 1 } });
    expect(detector.getState().rooms).toEqual([]);
  });

  it("pushes state over the websocket", async () => {
    const ws = new WebSocket(`${base.replace("http", "ws")}/ws/state`);
    const messages: Array<{ rooms: string[] }> = [];
    const second = new Promise<void>((resolve) => {
      ws.on("message", (data) => {
        messages.push(JSON.parse(data.toString()));
        if (messages.length === 2) resolve();
      });
    });
    await new Promise<void>((resolve) => ws.once("open", () => resolve()));
    await new Promise((resolve) => setTimeout(resolve, 20));
    await detector.deleteRoom("Kitchen");
    await second;
    ws.close();

    expect(messages[0].rooms).toEqual(["Kitchen"]);
    expect(messages[1].rooms).toEqual([]);
  });
});
