import http from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { RoomprintError } from "./errors.js";
import type { RoomDetector } from "./room-detector.js";
import type { LogSink } from "./schema.js";
import { errorMessage, isRecord, silentSink } from "./util.js";

type ServerOptions = {
  port: number;
  host?: string;
  log?: LogSink;
};

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

const STATUS_BY_CODE: Record<string, number> = {
  state_misuse: 409,
  persistence_read: 500,
  persistence_write: 500,
  scan_failed: 503,
};

export class RoomprintServer {
  private clients: Set<WebSocket> = new Set();
  private server?: http.Server;
  private wss?: WebSocketServer;
  private unsubscribe?: () => void;
  private startedAt = Date.now();
  private log: LogSink;

  constructor(private detector: RoomDetector, private options: ServerOptions) {
    this.log = options.log ?? silentSink;
  }

  start(): Promise<number> {
    this.startedAt = Date.now();
    this.server = http.createServer((req, res) => void this.handleRequest(req, res));
    this.wss = new WebSocketServer({ noServer: true });

    this.server.on("upgrade", (req, socket, head) => {
      const url = req.url ?? "";
      if (url.startsWith("/ws/state")) {
        this.wss?.handleUpgrade(req, socket, head, (ws) => {
          this.clients.add(ws);
          ws.send(JSON.stringify(this.detector.getState()));
          ws.on("close", () => this.clients.delete(ws));
        });
        return;
      }
      socket.destroy();
    });

    this.unsubscribe = this.detector.subscribe((state) => {
      const payload = JSON.stringify(state);
      for (const ws of this.clients) {
        if (ws.readyState === WebSocket.OPEN) ws.send(payload);
      }
    });

    const server = this.server;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host ?? "127.0.0.1", () => {
        server.off("error", reject);
        const address = server.address();
        resolve(typeof address === "object" && address !== null ? address.port : this.options.port);
      });
    });
  }

  stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    for (const ws of this.clients) ws.terminate();
    this.clients.clear();
    this.wss?.close();
    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    try {
      await this.route(req, res);
    } catch (err) {
      this.respondError(res, err);
    }
  }

  private async route(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    if (url.pathname === "/health") {
      const state = this.detector.getState();
      return this.respondJson(res, {
        ok: true,
        uptime_ms: Date.now() - this.startedAt,
        scanning: this.detector.scanning,
        fingerprints: this.detector.store.size,
        rooms: state.rooms.length,
        last_scan_at: state.last_scan_at,
        last_error: state.last_error,
      });
    }
    if (url.pathname === "/api/state" && method === "GET") {
      return this.respondJson(res, this.detector.getState());
    }
    if (url.pathname === "/api/rooms" && method === "GET") {
      return this.respondJson(res, { rooms: this.detector.store.rooms() });
    }
    if (url.pathname === "/api/rooms/envelope" && method === "GET") {
      const room = url.searchParams.get("room") ?? "";
      if (!this.detector.store.rooms().includes(room)) throw new HttpError(404, `unknown room: ${room}`);
      return this.respondJson(res, { room, envelope: this.detector.roomEnvelope(room) });
    }
    if (url.pathname === "/api/rooms/delete" && method === "POST") {
      const room = requireRoom(await readJsonBody(req));
      const removed = await this.detector.deleteRoom(room);
      return this.respondJson(res, { ok: true, room, removed });
    }
    if (url.pathname === "/api/calibration/start" && method === "POST") {
      const room = requireRoom(await readJsonBody(req));
      return this.respondJson(res, { ok: true, calibration: this.detector.startCalibration(room) });
    }
    if (url.pathname === "/api/calibration/capture" && method === "POST") {
      const result = await this.detector.captureLocation();
      return this.respondJson(res, {
        ok: true,
        done: result.done,
        captured: result.captured,
        next: result.done ? null : result.next,
        calibration: this.detector.calibration.status(),
      });
    }
    if (url.pathname === "/api/calibration/cancel" && method === "POST") {
      return this.respondJson(res, { ok: true, calibration: this.detector.cancelCalibration() });
    }
    throw new HttpError(404, "not found");
  }

  private respondJson(res: http.ServerResponse, payload: unknown, status = 200) {
    const body = JSON.stringify(payload);
    res.writeHead(status, {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Cache-Control": "no-store",
    });
    res.end(body);
  }

  private respondError(res: http.ServerResponse, err: unknown) {
    let status = 500;
    let code = "internal";
    if (err instanceof HttpError) {
      status = err.status;
      code = status === 404 ? "not_found" : "bad_request";
    } else if (err instanceof RoomprintError) {
      status = STATUS_BY_CODE[err.code] ?? 500;
      code = err.code;
    }
    if (status >= 500) this.log("error", `request failed: ${errorMessage(err)}`);
    this.respondJson(res, { ok: false, error: errorMessage(err), code }, status);
  }
}

function readJsonBody(req: http.IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("error", reject);
    req.on("end", () => {
      if (!body.trim()) return resolve({});
      try {
        const payload: unknown = JSON.parse(body);
        if (!isRecord(payload)) return reject(new HttpError(400, "body must be a JSON object"));
        resolve(payload);
      } catch {
        reject(new HttpError(400, "invalid JSON body"));
      }
    });
  });
}

function requireRoom(payload: Record<string, unknown>): string {
  const room = payload.room;
  if (typeof room !== "string") throw new HttpError(400, "missing room");
  return room;
}
