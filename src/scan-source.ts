import { runCommand, type CommandRunner } from "./command-runner.js";
import { ScanError } from "./errors.js";
import type { WifiReading } from "./schema.js";
import { errorMessage } from "./util.js";

export type ScanSource = {
  startScan(): Promise<void>;
  getResults(): Promise<WifiReading[]>;
};

export type NmcliOptions = {
  bin?: string;
  iface?: string;
  timeoutMs?: number;
  run?: CommandRunner;
};

// nmcli reports signal quality in percent; map it onto the usual dBm scale.
export function qualityToDbm(quality: number) {
  return Math.round(quality / 2 - 100);
}

// Splits one `nmcli -t` line on unescaped colons.
export function splitTerseFields(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === "\\" && i + 1 < line.length) {
      current += line[i + 1];
      i += 1;
      continue;
    }
    if (ch === ":") {
      fields.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  fields.push(current);
  return fields;
}

export function parseNmcliList(output: string): WifiReading[] {
  const byBssid = new Map<string, number>();
  for (const line of output.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const [bssid, signal] = splitTerseFields(line);
    if (!bssid || signal === undefined) continue;
    const quality = Number(signal);
    if (!Number.isFinite(quality)) continue;
    const level = qualityToDbm(quality);
    const key = bssid.trim();
    const prev = byBssid.get(key);
    if (prev === undefined || level > prev) byBssid.set(key, level);
  }
  return Array.from(byBssid, ([bssid, level]) => ({ bssid, level }));
}

export class NmcliScanSource implements ScanSource {
  private bin: string;
  private iface?: string;
  private timeoutMs: number;
  private run: CommandRunner;

  constructor(options: NmcliOptions = {}) {
    this.bin = options.bin ?? "nmcli";
    this.iface = options.iface;
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.run = options.run ?? runCommand;
  }

  async startScan(): Promise<void> {
    const args = ["device", "wifi", "rescan", ...this.ifaceArgs()];
    const res = await this.exec(args);
    if (!res.ok) throw new ScanError(res.stderr || `nmcli rescan exited with ${res.exit_code}`);
  }

  async getResults(): Promise<WifiReading[]> {
    const args = ["-t", "-f", "BSSID,SIGNAL", "device", "wifi", "list", ...this.ifaceArgs(), "--rescan", "no"];
    const res = await this.exec(args);
    if (!res.ok) {
      throw new ScanError(res.timed_out ? "nmcli list timed out" : res.stderr || `nmcli list exited with ${res.exit_code}`);
    }
    return parseNmcliList(res.stdout);
  }

  private ifaceArgs() {
    return this.iface ? ["ifname", this.iface] : [];
  }

  private async exec(args: string[]) {
    try {
      return await this.run(this.bin, args, this.timeoutMs);
    } catch (err) {
      throw new ScanError(`failed to run ${this.bin}: ${errorMessage(err)}`, err);
    }
  }
}

// Replays fixed scans in order, repeating the last one; useful for demos and tests.
export class StaticScanSource implements ScanSource {
  private index = 0;
  scans = 0;

  constructor(private frames: WifiReading[][]) {}

  async startScan(): Promise<void> {
    this.scans += 1;
  }

  async getResults(): Promise<WifiReading[]> {
    if (this.frames.length === 0) return [];
    const frame = this.frames[Math.min(this.index, this.frames.length - 1)];
    this.index += 1;
    return frame.map((r) => ({ ...r }));
  }
}

export type ScanOutcome = { ok: true; results: WifiReading[] } | { ok: false; error: ScanError };

// A failed rescan request is tolerated; the cached results are still read.
export async function performScan(source: ScanSource, onWarn?: (msg: string) => void): Promise<ScanOutcome> {
  try {
    await source.startScan();
  } catch (err) {
    onWarn?.(`scan request failed: ${errorMessage(err)}`);
  }
  try {
    return { ok: true, results: await source.getResults() };
  } catch (err) {
    const error = err instanceof ScanError ? err : new ScanError(errorMessage(err, "scan failed"), err);
    return { ok: false, error };
  }
}
