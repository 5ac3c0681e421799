import { defaultPreferencesPath } from "./preferences.js";
import { asNumber } from "./util.js";

export type RoomprintConfig = {
  storePath: string;
  scanIntervalMs: number;
  port: number;
  nmcliBin: string;
  iface?: string;
  scanTimeoutMs: number;
};

export const DEFAULT_PORT = 9130;
export const DEFAULT_SCAN_INTERVAL_MS = 1000;
export const DEFAULT_SCAN_TIMEOUT_MS = 8000;

export function getArg(args: string[], flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function positiveInt(value: string | undefined, fallback: number) {
  const n = Math.floor(asNumber(value, fallback));
  return n > 0 ? n : fallback;
}

export function resolveConfig(args: string[], env: NodeJS.ProcessEnv = process.env): RoomprintConfig {
  const iface = getArg(args, "--iface", env.ROOMPRINT_IFACE?.trim() || undefined);
  return {
    storePath: getArg(args, "--store") ?? defaultPreferencesPath(env),
    scanIntervalMs: positiveInt(getArg(args, "--interval", env.ROOMPRINT_SCAN_INTERVAL_MS), DEFAULT_SCAN_INTERVAL_MS),
    port: positiveInt(getArg(args, "--port", env.ROOMPRINT_PORT), DEFAULT_PORT),
    nmcliBin: getArg(args, "--nmcli", env.ROOMPRINT_NMCLI?.trim() || "nmcli") ?? "nmcli",
    iface: iface || undefined,
    scanTimeoutMs: positiveInt(getArg(args, "--scan-timeout", env.ROOMPRINT_SCAN_TIMEOUT_MS), DEFAULT_SCAN_TIMEOUT_MS),
  };
}
