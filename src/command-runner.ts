import { spawn } from "node:child_process";
import { performance } from "node:perf_hooks";

export type CommandResult = {
  ok: boolean;
  exit_code: number;
  duration_ms: number;
  stdout: string;
  stderr: string;
  timed_out: boolean;
};

export type CommandRunner = (cmd: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

export const runCommand: CommandRunner = (cmd, args, timeoutMs) => {
  const start = performance.now();
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { env: { ...process.env, LC_ALL: "C" } });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer = timeoutMs > 0 ? setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs) : null;
    child.stdout.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));
    child.on("error", (e) => {
      if (timer) clearTimeout(timer);
      reject(e);
    });
    child.on("close", (code) => {
      if (timer) clearTimeout(timer);
      resolve({
        ok: code === 0 && !timedOut,
        exit_code: code ?? 1,
        duration_ms: Math.round(performance.now() - start),
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        timed_out: timedOut,
      });
    });
  });
};
