import { spawn } from "child_process";
import { constants as fsConstants, promises as fs } from "fs";
import path from "path";
import type { ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(spec: LocalProcessSpec): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("local_process argv must be non-empty");
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const pid = child.pid;
    if (pid !== undefined) spec.onSpawn?.(pid);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    let timedOut = false;
    const timeoutMs = Math.max(0, Math.floor((spec.timeoutSeconds ?? 0) * 1000));
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;

    const exitCode = await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code ?? (timedOut ? 137 : 0)));
    }).finally(() => {
      if (timeout) clearTimeout(timeout);
      if (pid !== undefined) spec.onExit?.(pid);
    });

    const finishedAt = new Date().toISOString();

    const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr =
      Buffer.concat(stderrChunks).toString("utf8") +
      (stderrState.truncated ? "\n[stderr truncated]\n" : "") +
      (timedOut ? "\n[timeout]\n" : "");

    return { exitCode, stdout, stderr, startedAt, finishedAt, timedOut };
  }
}

/** Resolves a bare command name against PATH, or checks an explicit path directly. */
export async function commandOnPath(command: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  if (!command) return false;
  const candidates = command.includes(path.sep)
    ? [command]
    : (env.PATH ?? "").split(path.delimiter).filter(Boolean).map((dir) => path.join(dir, command));

  for (const candidate of candidates) {
    try {
      await fs.access(candidate, fsConstants.X_OK);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}
