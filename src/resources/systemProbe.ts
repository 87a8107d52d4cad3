import { promises as fs } from "fs";
import os from "os";
import { setTimeout as sleep } from "timers/promises";
import { LocalProcessRunner } from "../execution/backends/localProcess.js";
import type { RunnerBackend } from "../execution/backends/types.js";

const MB = 1024 * 1024;

export interface MemoryReading {
  totalMb: number;
  availableMb: number;
  usedMb: number;
  percent: number;
}

export interface CpuReading {
  cores: number;
  /** busy share of all cores over the sample window, 0-100 */
  percent: number;
}

export interface DiskReading {
  path: string;
  totalMb: number;
  freeMb: number;
  usedMb: number;
  percent: number;
}

export interface ProcessReading {
  memoryMb: number | null;
}

/** Live host measurements. Every call reads the system again; nothing is cached. */
export interface SystemProbe {
  memory(): Promise<MemoryReading>;
  cpu(): Promise<CpuReading>;
  disk(dir: string): Promise<DiskReading>;
  /** null when the pid no longer exists or cannot be queried */
  processInfo(pid: number): Promise<ProcessReading | null>;
  networkReachable(host: string, timeoutMs: number): Promise<boolean>;
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function cpuTimes(): { idle: number; total: number } {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

async function readProcKb(file: string, field: string): Promise<number | null> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch {
    return null;
  }
  const m = new RegExp(`^${field}:\\s+(\\d+)\\s*kB`, "m").exec(text);
  if (!m || !m[1]) return null;
  return Number.parseInt(m[1], 10);
}

function isErrno(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

export class NodeSystemProbe implements SystemProbe {
  constructor(
    private readonly runner: RunnerBackend<"local_process"> = new LocalProcessRunner(),
    private readonly cpuSampleMs = 100
  ) {}

  async memory(): Promise<MemoryReading> {
    const total = os.totalmem();
    // MemAvailable counts reclaimable cache; os.freemem() does not.
    const availableKb = process.platform === "linux" ? await readProcKb("/proc/meminfo", "MemAvailable") : null;
    const available = availableKb !== null ? availableKb * 1024 : os.freemem();
    const used = Math.max(0, total - available);
    return {
      totalMb: round1(total / MB),
      availableMb: round1(available / MB),
      usedMb: round1(used / MB),
      percent: total > 0 ? round1((used / total) * 100) : 0
    };
  }

  async cpu(): Promise<CpuReading> {
    const before = cpuTimes();
    await sleep(this.cpuSampleMs);
    const after = cpuTimes();
    const total = after.total - before.total;
    const idle = after.idle - before.idle;
    const percent = total > 0 ? round1(Math.min(100, Math.max(0, (1 - idle / total) * 100))) : 0;
    return { cores: os.cpus().length, percent };
  }

  async disk(dir: string): Promise<DiskReading> {
    const st = await fs.statfs(dir);
    const total = st.blocks * st.bsize;
    const free = st.bavail * st.bsize;
    const used = (st.blocks - st.bfree) * st.bsize;
    return {
      path: dir,
      totalMb: round1(total / MB),
      freeMb: round1(free / MB),
      usedMb: round1(used / MB),
      percent: used + free > 0 ? round1((used / (used + free)) * 100) : 0
    };
  }

  async processInfo(pid: number): Promise<ProcessReading | null> {
    try {
      process.kill(pid, 0);
    } catch (e) {
      if (isErrno(e, "ESRCH") || isErrno(e, "EPERM")) return null;
      throw e;
    }
    const rssKb = process.platform === "linux" ? await readProcKb(`/proc/${pid}/status`, "VmRSS") : null;
    if (rssKb === null && pid === process.pid) {
      return { memoryMb: round1(process.memoryUsage().rss / MB) };
    }
    return { memoryMb: rssKb === null ? null : round1(rssKb / 1024) };
  }

  async networkReachable(host: string, timeoutMs: number): Promise<boolean> {
    const waitSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    try {
      const res = await this.runner.execute({
        kind: "local_process",
        argv: ["ping", "-c", "1", "-W", String(waitSeconds), host],
        timeoutSeconds: waitSeconds + 1
      });
      return res.exitCode === 0;
    } catch {
      return false;
    }
  }
}
