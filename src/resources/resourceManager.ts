import { CapabilityUnavailableError } from "../core/errors.js";
import type { ContainerRuntime, ContainerState } from "../execution/backends/types.js";
import type { ResourceRequirement } from "./requirement.js";
import type { CpuReading, DiskReading, MemoryReading, SystemProbe } from "./systemProbe.js";

export interface AdmissionVerdict {
  admitted: boolean;
  reason: string;
}

export interface TrackedProcess {
  pid: number;
  name: string;
  requirement: ResourceRequirement;
  startedAt: number;
}

export interface TrackedProcessUsage {
  name: string;
  requirement: ResourceRequirement;
  startedAt: string;
  runtimeSeconds: number;
  memoryMb: number | null;
}

export interface ResourceSnapshot {
  takenAt: string;
  memory: MemoryReading;
  cpu: CpuReading;
  disk: DiskReading;
  processes: Record<string, TrackedProcessUsage>;
}

export interface ContainerStatus {
  status: ContainerState;
  logs: string;
  exitCode: number | null;
}

export interface ContainerRunRequest {
  image: string;
  command: string[];
  volumes: Record<string, string>;
  environment?: Record<string, string>;
  resourceLimits?: { memoryMb?: number; cpu?: number };
  network?: "none" | "bridge" | "host";
}

export interface ResourceManagerOptions {
  probe: SystemProbe;
  runtime: ContainerRuntime;
  maxMemoryMb: number;
  maxCpu: number;
  /** Volume whose free space admission checks and snapshots measure. */
  workDir: string;
  networkProbe: { host: string; timeoutMs: number };
  /** false forces container capability off without probing the runtime */
  containersEnabled?: boolean;
  logTailLines?: number;
  now?: () => number;
}

export const SUFFICIENT = "Sufficient resources available";
export const NETWORK_FAILED = "Network connectivity check failed";

function fmt1(n: number): string {
  return n.toFixed(1);
}

function probeFailure(dimension: string, e: unknown): AdmissionVerdict {
  const msg = e instanceof Error ? e.message : String(e);
  return { admitted: false, reason: `Not enough ${dimension}. Unable to measure availability: ${msg}` };
}

export class ResourceManager {
  readonly maxMemoryMb: number;
  readonly maxCpu: number;
  readonly containerAvailable: boolean;

  private readonly tracked = new Map<number, TrackedProcess>();
  private readonly now: () => number;

  private constructor(
    private readonly opts: ResourceManagerOptions,
    containerAvailable: boolean
  ) {
    this.maxMemoryMb = opts.maxMemoryMb;
    this.maxCpu = opts.maxCpu;
    this.containerAvailable = containerAvailable;
    this.now = opts.now ?? Date.now;
  }

  /** Probes the container runtime once; the answer holds for the manager's lifetime. */
  static async create(opts: ResourceManagerOptions): Promise<ResourceManager> {
    const enabled = opts.containersEnabled ?? true;
    const available = enabled ? await opts.runtime.isAvailable() : false;
    return new ResourceManager(opts, available);
  }

  /**
   * Compares a requirement against fresh readings in the order memory, CPU, disk, network and
   * reports only the first dimension that falls short.
   */
  async checkResources(req: ResourceRequirement): Promise<AdmissionVerdict> {
    let memory: MemoryReading;
    try {
      memory = await this.opts.probe.memory();
    } catch (e) {
      return probeFailure("memory", e);
    }
    const availMemory = memory.availableMb;
    if (req.memoryMb > availMemory) {
      return {
        admitted: false,
        reason: `Not enough memory. Required: ${req.memoryMb}MB, Available: ${fmt1(availMemory)}MB`
      };
    }

    let cpu: CpuReading;
    try {
      cpu = await this.opts.probe.cpu();
    } catch (e) {
      return probeFailure("CPU", e);
    }
    const availCpu = cpu.cores - (cpu.percent / 100) * cpu.cores;
    if (req.cpuCores > availCpu) {
      return {
        admitted: false,
        reason: `Not enough CPU. Required: ${req.cpuCores} cores, Available: ${fmt1(availCpu)} cores`
      };
    }

    if (req.diskMb > 0) {
      let disk: DiskReading;
      try {
        disk = await this.opts.probe.disk(this.opts.workDir);
      } catch (e) {
        return probeFailure("disk space", e);
      }
      if (req.diskMb > disk.freeMb) {
        return {
          admitted: false,
          reason: `Not enough disk space. Required: ${req.diskMb}MB, Available: ${fmt1(disk.freeMb)}MB`
        };
      }
    }

    if (req.network) {
      let reachable = false;
      try {
        reachable = await this.opts.probe.networkReachable(this.opts.networkProbe.host, this.opts.networkProbe.timeoutMs);
      } catch {
        reachable = false;
      }
      if (!reachable) return { admitted: false, reason: NETWORK_FAILED };
    }

    return { admitted: true, reason: SUFFICIENT };
  }

  private requireContainers(): void {
    if (!this.containerAvailable) {
      throw new CapabilityUnavailableError("Docker is not available");
    }
  }

  async runInContainer(req: ContainerRunRequest): Promise<string> {
    this.requireContainers();

    const memoryMb = req.resourceLimits?.memoryMb ?? 0;
    const cpu = req.resourceLimits?.cpu ?? 0;
    return this.opts.runtime.runDetached({
      image: req.image,
      command: req.command,
      volumes: req.volumes,
      environment: req.environment,
      network: req.network,
      resourceLimits: {
        memory: memoryMb > 0 ? `${memoryMb}m` : undefined,
        cpus: cpu > 0 ? String(cpu) : undefined
      }
    });
  }

  async getContainerStatus(containerId: string): Promise<ContainerStatus> {
    this.requireContainers();

    const inspection = await this.opts.runtime.inspect(containerId);
    if (inspection.state === "not_found") {
      return { status: "not_found", logs: "", exitCode: null };
    }
    const logs = await this.opts.runtime.logsTail(containerId, this.opts.logTailLines ?? 10);
    const terminal = inspection.state === "exited" || inspection.state === "dead";
    return { status: inspection.state, logs, exitCode: terminal ? inspection.exitCode : null };
  }

  async stopContainer(containerId: string): Promise<boolean> {
    this.requireContainers();
    return this.opts.runtime.stop(containerId);
  }

  trackProcess(pid: number, name: string, requirement: ResourceRequirement): void {
    this.tracked.set(pid, { pid, name, requirement, startedAt: this.now() });
  }

  untrackProcess(pid: number): void {
    this.tracked.delete(pid);
  }

  trackedProcesses(): TrackedProcess[] {
    return [...this.tracked.values()];
  }

  /** Fresh snapshot; tracked pids that have gone away are dropped from tracking as a side effect. */
  async getResourceUsage(): Promise<ResourceSnapshot> {
    const [memory, cpu, disk] = await Promise.all([
      this.opts.probe.memory(),
      this.opts.probe.cpu(),
      this.opts.probe.disk(this.opts.workDir)
    ]);

    const processes: Record<string, TrackedProcessUsage> = {};
    const now = this.now();
    for (const proc of [...this.tracked.values()]) {
      const info = await this.opts.probe.processInfo(proc.pid).catch(() => null);
      if (!info) {
        this.untrackProcess(proc.pid);
        continue;
      }
      processes[String(proc.pid)] = {
        name: proc.name,
        requirement: proc.requirement,
        startedAt: new Date(proc.startedAt).toISOString(),
        runtimeSeconds: Math.round((now - proc.startedAt) / 100) / 10,
        memoryMb: info.memoryMb
      };
    }

    return { takenAt: new Date(now).toISOString(), memory, cpu, disk, processes };
  }
}
