import * as z from "zod/v4";
import { DispatchError } from "../../core/errors.js";
import { LocalProcessRunner } from "./localProcess.js";
import type {
  ContainerInspection,
  ContainerLaunchSpec,
  ContainerRuntime,
  ContainerState,
  ExecutionResult,
  RunnerBackend
} from "./types.js";

const CONTAINER_STATES: ReadonlySet<string> = new Set<ContainerState>([
  "created",
  "running",
  "paused",
  "restarting",
  "removing",
  "exited",
  "dead"
]);

const zInspectOutput = z
  .array(
    z.object({
      State: z.object({
        Status: z.string(),
        ExitCode: z.number().int().optional()
      })
    })
  )
  .min(1);

function isContainerState(value: string): value is ContainerState {
  return CONTAINER_STATES.has(value);
}

export function buildRunArgs(spec: ContainerLaunchSpec): string[] {
  if (!spec.image) throw new Error("container image must be non-empty");

  const args: string[] = ["run", "-d"];

  if (spec.name) {
    args.push("--name", spec.name);
  }

  if (spec.network) {
    args.push("--network", spec.network);
  }

  for (const [hostPath, containerPath] of Object.entries(spec.volumes)) {
    args.push("-v", `${hostPath}:${containerPath}`);
  }

  for (const [k, v] of Object.entries(spec.environment ?? {})) {
    args.push("-e", `${k}=${v}`);
  }

  if (spec.resourceLimits?.memory) {
    args.push("--memory", spec.resourceLimits.memory);
  }
  if (spec.resourceLimits?.cpus) {
    args.push("--cpus", spec.resourceLimits.cpus);
  }

  args.push(spec.image, ...spec.command);
  return args;
}

export function parseInspectOutput(stdout: string): ContainerInspection {
  let json: unknown;
  try {
    json = JSON.parse(stdout) as unknown;
  } catch {
    throw new DispatchError("unable to parse docker inspect output", stdout.slice(0, 512));
  }

  const parsed = zInspectOutput.safeParse(json);
  if (!parsed.success) {
    throw new DispatchError("unexpected docker inspect output", stdout.slice(0, 512));
  }

  const first = parsed.data[0];
  if (!first) throw new DispatchError("docker inspect returned no containers");
  const state = first.State.Status.trim().toLowerCase();
  if (!isContainerState(state)) {
    throw new DispatchError(`unknown container status: ${first.State.Status}`);
  }
  const terminal = state === "exited" || state === "dead";
  return { state, exitCode: terminal ? first.State.ExitCode ?? null : null };
}

/** Docker driven through its CLI; every call is an external process whose exit code and output are parsed. */
export class DockerCli implements ContainerRuntime {
  constructor(
    private readonly runner: RunnerBackend<"local_process"> = new LocalProcessRunner(),
    private readonly binary = "docker"
  ) {}

  private async docker(args: string[], timeoutSeconds?: number): Promise<ExecutionResult> {
    return this.runner.execute({ kind: "local_process", argv: [this.binary, ...args], timeoutSeconds });
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await this.docker(["info"], 10);
      return res.exitCode === 0;
    } catch {
      // spawn failure (binary missing) is the normal "no docker" answer
      return false;
    }
  }

  async runDetached(spec: ContainerLaunchSpec): Promise<string> {
    let res: ExecutionResult;
    try {
      res = await this.docker(buildRunArgs(spec));
    } catch (e) {
      throw new DispatchError("failed to start container", e instanceof Error ? e.message : String(e));
    }
    if (res.exitCode !== 0) {
      throw new DispatchError("failed to start container", res.stderr);
    }
    const containerId = res.stdout.trim().split(/\r?\n/).pop()?.trim() ?? "";
    if (!containerId) {
      throw new DispatchError("docker run returned no container id", res.stderr);
    }
    return containerId;
  }

  async inspect(containerId: string): Promise<ContainerInspection> {
    const res = await this.docker(["inspect", containerId]);
    if (res.exitCode !== 0) return { state: "not_found", exitCode: null };
    return parseInspectOutput(res.stdout);
  }

  async logsTail(containerId: string, lines: number): Promise<string> {
    const res = await this.docker(["logs", "--tail", String(lines), containerId]);
    return res.exitCode === 0 ? res.stdout : "";
  }

  async stop(containerId: string): Promise<boolean> {
    try {
      const res = await this.docker(["stop", containerId]);
      return res.exitCode === 0;
    } catch {
      return false;
    }
  }
}
