export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
  timedOut: boolean;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutSeconds?: number;
  /** Called once the child has a pid, and again with the same pid after it exits. */
  onSpawn?: (pid: number) => void;
  onExit?: (pid: number) => void;
}

export type ExecutionSpec = LocalProcessSpec;

export interface RunnerBackend<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  kind: K;
  execute(spec: Extract<ExecutionSpec, { kind: K }>): Promise<ExecutionResult>;
}

export type ContainerState =
  | "created"
  | "running"
  | "paused"
  | "restarting"
  | "removing"
  | "exited"
  | "dead"
  | "not_found";

export interface ContainerLaunchSpec {
  image: string;
  command: string[];
  /** host path -> container path */
  volumes: Record<string, string>;
  environment?: Record<string, string>;
  resourceLimits?: { memory?: string; cpus?: string };
  network?: "none" | "bridge" | "host";
  name?: string;
}

export interface ContainerInspection {
  state: ContainerState;
  exitCode: number | null;
}

/** Narrow surface over a container runtime CLI (`info`, `run -d`, `inspect`, `logs`, `stop`). */
export interface ContainerRuntime {
  isAvailable(): Promise<boolean>;
  runDetached(spec: ContainerLaunchSpec): Promise<string>;
  inspect(containerId: string): Promise<ContainerInspection>;
  logsTail(containerId: string, lines: number): Promise<string>;
  stop(containerId: string): Promise<boolean>;
}
