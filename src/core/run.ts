import type { RunId } from "./ids.js";
import { isJsonObject, type JsonObject } from "./json.js";

/** What every plugin execution returns. Branch on `status` only; `data` is plugin-specific. */
export interface RunResult {
  status: "success" | "error";
  message: string;
  data: JsonObject;
}

export type RunErrorKind =
  | "not_found"
  | "target_required"
  | "admission_denied"
  | "capability_unavailable"
  | "execution_error"
  | "dispatch_error";

export type DispatchKind = "local" | "container";

export interface RunOutcome extends RunResult {
  runId: RunId;
  plugin: string;
  dispatch: DispatchKind | null;
  errorKind: RunErrorKind | null;
  elapsedSeconds: number | null;
  containerId?: string;
}

export type RunStatus = "running" | "succeeded" | "failed";

export interface RunRecord {
  runId: RunId;
  pluginName: string;
  category: string | null;
  target: string | null;
  options: JsonObject;
  policyHash: `sha256:${string}`;
  status: RunStatus;
  dispatch: DispatchKind | null;
  errorKind: RunErrorKind | null;
  message: string | null;
  resultJson: JsonObject | null;
  requestedBy: string | null;
  createdAt: string;
  finishedAt: string | null;
}

export interface RunEventRecord {
  eventId: string;
  runId: RunId;
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

export function successResult(message: string, data: JsonObject = {}): RunResult {
  return { status: "success", message, data };
}

export function errorResult(message: string, data: JsonObject = {}): RunResult {
  return { status: "error", message, data };
}

/** True for a well-formed RunResult whose data survives JSON serialization unchanged. */
export function isRunResult(value: unknown): value is RunResult {
  if (typeof value !== "object" || value === null) return false;
  const status: unknown = Reflect.get(value, "status");
  const message: unknown = Reflect.get(value, "message");
  const data: unknown = Reflect.get(value, "data");
  return (status === "success" || status === "error") && typeof message === "string" && isJsonObject(data);
}
