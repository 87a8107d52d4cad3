import { setTimeout as sleep } from "timers/promises";
import type { ContainerStatus, ResourceManager } from "../resources/resourceManager.js";

export type ContainerWaitOutcome =
  | { kind: "finished"; status: ContainerStatus }
  | { kind: "vanished" }
  | { kind: "timed_out"; stopped: boolean }
  | { kind: "aborted"; stopped: boolean };

export interface ContainerWaitOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Called after every status query, terminal ones included. */
  onPoll?: (status: ContainerStatus, attempt: number) => Promise<void>;
  now?: () => number;
}

type ContainerControl = Pick<ResourceManager, "getContainerStatus" | "stopContainer">;

async function stopQuietly(control: ContainerControl, containerId: string): Promise<boolean> {
  try {
    return await control.stopContainer(containerId);
  } catch (e) {
    console.error(`[containerMonitor] stop ${containerId} failed: ${e instanceof Error ? e.message : String(e)}`);
    return false;
  }
}

/**
 * Polls a detached container until it reaches exited/dead or disappears.
 * Timeout and abort both stop the container before returning.
 */
export async function waitForContainer(
  control: ContainerControl,
  containerId: string,
  opts: ContainerWaitOptions
): Promise<ContainerWaitOutcome> {
  const now = opts.now ?? Date.now;
  const deadline = now() + opts.timeoutMs;
  let attempt = 0;

  for (;;) {
    if (opts.signal?.aborted) {
      return { kind: "aborted", stopped: await stopQuietly(control, containerId) };
    }

    attempt += 1;
    const status = await control.getContainerStatus(containerId);
    if (opts.onPoll) await opts.onPoll(status, attempt);

    if (status.status === "exited" || status.status === "dead") return { kind: "finished", status };
    if (status.status === "not_found") return { kind: "vanished" };

    const remaining = deadline - now();
    if (remaining <= 0) {
      return { kind: "timed_out", stopped: await stopQuietly(control, containerId) };
    }

    try {
      await sleep(Math.min(opts.intervalMs, remaining), undefined, { signal: opts.signal });
    } catch (e) {
      if (!opts.signal?.aborted) throw e;
    }
  }
}
