import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { DispatchKind, RunErrorKind } from "../core/run.js";
import type { PostgresStore } from "../store/postgresStore.js";

export class PluginRun {
  readonly runId: RunId;
  private seq = 0;

  constructor(
    private readonly store: PostgresStore,
    private readonly info: {
      runId: RunId;
      pluginName: string;
      target: string | null;
      options: JsonObject;
      policyHash: `sha256:${string}`;
      requestedBy: string | null;
    }
  ) {
    this.runId = info.runId;
  }

  async start(): Promise<void> {
    await this.store.createRun({
      runId: this.runId,
      pluginName: this.info.pluginName,
      category: null,
      target: this.info.target,
      options: this.info.options,
      policyHash: this.info.policyHash,
      requestedBy: this.info.requestedBy
    });
    await this.event("run.started", `plugin=${this.info.pluginName}`, { policy_hash: this.info.policyHash });
  }

  async event(kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    this.seq += 1;
    await this.store.addRunEvent(this.runId, this.seq, kind, message, data);
  }

  async resolved(category: string, target: string | null): Promise<void> {
    await this.store.updateRun(this.runId, { category, target });
  }

  async dispatched(dispatch: DispatchKind): Promise<void> {
    await this.store.updateRun(this.runId, { dispatch });
  }

  async finishSuccess(message: string, result: JsonObject): Promise<void> {
    await this.event("run.succeeded", message, null);
    await this.store.updateRun(this.runId, {
      status: "succeeded",
      message,
      resultJson: result,
      finishedAt: new Date().toISOString()
    });
  }

  async finishFailure(errorKind: RunErrorKind, message: string, result: JsonObject | null): Promise<void> {
    await this.event("run.failed", message, { error_kind: errorKind });
    await this.store.updateRun(this.runId, {
      status: "failed",
      errorKind,
      message,
      resultJson: result,
      finishedAt: new Date().toISOString()
    });
  }
}
