import type { Kysely, Selectable } from "kysely";
import { ulid } from "ulid";
import { isRunId, type RunId } from "../core/ids.js";
import { isJsonObject, isJsonSafe, type JsonObject, type JsonValue } from "../core/json.js";
import type { DispatchKind, RunErrorKind, RunEventRecord, RunRecord, RunStatus } from "../core/run.js";
import type { DB } from "../db/types.js";

const RUN_STATUSES: ReadonlySet<string> = new Set<RunStatus>(["running", "succeeded", "failed"]);
const DISPATCH_KINDS: ReadonlySet<string> = new Set<DispatchKind>(["local", "container"]);
const ERROR_KINDS: ReadonlySet<string> = new Set<RunErrorKind>([
  "not_found",
  "target_required",
  "admission_denied",
  "capability_unavailable",
  "execution_error",
  "dispatch_error"
]);

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function jsonObjectOrNull(value: unknown): JsonObject | null {
  return isJsonObject(value) ? value : null;
}

function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.has(value);
}

function isDispatchKind(value: string): value is DispatchKind {
  return DISPATCH_KINDS.has(value);
}

function isRunErrorKind(value: string): value is RunErrorKind {
  return ERROR_KINDS.has(value);
}

function isSha256(value: string): value is `sha256:${string}` {
  return value.startsWith("sha256:");
}

export interface NewRun {
  runId: RunId;
  pluginName: string;
  category: string | null;
  target: string | null;
  options: JsonObject;
  policyHash: `sha256:${string}`;
  requestedBy: string | null;
}

export type RunPatch = Partial<
  Pick<RunRecord, "status" | "category" | "target" | "dispatch" | "errorKind" | "message" | "resultJson" | "finishedAt">
>;

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async getSetting(key: string): Promise<JsonValue | undefined> {
    const row = await this.db.selectFrom("settings").select(["value_json"]).where("key", "=", key).executeTakeFirst();
    if (!row) return undefined;
    const parsed: unknown = JSON.parse(row.value_json);
    if (!isJsonSafe(parsed)) throw new Error(`corrupt setting ${key}`);
    return parsed;
  }

  async putSetting(key: string, value: JsonValue): Promise<void> {
    const valueJson = JSON.stringify(value);
    await this.db
      .insertInto("settings")
      .values({ key, value_json: valueJson })
      .onConflict((oc) => oc.column("key").doUpdateSet({ value_json: valueJson }))
      .execute();
  }

  async createRun(input: NewRun): Promise<RunRecord> {
    await this.db
      .insertInto("runs")
      .values({
        run_id: input.runId,
        plugin_name: input.pluginName,
        category: input.category,
        target: input.target,
        options: input.options,
        policy_hash: input.policyHash,
        status: "running",
        requested_by: input.requestedBy
      })
      .execute();

    const row = await this.db
      .selectFrom("runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();

    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async listRuns(limit: number, pluginName?: string): Promise<RunRecord[]> {
    let q = this.db.selectFrom("runs").selectAll();
    if (pluginName !== undefined) q = q.where("plugin_name", "=", pluginName);
    const rows = await q.orderBy("run_id", "desc").limit(limit).execute();
    return rows.map((row) => this.mapRun(row));
  }

  async updateRun(runId: RunId, patch: RunPatch): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.category !== undefined) updates.category = patch.category;
    if (patch.target !== undefined) updates.target = patch.target;
    if (patch.dispatch !== undefined) updates.dispatch = patch.dispatch;
    if (patch.errorKind !== undefined) updates.error_kind = patch.errorKind;
    if (patch.message !== undefined) updates.message = patch.message;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("runs").set(updates).where("run_id", "=", runId).execute();
  }

  async addRunEvent(runId: RunId, seq: number, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        event_id: `evt_${ulid()}`,
        run_id: runId,
        seq,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEventRecord[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("seq", "asc")
      .execute();

    return rows.map((row) => ({
      eventId: row.event_id,
      runId,
      ts: toIso(row.ts),
      kind: row.kind,
      message: row.message,
      data: jsonObjectOrNull(row.data)
    }));
  }

  private mapRun(row: Selectable<DB["runs"]>): RunRecord {
    if (!isRunId(row.run_id)) throw new Error(`corrupt run row: run_id ${row.run_id}`);
    if (!isRunStatus(row.status)) throw new Error(`corrupt run row ${row.run_id}: status ${row.status}`);
    if (!isSha256(row.policy_hash)) throw new Error(`corrupt run row ${row.run_id}: policy_hash ${row.policy_hash}`);

    return {
      runId: row.run_id,
      pluginName: row.plugin_name,
      category: row.category,
      target: row.target,
      options: jsonObjectOrNull(row.options) ?? {},
      policyHash: row.policy_hash,
      status: row.status,
      dispatch: row.dispatch !== null && isDispatchKind(row.dispatch) ? row.dispatch : null,
      errorKind: row.error_kind !== null && isRunErrorKind(row.error_kind) ? row.error_kind : null,
      message: row.message,
      resultJson: jsonObjectOrNull(row.result_json),
      requestedBy: row.requested_by,
      createdAt: toIso(row.created_at),
      finishedAt: toIsoOrNull(row.finished_at)
    };
  }
}
