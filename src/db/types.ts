import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface SettingsTable {
  key: string;
  value_json: string;
  updated_at: Generated<string>;
}

export interface RunsTable {
  run_id: string;
  plugin_name: string;
  category: OptionalNullable<string>;
  target: OptionalNullable<string>;
  options: Json;
  policy_hash: string;
  status: string;
  dispatch: OptionalNullable<string>;
  error_kind: OptionalNullable<string>;
  message: OptionalNullable<string>;
  result_json: JsonNullable;
  requested_by: OptionalNullable<string>;
  created_at: Generated<string>;
  finished_at: OptionalNullable<string>;
}

export interface RunEventsTable {
  event_id: string;
  run_id: string;
  seq: number;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  settings: SettingsTable;
  runs: RunsTable;
  run_events: RunEventsTable;
}
