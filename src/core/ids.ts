import { ulid } from "ulid";

export type RunId = `run_${string}`;

const RUN_ID_RE = /^run_[0-9A-HJKMNP-TV-Z]{26}$/;

export function newRunId(): RunId {
  return `run_${ulid()}`;
}

export function isRunId(value: string): value is RunId {
  return RUN_ID_RE.test(value);
}
