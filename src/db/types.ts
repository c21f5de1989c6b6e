import type { ColumnType, Generated } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type Timestamp = ColumnType<Date | string, string, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;
// JSON columns are written as serialized text and validated when read back.
type Json = ColumnType<unknown, string, string>;
type JsonNullable = ColumnType<unknown, string | null | undefined, string | null>;

export interface JobsTable {
  job_id: string;
  state: string;
  priority: number;
  submitted_at: Timestamp;
  started_at: TimestampNullable;
  finished_at: TimestampNullable;
  request: Json;
  input_size_bytes: ColumnType<string | number, number, number>; // pg returns bigint as string by default
  workspace_path: OptionalNullable<string>;
  result_ref: JsonNullable;
  error: JsonNullable;
  cancel_requested: boolean;
  updated_at: Generated<Date | string>;
}

export interface JobEventsTable {
  event_id: Generated<string>;
  job_id: string;
  ts: Generated<Date | string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  jobs: JobsTable;
  job_events: JobEventsTable;
}
