export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled' | 'timeout';

export const JOB_STATUSES: readonly JobStatus[] = [
  'queued',
  'running',
  'completed',
  'failed',
  'cancelled',
  'timeout',
];

export type TerminalStatus = Exclude<JobStatus, 'queued' | 'running'>;

export interface Job {
  id: string;
  task_name: string;
  params: JsonObject;
  priority: number; // lower runs first
  timeout_seconds: number;
  max_retries: number;
  retry_count: number;
  status: JobStatus;
  created_at: string;
  enqueued_at: string;
  started_at: string | null;
  finished_at: string | null;
  last_heartbeat: string | null;
  worker_id: string | null;
  result: JsonValue | null;
  error: string | null;
  cancel_requested: boolean;
}

/** Fields a store mutator may change; identity and submission fields are fixed. */
export type JobPatch = Partial<
  Omit<Job, 'id' | 'task_name' | 'params' | 'created_at' | 'status' | 'timeout_seconds' | 'max_retries' | 'priority'>
>;

export interface SubmitRequest {
  params: JsonObject;
  priority: number;
  timeout_seconds: number;
  max_retries: number;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.values(value).every(isJsonValue);
}
