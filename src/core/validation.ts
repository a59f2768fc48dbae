import Joi from 'joi';
import { SubmissionError } from './errors.js';
import { isJsonObject, isJsonValue, type JsonObject, type SubmitRequest } from './types.js';

export const SUBMIT_DEFAULTS = {
  priority: 0,
  timeout_seconds: 300,
  max_retries: 2,
} as const;

interface RawSubmit {
  params: Record<string, unknown>;
  priority: number;
  timeout_seconds: number;
  max_retries: number;
  [extra: string]: unknown;
}

const RESERVED = new Set(['params', 'priority', 'timeout_seconds', 'max_retries']);

const submitSchema = Joi.object<RawSubmit>({
  params: Joi.object().unknown(true).default({}),
  priority: Joi.number().integer().min(-1000).max(1000).default(SUBMIT_DEFAULTS.priority),
  timeout_seconds: Joi.number().integer().min(1).max(86_400).default(SUBMIT_DEFAULTS.timeout_seconds),
  max_retries: Joi.number().integer().min(0).max(100).default(SUBMIT_DEFAULTS.max_retries),
}).unknown(true);

/**
 * Validates a submission body. Top-level keys other than the reserved ones
 * (for example `proxy` or `user_agent`) are folded into params; a key set
 * inside `params` wins over the same key at the top level.
 */
export function parseSubmitRequest(body: unknown): SubmitRequest {
  const { value, error } = submitSchema.validate(body ?? {}, { abortEarly: false, convert: false });
  if (error) {
    throw new SubmissionError(
      `Invalid job request: ${error.message}`,
      'invalid_request',
      error.details.map((d) => d.message),
    );
  }

  const params: JsonObject = {};
  for (const [key, extra] of Object.entries(value)) {
    if (RESERVED.has(key) || extra === undefined) continue;
    if (!isJsonValue(extra)) {
      throw new SubmissionError(`Invalid job request: "${key}" is not JSON`, 'invalid_request');
    }
    params[key] = extra;
  }
  if (!isJsonObject(value.params)) {
    throw new SubmissionError('Invalid job request: "params" must be a JSON object', 'invalid_request');
  }
  Object.assign(params, value.params);

  return {
    params,
    priority: value.priority,
    timeout_seconds: value.timeout_seconds,
    max_retries: value.max_retries,
  };
}
