import { z } from 'zod';
import { ValidationError } from './errors.js';

const DEFAULT_POLL_INTERVAL_SECONDS = 10;
const DEFAULT_STATEMENT_TIMEOUT_SECONDS = 60 * 60;

const runtimeSettingsSchema = z.object({
  GLUE_STATEMENT_POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_POLL_INTERVAL_SECONDS),
  GLUE_STATEMENT_TIMEOUT_SECONDS: z.coerce.number().int().nonnegative().default(DEFAULT_STATEMENT_TIMEOUT_SECONDS),
});

export type RuntimeSettings = {
  pollIntervalSeconds: number;
  defaultTimeoutSeconds: number;
};

// empty strings count as unset
function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const parsed = runtimeSettingsSchema.safeParse(definedOnly(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'invalid value', issue?.path.join('.'));
  }
  return {
    pollIntervalSeconds: parsed.data.GLUE_STATEMENT_POLL_INTERVAL_SECONDS,
    defaultTimeoutSeconds: parsed.data.GLUE_STATEMENT_TIMEOUT_SECONDS,
  };
}
