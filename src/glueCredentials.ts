import { WorkerType } from '@aws-sdk/client-glue';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export const glueCredentialsSchema = z.object({
  roleArn: z.string().min(1),
  region: z.string().min(1).default('us-east-1'),
  workers: z.number().int().positive().default(5),
  workerType: z.nativeEnum(WorkerType).default(WorkerType.G_1X),
  glueVersion: z.string().default('4.0'),
  // minutes
  idleTimeout: z.number().int().positive().default(10),
  sessionProvisioningTimeoutInSeconds: z.number().int().positive().default(120),
  sessionId: z.string().min(1).optional(),
  glueSessionReuse: z.boolean().default(false),
  defaultArguments: z.record(z.string()).optional(),
  extraPyFiles: z.string().optional(),
  tags: z.record(z.string()).optional(),
  securityConfiguration: z.string().optional(),
  connections: z.array(z.string()).optional(),
});

export type GlueCredentials = z.infer<typeof glueCredentialsSchema>;
export type GlueCredentialsInput = z.input<typeof glueCredentialsSchema>;

export function parseGlueCredentials(input: unknown): GlueCredentials {
  const parsed = glueCredentialsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'invalid credentials', issue?.path.join('.'));
  }
  return parsed.data;
}

function optionalInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function loadGlueCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): GlueCredentials {
  return parseGlueCredentials({
    roleArn: env.GLUE_ROLE_ARN,
    region: env.AWS_REGION || undefined,
    workers: optionalInt(env.GLUE_WORKERS),
    workerType: env.GLUE_WORKER_TYPE || undefined,
    glueVersion: env.GLUE_VERSION || undefined,
    sessionId: env.GLUE_SESSION_ID || undefined,
    glueSessionReuse: env.GLUE_SESSION_REUSE ? env.GLUE_SESSION_REUSE === 'true' : undefined,
  });
}
