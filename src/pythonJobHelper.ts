import { z } from 'zod';
import type { Now, Sleep } from './clock.js';
import { loadRuntimeSettings, type RuntimeSettings } from './config.js';
import { ValidationError } from './errors.js';
import { createGlueConnection, type ISessionConnection } from './glueConnection.js';
import { parseGlueCredentials, type GlueCredentials, type GlueCredentialsInput } from './glueCredentials.js';
import { StatementRunner } from './runner/statementRunner.js';

const parsedModelSchema = z.object({
  alias: z.string().min(1),
  schema: z.string().min(1),
  config: z.object({
    packages: z.array(z.string()).nullish(),
    timeout: z.number().int().nonnegative().optional(),
  }).passthrough().default({}),
}).passthrough();

export type ParsedModel = z.input<typeof parsedModelSchema>;

export type ConnectionFactory = (credentials: GlueCredentials) => ISessionConnection;

export interface PythonJobHelperOptions {
  connectionFactory?: ConnectionFactory;
  settings?: RuntimeSettings;
  now?: Now;
  sleep?: Sleep;
}

export interface PythonJobHelper {
  submit(compiledCode: string): Promise<void>;
}

/**
 * Runs a compiled Python model in a Glue interactive session.
 */
export class GluePythonJobHelper implements PythonJobHelper {
  readonly identifier: string;
  readonly schema: string;
  readonly packages: readonly string[];
  readonly timeoutSeconds: number;
  readonly pollIntervalSeconds: number;
  private readonly credentials: GlueCredentials;
  private readonly connectionFactory: ConnectionFactory;
  private readonly opts: PythonJobHelperOptions;

  constructor(parsedModel: unknown, credentials: GlueCredentials | GlueCredentialsInput, opts: PythonJobHelperOptions = {}) {
    const parsed = parsedModelSchema.safeParse(parsedModel);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? 'invalid model', issue?.path.join('.'));
    }
    const settings = opts.settings ?? loadRuntimeSettings();

    this.credentials = parseGlueCredentials(credentials);
    this.identifier = parsed.data.alias;
    this.schema = parsed.data.schema;
    this.packages = parsed.data.config.packages ?? [];
    this.timeoutSeconds = parsed.data.config.timeout ?? settings.defaultTimeoutSeconds;
    this.pollIntervalSeconds = settings.pollIntervalSeconds;
    this.connectionFactory = opts.connectionFactory ?? ((c) => createGlueConnection(c));
    this.opts = opts;
  }

  async submit(compiledCode: string): Promise<void> {
    const connection = this.connectionFactory(this.credentials);
    const runner = new StatementRunner(
      connection.client,
      { timeoutSeconds: this.timeoutSeconds, pollIntervalSeconds: this.pollIntervalSeconds },
      { now: this.opts.now, sleep: this.opts.sleep }
    );
    await runner.run(connection, compiledCode, this.packages);
  }
}
