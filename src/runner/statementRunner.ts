import { z } from 'zod';
import { now as systemNow, sleep as systemSleep, type Now, type Sleep } from '../clock.js';
import { extractPackages } from '../codeAnnotationScanner.js';
import {
  errorMessage,
  PythonModelError,
  StatementExecutionError,
  StatementTimeoutError,
  ValidationError,
  type ModelPhase,
} from '../errors.js';
import type { ISessionConnection } from '../glueConnection.js';
import { createLogger } from '../logger.js';
import type { ISessionClient, StatementOutput, StatementState } from '../sessionClient.js';
import { buildInstallStatement, mergePackages } from './installStatement.js';

const logger = createLogger('runner');

const runnerConfigSchema = z.object({
  timeoutSeconds: z.number().int().nonnegative(),
  pollIntervalSeconds: z.number().int().positive(),
});

export type RunnerConfig = Readonly<z.infer<typeof runnerConfigSchema>>;

export interface StatementRunnerOptions {
  now?: Now;
  sleep?: Sleep;
}

const FAILED_STATES: ReadonlySet<string> = new Set<StatementState>(['CANCELLED', 'ERROR']);

/**
 * Runs statements one at a time in a Glue session and waits for each to
 * finish. The remote statement is not cancelled when the local wait times out.
 */
export class StatementRunner {
  readonly config: RunnerConfig;
  private readonly now: Now;
  private readonly sleep: Sleep;

  constructor(private readonly client: ISessionClient, config: RunnerConfig, opts: StatementRunnerOptions = {}) {
    const parsed = runnerConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? 'invalid runner config', issue?.path.join('.'));
    }
    this.config = Object.freeze(parsed.data);
    this.now = opts.now ?? systemNow;
    this.sleep = opts.sleep ?? systemSleep;
  }

  async submit(sessionId: string, code: string): Promise<number> {
    const { id } = await this.client.runStatement(sessionId, code);
    logger.debug(`Submitted statement ${id} to session ${sessionId}`);
    return id;
  }

  async awaitCompletion(sessionId: string, statementId: number): Promise<StatementOutput> {
    const { timeoutSeconds, pollIntervalSeconds } = this.config;
    const timeoutMs = timeoutSeconds * 1000;
    const startTime = this.now();

    while (this.now() - startTime < timeoutMs) {
      const statement = await this.client.getStatement(sessionId, statementId);

      if (statement.state === 'AVAILABLE') {
        const output = statement.output ?? {};
        if ((output.status ?? '').toLowerCase() === 'error') {
          logger.debug(`Statement ${statementId} output:`, output);
          throw new StatementExecutionError(
            `Python model failed with error: ${output.errorName ?? ''}\n${output.errorValue ?? ''}\n${output.traceback ?? ''}`,
            statementId,
            {
              state: statement.state,
              errorName: output.errorName,
              errorValue: output.errorValue,
              traceback: output.traceback,
            }
          );
        }
        logger.debug(`Statement ${statementId} completed successfully. Output:`, output);
        return output;
      }

      if (FAILED_STATES.has(statement.state)) {
        throw new StatementExecutionError(
          `Statement execution failed with state: ${statement.state}`,
          statementId,
          { state: statement.state }
        );
      }

      await this.sleep(pollIntervalSeconds * 1000);
    }

    throw new StatementTimeoutError(statementId, timeoutSeconds);
  }

  async runStatement(sessionId: string, code: string): Promise<StatementOutput> {
    const statementId = await this.submit(sessionId, code);
    return this.awaitCompletion(sessionId, statementId);
  }

  /**
   * Installs the model's packages (declared plus those found inline in
   * `mainCode`), then runs `mainCode`. Installs share the session with the
   * model code, so they stay importable for it.
   *
   * The connection is closed exactly once whatever happens. Every failure is
   * rethrown as a {@link PythonModelError}. When both the model and the close
   * fail, the model's error is the one thrown.
   */
  async run(connection: ISessionConnection, mainCode: string, declaredPackages: readonly string[] = []): Promise<void> {
    let phase: ModelPhase = 'session';
    let failure: PythonModelError | undefined;
    try {
      const sessionId = await connection.open();
      logger.debug(`Using Glue session: ${sessionId}`);

      const packages = mergePackages(declaredPackages, extractPackages(mainCode));
      if (packages.length > 0) {
        phase = 'install';
        logger.debug('Installing packages:', packages);
        await this.runStatement(sessionId, buildInstallStatement(packages));
      }

      phase = 'model';
      await this.runStatement(sessionId, mainCode);
    } catch (e) {
      logger.error(`Python model failed during ${phase}`, e);
      failure = new PythonModelError(errorMessage(e), phase, e);
    }

    try {
      await connection.close();
    } catch (e) {
      logger.error('Failed to close Glue session', e);
      failure ??= new PythonModelError(errorMessage(e), 'session', e);
    }

    if (failure) throw failure;
  }
}
