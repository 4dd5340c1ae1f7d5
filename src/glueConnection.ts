import {
  CreateSessionCommand,
  GetSessionCommand,
  GlueClient,
  StopSessionCommand,
  type CreateSessionCommandInput,
} from '@aws-sdk/client-glue';
import { randomUUID } from 'node:crypto';
import { now as systemNow, sleep as systemSleep, type Now, type Sleep } from './clock.js';
import { errorMessage, SessionError } from './errors.js';
import type { GlueCredentials } from './glueCredentials.js';
import { createLogger } from './logger.js';
import { createGlueSessionClient, type ISessionClient } from './sessionClient.js';

const logger = createLogger('session');

const SESSION_POLL_INTERVAL_MS = 1000;
const FAILED_SESSION_STATES = new Set(['FAILED', 'STOPPED', 'TIMEOUT']);

/**
 * Scoped access to one Glue interactive session. `open` acquires (or reuses)
 * the session and returns its id; `close` releases it.
 */
export interface ISessionConnection {
  readonly client: ISessionClient;
  readonly sessionId: string | undefined;
  open(): Promise<string>;
  close(): Promise<void>;
}

export interface GlueConnectionOptions {
  glue?: GlueClient;
  now?: Now;
  sleep?: Sleep;
}

class AwsGlueConnection implements ISessionConnection {
  readonly client: ISessionClient;
  private readonly glue: GlueClient;
  private readonly now: Now;
  private readonly sleep: Sleep;
  private currentSessionId: string | undefined;
  private ownsSession = false;

  constructor(private readonly credentials: GlueCredentials, opts: GlueConnectionOptions = {}) {
    this.glue = opts.glue ?? new GlueClient({ region: credentials.region });
    this.now = opts.now ?? systemNow;
    this.sleep = opts.sleep ?? systemSleep;
    this.client = createGlueSessionClient(this.glue);
  }

  get sessionId(): string | undefined {
    return this.currentSessionId;
  }

  async open(): Promise<string> {
    if (this.currentSessionId) return this.currentSessionId;

    const existing = this.credentials.sessionId;
    if (existing && await this.isReady(existing)) {
      logger.debug(`Reusing Glue session ${existing}`);
      this.currentSessionId = existing;
      this.ownsSession = false;
      return existing;
    }

    const sessionId = `glue-python-${randomUUID()}`;
    logger.info(`Creating Glue session ${sessionId}`);
    await this.glue.send(new CreateSessionCommand(this.createSessionInput(sessionId)));
    try {
      await this.waitForReady(sessionId);
    } catch (e) {
      await this.stopSession(sessionId);
      throw e;
    }
    this.currentSessionId = sessionId;
    this.ownsSession = true;
    return sessionId;
  }

  /**
   * Sessions this connection created are always stopped. A reused configured
   * session is left running when `glueSessionReuse` is set.
   */
  async close(): Promise<void> {
    const sessionId = this.currentSessionId;
    if (!sessionId) return;
    this.currentSessionId = undefined;
    if (!this.ownsSession && this.credentials.glueSessionReuse) {
      logger.debug(`Leaving Glue session ${sessionId} open for reuse`);
      return;
    }
    logger.debug(`Stopping Glue session ${sessionId}`);
    await this.glue.send(new StopSessionCommand({ Id: sessionId }));
  }

  // failures are logged, not thrown
  private async stopSession(sessionId: string): Promise<void> {
    try {
      await this.glue.send(new StopSessionCommand({ Id: sessionId }));
    } catch (e) {
      logger.error(`Failed to stop Glue session ${sessionId}`, e);
    }
  }

  private createSessionInput(sessionId: string): CreateSessionCommandInput {
    const { credentials } = this;
    const defaultArguments: Record<string, string> = { ...credentials.defaultArguments };
    if (credentials.extraPyFiles) {
      defaultArguments['--extra-py-files'] = credentials.extraPyFiles;
    }
    const input: CreateSessionCommandInput = {
      Id: sessionId,
      Role: credentials.roleArn,
      Command: { Name: 'glueetl', PythonVersion: '3' },
      GlueVersion: credentials.glueVersion,
      NumberOfWorkers: credentials.workers,
      WorkerType: credentials.workerType,
      IdleTimeout: credentials.idleTimeout,
      DefaultArguments: defaultArguments,
    };
    if (credentials.tags) input.Tags = credentials.tags;
    if (credentials.securityConfiguration) input.SecurityConfiguration = credentials.securityConfiguration;
    if (credentials.connections?.length) input.Connections = { Connections: credentials.connections };
    return input;
  }

  private async isReady(sessionId: string): Promise<boolean> {
    try {
      const response = await this.glue.send(new GetSessionCommand({ Id: sessionId }));
      return response.Session?.Status === 'READY';
    } catch (e) {
      logger.warning(`Cannot reuse Glue session ${sessionId}: ${errorMessage(e)}`);
      return false;
    }
  }

  private async waitForReady(sessionId: string): Promise<void> {
    const timeoutMs = this.credentials.sessionProvisioningTimeoutInSeconds * 1000;
    const startTime = this.now();
    while (this.now() - startTime < timeoutMs) {
      const response = await this.glue.send(new GetSessionCommand({ Id: sessionId }));
      const status = response.Session?.Status;
      if (status === 'READY') {
        logger.debug(`Glue session ${sessionId} is ready`);
        return;
      }
      if (status && FAILED_SESSION_STATES.has(status)) {
        const reason = response.Session?.ErrorMessage;
        throw new SessionError(
          `Glue session ${sessionId} is ${status}${reason ? `: ${reason}` : ''}`,
          sessionId
        );
      }
      await this.sleep(SESSION_POLL_INTERVAL_MS);
    }
    throw new SessionError(
      `Glue session ${sessionId} was not ready after ${this.credentials.sessionProvisioningTimeoutInSeconds} seconds`,
      sessionId
    );
  }
}

export function createGlueConnection(credentials: GlueCredentials, opts: GlueConnectionOptions = {}): ISessionConnection {
  return new AwsGlueConnection(credentials, opts);
}
