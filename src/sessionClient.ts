import { GetStatementCommand, GlueClient, RunStatementCommand } from '@aws-sdk/client-glue';
import { z } from 'zod';
import { SessionClientError } from './errors.js';

export const STATEMENT_STATES = ['WAITING', 'RUNNING', 'AVAILABLE', 'CANCELLING', 'CANCELLED', 'ERROR'] as const;

export type StatementState = typeof STATEMENT_STATES[number];

export type StatementOutput = {
  status?: string;
  errorName?: string;
  errorValue?: string;
  traceback?: string;
  data?: string;
}

export type StatementSnapshot = {
  id: number;
  // one of STATEMENT_STATES, or a state newer than this list
  state: string;
  output?: StatementOutput;
}

export interface ISessionClient {
  runStatement(sessionId: string, code: string): Promise<{ id: number }>;
  getStatement(sessionId: string, statementId: number): Promise<StatementSnapshot>;
}

const GlueStatement = z.object({
  Id: z.number().optional(),
  State: z.string(),
  Output: z.object({
    Status: z.string().optional(),
    ErrorName: z.string().optional(),
    ErrorValue: z.string().optional(),
    Traceback: z.array(z.string()).optional(),
    Data: z.object({ TextPlain: z.string().optional() }).optional(),
  }).optional(),
});
type GlueStatement = z.infer<typeof GlueStatement>;

function toStatementOutput(output: NonNullable<GlueStatement['Output']>): StatementOutput {
  const result: StatementOutput = {};
  if (output.Status !== undefined) result.status = output.Status;
  if (output.ErrorName !== undefined) result.errorName = output.ErrorName;
  if (output.ErrorValue !== undefined) result.errorValue = output.ErrorValue;
  if (output.Traceback !== undefined) result.traceback = output.Traceback.join('\n');
  if (output.Data?.TextPlain !== undefined) result.data = output.Data.TextPlain;
  return result;
}

class AwsGlueSessionClient implements ISessionClient {
  constructor(private readonly glue: GlueClient) {}

  async runStatement(sessionId: string, code: string): Promise<{ id: number }> {
    const response = await this.glue.send(new RunStatementCommand({ SessionId: sessionId, Code: code }));
    if (response.Id === undefined) {
      throw new SessionClientError(`Glue returned no statement id for session ${sessionId}`);
    }
    return { id: response.Id };
  }

  async getStatement(sessionId: string, statementId: number): Promise<StatementSnapshot> {
    const response = await this.glue.send(new GetStatementCommand({ SessionId: sessionId, Id: statementId }));
    const parsed = GlueStatement.safeParse(response.Statement);
    if (!parsed.success) {
      throw new SessionClientError(
        `Glue returned an invalid statement ${statementId} for session ${sessionId}`,
        parsed.error
      );
    }
    const snapshot: StatementSnapshot = { id: parsed.data.Id ?? statementId, state: parsed.data.State };
    if (parsed.data.Output) snapshot.output = toStatementOutput(parsed.data.Output);
    return snapshot;
  }
}

export function createGlueSessionClient(glue: GlueClient): ISessionClient {
  return new AwsGlueSessionClient(glue);
}
