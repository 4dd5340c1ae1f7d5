import { describe, it, expect } from 'vitest';
import { PythonModelError, ValidationError } from '../errors.js';
import type { GlueCredentials } from '../glueCredentials.js';
import { GluePythonJobHelper } from '../pythonJobHelper.js';
import { buildInstallStatement } from '../runner/installStatement.js';
import { FakeConnection, FakeSessionClient, fakeClock, ok, running, type StatementStep } from './fakes.js';

const credentials = { roleArn: 'arn:aws:iam::123456789012:role/test-glue-role' };
const settings = { pollIntervalSeconds: 10, defaultTimeoutSeconds: 3600 };

const compiledCode = [
  'def model(dbt, session):',
  '    import pandas as pd',
  '    return pd.DataFrame({"id": [1, 2]})',
  '',
].join('\n');

function harness(script: (code: string) => StatementStep[]) {
  const client = new FakeSessionClient(script);
  const connections: FakeConnection[] = [];
  const seenCredentials: GlueCredentials[] = [];
  const clock = fakeClock();
  const connectionFactory = (c: GlueCredentials) => {
    seenCredentials.push(c);
    const connection = new FakeConnection(client);
    connections.push(connection);
    return connection;
  };
  return { client, connections, seenCredentials, clock, options: { connectionFactory, settings, now: clock.now, sleep: clock.sleep } };
}

describe('GluePythonJobHelper', () => {
  it('installs declared packages then runs the model', async () => {
    const { client, connections, seenCredentials, options } = harness(() => [running, ok]);
    const helper = new GluePythonJobHelper(
      { alias: 'orders', schema: 'analytics', config: { packages: ['pandas'] } },
      credentials,
      options
    );

    await expect(helper.submit(compiledCode)).resolves.toBeUndefined();

    expect(client.submitted).toEqual([buildInstallStatement(['pandas']), compiledCode]);
    expect(connections).toHaveLength(1);
    expect(connections[0]?.closeCalls).toBe(1);
    expect(seenCredentials[0]).toMatchObject({ roleArn: credentials.roleArn, region: 'us-east-1', workers: 5 });
  });

  it('exposes model settings', () => {
    const { options } = harness(() => [ok]);
    const helper = new GluePythonJobHelper(
      { alias: 'orders', schema: 'analytics', config: { packages: null, timeout: 120 } },
      credentials,
      options
    );

    expect(helper.identifier).toBe('orders');
    expect(helper.schema).toBe('analytics');
    expect(helper.packages).toEqual([]);
    expect(helper.timeoutSeconds).toBe(120);
    expect(helper.pollIntervalSeconds).toBe(10);
  });

  it('defaults the timeout to an hour when the model has no config', () => {
    const { options } = harness(() => [ok]);
    const helper = new GluePythonJobHelper({ alias: 'orders', schema: 'analytics' }, credentials, options);

    expect(helper.timeoutSeconds).toBe(3600);
  });

  it('rejects a model without an alias', () => {
    const { options } = harness(() => [ok]);
    expect(() => new GluePythonJobHelper({ schema: 'analytics' }, credentials, options)).toThrow(ValidationError);
  });

  it('rejects credentials without a role', () => {
    const { options } = harness(() => [ok]);
    expect(() => new GluePythonJobHelper({ alias: 'orders', schema: 'analytics' }, { roleArn: '' }, options))
      .toThrow(ValidationError);
  });

  it('fails with a runtime error when the model raises', async () => {
    const { client, connections, options } = harness(() => [{
      state: 'AVAILABLE',
      output: { status: 'error', errorName: 'KeyError', errorValue: "'id'", traceback: '' },
    }]);
    const helper = new GluePythonJobHelper({ alias: 'orders', schema: 'analytics' }, credentials, options);

    const error = await helper.submit(compiledCode).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PythonModelError);
    expect(error).toMatchObject({
      message: "Python model execution failed: Python model failed with error: KeyError\n'id'\n",
      phase: 'model',
    });
    expect(client.submitted).toEqual([compiledCode]);
    expect(connections[0]?.closeCalls).toBe(1);
  });

  it('times out after the model timeout', async () => {
    const { clock, options } = harness(() => [running]);
    const helper = new GluePythonJobHelper(
      { alias: 'orders', schema: 'analytics', config: { timeout: 60 } },
      credentials,
      options
    );

    await expect(helper.submit(compiledCode)).rejects.toThrow(
      'Python model execution failed: Timed out waiting for statement to complete'
    );
    expect(clock.elapsed()).toBe(60_000);
  });

  it('opens a fresh connection for every submit', async () => {
    const { connections, options } = harness(() => [ok]);
    const helper = new GluePythonJobHelper({ alias: 'orders', schema: 'analytics' }, credentials, options);

    await helper.submit(compiledCode);
    await helper.submit(compiledCode);

    expect(connections.map((c) => c.closeCalls)).toEqual([1, 1]);
  });
});
