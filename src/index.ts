export { GluePythonJobHelper } from './pythonJobHelper.js';
export type { ConnectionFactory, ParsedModel, PythonJobHelper, PythonJobHelperOptions } from './pythonJobHelper.js';
export { StatementRunner } from './runner/statementRunner.js';
export type { RunnerConfig, StatementRunnerOptions } from './runner/statementRunner.js';
export { buildInstallStatement, mergePackages } from './runner/installStatement.js';
export { extractPackages, parseModelSource, DEFAULT_CONFIG_NAMESPACE } from './codeAnnotationScanner.js';
export type { ParseResult } from './codeAnnotationScanner.js';
export { createGlueSessionClient, STATEMENT_STATES } from './sessionClient.js';
export type { ISessionClient, StatementOutput, StatementSnapshot, StatementState } from './sessionClient.js';
export { createGlueConnection } from './glueConnection.js';
export type { GlueConnectionOptions, ISessionConnection } from './glueConnection.js';
export { glueCredentialsSchema, loadGlueCredentialsFromEnv, parseGlueCredentials } from './glueCredentials.js';
export type { GlueCredentials, GlueCredentialsInput } from './glueCredentials.js';
export { loadRuntimeSettings } from './config.js';
export type { RuntimeSettings } from './config.js';
export { createLogger, getLogLevel, LogLevel, setLogLevel } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
