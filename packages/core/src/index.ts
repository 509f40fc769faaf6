/**
 * @nstest/core - test execution engine
 */
export * from "./types.js";
export * from "./errors.js";
export {
  DEFAULT_REPORTER,
  createEnvironment,
  emptyCounters,
  setCurrent,
  getCurrent,
  hasCurrent,
  clearCurrent,
  getAndClearCurrent,
  updateCurrent,
  updateCurrentIn,
  incReportCounter,
  testingContextsStr,
  testingVarsStr,
  testName,
  testing,
} from "./env.js";
export type { RunEnvironment, EnvironmentOptions } from "./env.js";
export {
  report,
  defineReportMethod,
  defineDefaultReportMethod,
  removeReporter,
  isCounterEvent,
  fileAndLine,
} from "./report.js";
export type { ReportHandler, SourceLocation } from "./report.js";
export { BlockRunner, runBlock, runAsResult, startBlock, completionResult } from "./scheduler.js";
export type { RunnerState, RunBlockOptions, BlockCompletion } from "./scheduler.js";
export { testVarBlock, testVar, invokeBody, fromPromise, reportThrown, UNCAUGHT_MESSAGE } from "./test-var.js";
export {
  FIXTURE_KINDS,
  defaultFixture,
  composeFixtures,
  joinFixtures,
  afterResult,
  executionStrategy,
  fixtureBlock,
  DROPPED_ASYNC_MESSAGE,
} from "./fixtures.js";
export type { ExecutionStrategy } from "./fixtures.js";
export {
  defineNamespace,
  findNamespace,
  requireNamespace,
  allNamespaces,
  removeNamespace,
  sortedTests,
  NamespaceBuilder,
} from "./registry.js";
export type { NamespaceDef, TestFn, DeftestOptions } from "./registry.js";
export {
  mergeCounters,
  successful,
  testVarsBlock,
  testVars,
  testAllVarsBlock,
  testAllVars,
  testNsBlock,
  testNs,
  runTestsBlock,
  runTests,
  runAllTests,
} from "./run.js";
export {
  resolveConfig,
  loadConfig,
  parseConfig,
  selectNamespaces,
  environmentFromConfig,
  loggerFromConfig,
  DEFAULT_CONFIG,
  PROJECT_CONFIG_FILE,
} from "./config.js";
export type { RunnerConfig, ResolvedConfig } from "./config.js";
export { createLogger, getLogger, setLogger, resetLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel, DestinationStream } from "./logger.js";
export { createRecordingReporter } from "./recording.js";
export type { RecordingReporter } from "./recording.js";
