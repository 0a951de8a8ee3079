/**
 * Library entry: the API test scripts use (`testScript`, `TestContext`) and
 * the engine behind the `cmdprobe` CLI.
 */
export { testScript, type TestContext, type TestFunction, type TestOutcome, type AssertWithOptions } from './runner/index.js';
export {
  Accounting,
  runAll,
  runScript,
  type DriverOptions,
  type InclusionFilter,
  type RunAllResult,
  type ScriptResult,
} from './runner/index.js';
export { compare, matchGlob, parseAssertArgs, runAssertion } from './assertions/index.js';
export { allocateCapture, getCaptureFiles } from './capture/index.js';
export { loadConfig, findTestScripts } from './config/index.js';
export { HarnessError, UsageError, InternalError, ConfigError, HookError } from './errors.js';
export type * from './types/index.js';
