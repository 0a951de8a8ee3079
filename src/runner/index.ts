export { Accounting, type LevelCounts, type ReportWriter } from './accounting.js';
export { ScriptContext, ignoreDefaultsFromEnv, type TestContext, type AssertWithOptions, type ScriptContextOptions } from './context.js';
export {
  runScript,
  runAll,
  buildChildEnv,
  detailFiles,
  includedFunctions,
  type DriverOptions,
  type InclusionFilter,
  type RunAllResult,
  type ScriptResult,
} from './driver.js';
export { runLevel } from './level.js';
export {
  registry,
  testScript,
  toSourcePath,
  TestRegistry,
  type ScriptRegistrar,
  type TestEntry,
  type TestFunction,
  type TestOutcome,
} from './registry.js';
export { runScriptTests, selectTests, type RunScriptTestsOptions } from './script.js';
export { tee, TailBuffer, MAX_CAPTURE_BYTES, type ChunkSink } from './tee.js';
