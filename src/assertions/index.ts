export { parseAssertArgs } from './args.js';
export { runCommand, exitStatusOf, TIMEOUT_EXIT_STATUS, NOT_STARTED_EXIT_STATUS } from './command.js';
export { compare, unifiedDiff, type CompareOptions } from './compare.js';
export { runAssertion, DETAILS_MARKER, type AssertionRuntime } from './engine.js';
export { matchGlob, parseGlob, type GlobNode } from './glob.js';
export type { ChannelResult } from './types.js';
