export { executeHook, executeHooks, type HookResult, type ExecuteHookOptions, type ExecuteHooksOptions } from './executor.js';
