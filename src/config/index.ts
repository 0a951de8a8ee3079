export { loadConfig, findConfigFile, CONFIG_FILENAME, type LoadConfigOptions, type LoadConfigResult } from './loader.js';
export { loadScriptEnv } from './env.js';
export { findTestScripts, DEFAULT_SCRIPT_PATTERNS } from './scripts.js';
export { interpolate, type Variables } from './interpolate.js';
