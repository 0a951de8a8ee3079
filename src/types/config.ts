import { delimiter } from "node:path";
import { z } from "zod";

export const DEFAULT_FUNCTION_PATTERN = "test_*";
export const DEFAULT_CAPTURE_NAME = "test";

// Pretest hook: a command run by the driver before each script
const HookSchema = z.object({
  cmd: z.array(z.string()).min(1),
  timeout_ms: z.number().int().positive().optional(),
  env: z.record(z.string()).optional(),
}).strict();

// Channels ignored unless an assertion sets an expectation for them
const IgnoreSchema = z.object({
  stdout: z.boolean().optional(),
  stderr: z.boolean().optional(),
  exit_status: z.boolean().optional(),
}).strict();

export const ProjectConfigSchema = z.object({
  version: z.string().default("1.0"),
  scripts: z.union([z.string(), z.array(z.string())]).optional(),
  function_pattern: z.string().min(1).optional(),
  out_dir: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  timeout_ms: z.number().int().positive().optional(),
  preload: z.array(z.string()).optional(),
  ignore: IgnoreSchema.optional(),
  hooks: z.array(HookSchema).optional(),
}).strict();

// Environment values: unset and empty are the same thing
const blankToUndefined = (value: unknown) => (value === "" ? undefined : value);

const EnvFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && value !== "" && value !== "0" && value.toLowerCase() !== "false");

const EnvString = z.preprocess(blankToUndefined, z.string().optional());

const envList = (separator: string | RegExp) =>
  z
    .string()
    .optional()
    .transform((value) => (value ? value.split(separator).filter((item) => item !== "") : []));

/**
 * Configuration a test script's process reads from its environment.
 * The driver sets these explicitly; a script run by hand may set them too.
 */
export const ScriptEnvSchema = z.object({
  TEST_DEBUG: EnvFlag,
  TEST_OUT_DIR: EnvString,
  TEST_NAME: EnvString,
  TEST_IGNORE_STDOUT: EnvFlag,
  TEST_IGNORE_STDERR: EnvFlag,
  TEST_IGNORE_STATUS: EnvFlag,
  TEST_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  TEST_FUNC_PATTERN: z.preprocess(blankToUndefined, z.string().default(DEFAULT_FUNCTION_PATTERN)),
  TEST_INCLUDE_SUBTESTS: envList(/\s+/),
  TEST_PRELOAD: envList(delimiter),
  TEST_SOURCE_PATH: EnvString,
  TEST_SOURCE_DIR: EnvString,
  TEST_LIST_ONLY: EnvFlag,
});

export type Hook = z.infer<typeof HookSchema>;
export type IgnoreDefaults = z.infer<typeof IgnoreSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ScriptEnv = z.infer<typeof ScriptEnvSchema>;
