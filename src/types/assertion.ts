/** Output channel of a command: stdout, stderr or exit status */
export type Channel = "out" | "err" | "ret";

/** Order in which an assertion checks its channels */
export const CHANNEL_ORDER: readonly Channel[] = ["ret", "out", "err"];

export const CHANNEL_LABELS: Record<Channel, string> = {
  out: "stdout",
  err: "stderr",
  ret: "exit status",
};

export type CompareMode = "exact" | "pattern" | "ignore";

export type ValueSource =
  | { kind: "default" }
  | { kind: "literal"; value: string }
  | { kind: "file"; path: string };

export interface ExpectedValue {
  mode: CompareMode;
  source: ValueSource;
  /** Compare trailing newlines too instead of trimming them */
  preserveNewlines: boolean;
}

/** A parsed `assert` call */
export interface AssertOptions {
  description: string;
  expected: Record<Channel, ExpectedValue>;
  preserveNewlines: boolean;
  /** Return the failed channel count instead of 0 */
  failOnError: boolean;
  command: string[];
}

/** Artifact files holding one invocation's captured channels */
export interface CaptureFiles {
  stdoutPath: string;
  stderrPath: string;
  statusPath: string;
}

export interface AssertionVerdict {
  description: string;
  passed: boolean;
  failedChannels: Channel[];
  exitStatus: number;
  files: CaptureFiles;
}
