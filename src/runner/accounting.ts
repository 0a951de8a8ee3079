import { InternalError } from '../errors.js';

/** Writes one report line (no trailing newline) */
export type ReportWriter = (line: string) => void;

export interface LevelCounts {
  /** Ordinal of the last entry recorded at this level */
  index: number;
  passed: number;
  failed: number;
}

interface LevelFrame extends LevelCounts {
  name?: string;
}

const INDENT = '  ';

function label(name: string | undefined): string {
  return name ? ` - ${name}` : '';
}

/**
 * Pass/fail bookkeeping for nested test levels.
 *
 * The root counts (depth 0) are the script result; each `enter` pushes a frame
 * whose verdict is folded into its parent by the matching `exit`. Lines are
 * indented by the depth at which they are printed:
 *
 *   # Subtest 1 - test_echo
 *     ok 1 - exit status
 *     # 1 PASSED, 0 FAILED
 *   ok 1 - test_echo
 */
export class Accounting {
  private readonly root: LevelCounts = { index: 0, passed: 0, failed: 0 };
  private readonly stack: LevelFrame[] = [];

  constructor(private readonly write: ReportWriter) {}

  get depth(): number {
    return this.stack.length;
  }

  /** Counts of the outermost level */
  get totals(): Readonly<LevelCounts> {
    return { ...this.root };
  }

  private get current(): LevelCounts {
    return this.stack[this.stack.length - 1] ?? this.root;
  }

  enter(name?: string): void {
    this.note(`Subtest ${this.current.index + 1}${label(name)}`);
    this.stack.push({ name, index: 0, passed: 0, failed: 0 });
  }

  record(name: string | undefined, passed: boolean): boolean {
    const level = this.current;
    level.index++;
    if (passed) {
      level.passed++;
    } else {
      level.failed++;
    }
    this.print(`${passed ? 'ok' : 'not ok'} ${level.index}${label(name)}`);
    return passed;
  }

  /**
   * Close the innermost level and record its verdict in the parent.
   * Returns the verdict.
   */
  exit(): boolean {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      throw new InternalError('Subtest stack underflow');
    }
    this.note(`${frame.passed} PASSED, ${frame.failed} FAILED`);
    this.stack.pop();

    const passed = this.record(frame.name, frame.failed === 0);
    this.print('');
    return passed;
  }

  /**
   * Run `body` inside a level that is closed on every exit path
   */
  async scope<T>(name: string | undefined, body: () => Promise<T>): Promise<{ result: T; passed: boolean }> {
    this.enter(name);
    let passed = false;
    let result: T;
    try {
      result = await body();
    } finally {
      passed = this.exit();
    }
    return { result, passed };
  }

  /**
   * Write a `#` comment, optionally indented further by `level` steps
   */
  note(text: string, level = 0): void {
    const prefix = `# ${INDENT.repeat(level)}`;
    for (const line of text.split('\n')) {
      this.print(line === '' ? '#' : `${prefix}${line}`);
    }
  }

  private print(line: string): void {
    this.write(line === '' ? '' : `${INDENT.repeat(this.depth)}${line}`);
  }
}
