import type { Channel } from '../types/index.js';

export interface ChannelResult {
  channel: Channel;
  passed: boolean;
  /** Captured value (exit status as text) */
  actual: string;
  /** Diff or message describing the mismatch */
  mismatch?: string;
}
