/**
 * @fileoverview Bottom-line message bar
 *
 * Shows a posted message for a while, then cycles through usage tips. The bar
 * is driven by `tick(now)` from the UI's timer; it owns no timer itself.
 */

export type MessageSeverity = 'normal' | 'warning' | 'error';

export interface BarMessage {
  text: string;
  severity: MessageSeverity | 'tip';
}

export interface MessageBarOptions {
  clock?: () => number;
  tips?: readonly string[];
  /** Delay before the first tip replaces the welcome line (default: 1000) */
  initialDelayMs?: number;
  /** Default display time for posted messages (default: 3000) */
  postDurationMs?: number;
  /** Display time per tip (default: 5000) */
  tipDurationMs?: number;
}

export const DEFAULT_TIPS: readonly string[] = [
  'Use ctrl+c to exit the program with all files untouched.',
  'Use ctrl+w to write the selected entries to the target file.',
  'Press @ to open the highlighted entry in the system browser.',
  'Use up (or ctrl+p or k) and down (or ctrl+n or j) to navigate the search results.',
  'Use alt+n to toggle the n-th source, alt+0 to hide all and alt+a to show all.',
  'Press enter to switch between the search box and the results.',
];

const SEVERITY_LABELS: Record<MessageSeverity, string> = {
  normal: 'Message',
  warning: 'Warning',
  error: 'Error',
};

export class MessageBar {
  private readonly clock: () => number;
  private readonly tips: readonly string[];
  private readonly postDurationMs: number;
  private readonly tipDurationMs: number;
  private message: BarMessage = { text: 'Welcome to bibsearch.', severity: 'normal' };
  private nextChangeAt: number;
  private tipIndex = 0;

  constructor(options: MessageBarOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.tips = options.tips ?? DEFAULT_TIPS;
    this.postDurationMs = options.postDurationMs ?? 3000;
    this.tipDurationMs = options.tipDurationMs ?? 5000;
    this.nextChangeAt = this.clock() + (options.initialDelayMs ?? 1000);
  }

  current(): BarMessage {
    return this.message;
  }

  /** Rendered line, e.g. `Warning: no URL`. */
  text(): string {
    const { text, severity } = this.message;
    if (severity === 'tip') return `Tip: ${text}`;
    return `${SEVERITY_LABELS[severity]}: ${text}`;
  }

  post(text: string, severity: MessageSeverity = 'normal', durationMs: number = this.postDurationMs): void {
    this.message = { text, severity };
    this.nextChangeAt = this.clock() + durationMs;
  }

  /** Advance to the next tip once the current message has expired. Returns whether the bar changed. */
  tick(now: number = this.clock()): boolean {
    if (now < this.nextChangeAt || this.tips.length === 0) return false;
    const tip = this.tips[this.tipIndex % this.tips.length] ?? '';
    this.tipIndex += 1;
    this.message = { text: tip, severity: 'tip' };
    this.nextChangeAt = now + this.tipDurationMs;
    return true;
  }
}
