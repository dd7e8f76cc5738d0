/**
 * @fileoverview Raw-mode terminal front end
 *
 * Reads keypresses from a TTY, maps them to actions and repaints the whole
 * screen once per RedrawSignal wake. All state the background workers touch
 * lives in the coordinator; this class only owns the search text, the focus
 * and the cursor.
 */

import { emitKeypressEvents } from 'node:readline';
import type { SearchCoordinator } from '../coordinator/search_coordinator.js';
import type { BibRecord } from '../records/bib_record.js';
import { logDebug, logError } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { openInBrowser, type UrlOpener } from './browser.js';
import { resolveAction, type Focus, type KeyInput, type UiAction } from './keymap.js';
import { MessageBar } from './message_bar.js';
import { clampCursor, renderScreen, type ScreenModel, type ScreenSize } from './screen.js';

export type ExitReason = 'commit' | 'quit';

export interface TerminalAppOptions {
  coordinator: SearchCoordinator;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  messageBar?: MessageBar;
  opener?: UrlOpener;
  /** Config file shown under the source list */
  configSource?: string;
  /** Message bar refresh period in ms (default: 1000) */
  tickMs?: number;
}

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?25h\x1b[?1049l';
const HOME_AND_CLEAR = '\x1b[H\x1b[2J';

export class TerminalApp {
  private readonly coordinator: SearchCoordinator;
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;
  private readonly opener: UrlOpener;
  private readonly configSource?: string;
  private readonly tickMs: number;
  readonly messageBar: MessageBar;

  private query = '';
  private focus: Focus = 'search';
  private cursor = 0;
  private exitReason: ExitReason | null = null;
  private committing = false;

  constructor(options: TerminalAppOptions) {
    this.coordinator = options.coordinator;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.messageBar = options.messageBar ?? new MessageBar();
    this.opener = options.opener ?? openInBrowser;
    this.configSource = options.configSource;
    this.tickMs = options.tickMs ?? 1000;
  }

  get exited(): ExitReason | null {
    return this.exitReason;
  }

  /** Snapshot of everything the screen shows. */
  model(): ScreenModel {
    const results = this.coordinator.visibleResults();
    return {
      query: this.query,
      focus: this.focus,
      cursor: clampCursor(this.cursor, results.length),
      results,
      sources: this.coordinator.sources.map((slot) => ({
        label: slot.label,
        origin: slot.source.origin,
        enabled: slot.enabled,
        status: slot.status.get(),
        access: slot.access,
      })),
      selection: this.coordinator.selection.records(),
      message: this.messageBar.text(),
      configSource: this.configSource,
    };
  }

  render(size: ScreenSize): string[] {
    return renderScreen(this.model(), size);
  }

  async handleAction(action: UiAction): Promise<void> {
    if (this.exitReason || this.committing) return;

    switch (action.type) {
      case 'insert':
        this.updateQuery(this.query + action.text);
        return;
      case 'backspace':
        this.updateQuery(this.query.slice(0, -1));
        return;
      case 'clear':
        this.updateQuery('');
        return;
      case 'move': {
        const count = this.coordinator.visibleResults().length;
        this.cursor = clampCursor(clampCursor(this.cursor, count) + action.delta, count);
        this.coordinator.redraw.request();
        return;
      }
      case 'toggle-selection': {
        const record = this.highlighted();
        if (record) this.coordinator.toggle(record);
        return;
      }
      case 'switch-focus':
        this.focus = this.focus === 'search' ? 'results' : 'search';
        this.coordinator.redraw.request();
        return;
      case 'toggle-source':
        if (!this.coordinator.toggleEnabled(action.index)) {
          this.post(`There is no source ${action.index + 1}.`, 'warning');
        }
        return;
      case 'all-sources':
        this.coordinator.setAllEnabled(action.enabled);
        return;
      case 'open-url':
        await this.openHighlighted();
        return;
      case 'commit': {
        this.committing = true;
        const report = await this.coordinator.commit();
        logDebug('Commit finished', { written: report.written, failures: report.failures.length });
        this.finish('commit');
        return;
      }
      case 'quit':
        this.finish('quit');
        return;
    }
  }

  /**
   * Take over the terminal until the user commits or quits. The coordinator
   * is started here and closed on the way out.
   */
  async run(): Promise<ExitReason> {
    const onKeypress = (sequence: string | undefined, key: KeyInput | undefined): void => {
      const action = resolveAction(key ?? { sequence }, this.focus);
      if (!action) return;
      void this.handleAction(action).catch((error: unknown) => {
        logError('Key handler failed', { action: action.type, error: getErrorMessage(error) });
        this.post(getErrorMessage(error), 'error');
      });
    };
    const onResize = (): void => this.coordinator.redraw.request();

    emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.input.on('keypress', onKeypress);
    this.output.on('resize', onResize);
    this.input.resume();
    this.output.write(ENTER_ALT_SCREEN);

    const timer = setInterval(() => {
      if (this.messageBar.tick()) this.coordinator.redraw.request();
    }, this.tickMs);

    try {
      this.coordinator.start();
      this.coordinator.redraw.request();
      while (await this.coordinator.redraw.next()) {
        this.paint();
      }
    } finally {
      clearInterval(timer);
      this.input.off('keypress', onKeypress);
      this.output.off('resize', onResize);
      if (this.input.isTTY) this.input.setRawMode(false);
      this.input.pause();
      this.output.write(LEAVE_ALT_SCREEN);
      this.coordinator.close();
    }
    return this.exitReason ?? 'quit';
  }

  private paint(): void {
    const lines = this.render({ columns: this.output.columns || 80, rows: this.output.rows || 24 });
    this.output.write(HOME_AND_CLEAR + lines.join('\r\n'));
  }

  private updateQuery(query: string): void {
    this.query = query;
    this.cursor = 0;
    this.coordinator.search(query);
  }

  private highlighted(): BibRecord | undefined {
    const results = this.coordinator.visibleResults();
    return results[clampCursor(this.cursor, results.length)];
  }

  private async openHighlighted(): Promise<void> {
    const record = this.highlighted();
    if (!record) return;
    if (!record.url) {
      this.post('Could not infer the URL of this entry.', 'warning');
      return;
    }
    const result = await this.opener(record.url);
    if (result.ok) {
      this.post(`Opened URL '${record.url}'.`, 'normal');
    } else {
      this.post(`Could not open URL '${record.url}' (${result.detail}).`, 'error');
    }
  }

  private post(message: string, severity: 'normal' | 'warning' | 'error'): void {
    this.messageBar.post(message, severity);
    this.coordinator.redraw.request();
  }

  private finish(reason: ExitReason): void {
    this.exitReason = reason;
    this.coordinator.redraw.close();
  }
}
