/**
 * @fileoverview Key bindings
 *
 * Maps a `node:readline` keypress to a UI action. Global bindings (exit,
 * commit, source toggles, focus switch) apply whichever pane has focus; the
 * rest depend on it.
 */

export type Focus = 'search' | 'results';

/** Shape of the key object `readline.emitKeypressEvents` delivers. */
export interface KeyInput {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type UiAction =
  | { type: 'insert'; text: string }
  | { type: 'backspace' }
  | { type: 'clear' }
  | { type: 'move'; delta: number }
  | { type: 'toggle-selection' }
  | { type: 'switch-focus' }
  | { type: 'toggle-source'; index: number }
  | { type: 'all-sources'; enabled: boolean }
  | { type: 'open-url' }
  | { type: 'commit' }
  | { type: 'quit' };

const PAGE = 10;

function globalAction(key: KeyInput): UiAction | null {
  if (key.ctrl && key.name === 'c') return { type: 'quit' };
  if (key.ctrl && key.name === 'w') return { type: 'commit' };
  if (key.name === 'return' || key.name === 'enter') return { type: 'switch-focus' };

  if (key.meta && !key.ctrl) {
    const name = key.name ?? key.sequence?.slice(-1);
    if (name === '0') return { type: 'all-sources', enabled: false };
    if (name === 'a' || name === '~') return { type: 'all-sources', enabled: true };
    if (name !== undefined && /^[1-9]$/.test(name)) {
      return { type: 'toggle-source', index: Number(name) - 1 };
    }
  }
  return null;
}

function searchAction(key: KeyInput): UiAction | null {
  if (key.name === 'backspace') return { type: 'backspace' };
  if (key.ctrl && key.name === 'u') return { type: 'clear' };
  if (key.ctrl || key.meta) return null;
  const text = key.sequence;
  if (text !== undefined && text.length === 1 && text >= ' ' && text !== '\x7f') {
    return { type: 'insert', text };
  }
  return null;
}

function resultsAction(key: KeyInput): UiAction | null {
  if (key.name === 'up' || key.name === 'k' || (key.ctrl && key.name === 'p')) return { type: 'move', delta: -1 };
  if (key.name === 'down' || key.name === 'j' || (key.ctrl && key.name === 'n')) return { type: 'move', delta: 1 };
  if (key.name === 'pageup') return { type: 'move', delta: -PAGE };
  if (key.name === 'pagedown') return { type: 'move', delta: PAGE };
  if (key.ctrl || key.meta) return null;
  if (key.name === 'space' || key.sequence === ' ') return { type: 'toggle-selection' };
  if (key.sequence === '@') return { type: 'open-url' };
  return null;
}

/** Resolve a keypress, or `null` when it is not bound in the current focus. */
export function resolveAction(key: KeyInput, focus: Focus): UiAction | null {
  return globalAction(key) ?? (focus === 'search' ? searchAction(key) : resultsAction(key));
}
