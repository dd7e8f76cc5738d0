import { describe, expect, it } from 'vitest';
import { StatusTransitionError } from '../../core/errors.js';
import { StatusCell, canTransition, statusLabel } from '../status_cell.js';

describe('StatusCell', () => {
  it('starts initialized and follows the load path to ready', () => {
    const cell = new StatusCell('refs/*.bib');

    cell.set('loading');
    cell.set('ready');
    cell.set('searching');
    cell.set('ready');

    expect(cell.get()).toBe('ready');
    expect(cell.transitions()).toEqual(['initialized', 'loading', 'ready', 'searching', 'ready']);
  });

  it('rejects a transition the state machine does not allow', () => {
    const cell = new StatusCell('refs/*.bib');

    expect(() => cell.set('ready')).toThrow(StatusTransitionError);
    expect(cell.get()).toBe('initialized');
  });

  it('keeps no_file terminal', () => {
    const cell = new StatusCell('missing/*.bib');
    cell.set('loading');
    cell.set('no_file');

    expect(() => cell.set('searching')).toThrow('Illegal status transition for missing/*.bib: no_file -> searching');
    expect(() => cell.set('loading')).toThrow(StatusTransitionError);
    expect(cell.get()).toBe('no_file');
  });

  it('caps the recorded history', () => {
    const cell = new StatusCell('refs/*.bib');
    cell.set('loading');
    cell.set('ready');
    for (let i = 0; i < 100; i += 1) {
      cell.set('searching');
      cell.set('ready');
    }

    expect(cell.transitions()).toHaveLength(64);
    expect(cell.transitions().at(-1)).toBe('ready');
  });
});

describe('canTransition', () => {
  it('allows only the documented edges', () => {
    expect(canTransition('initialized', 'loading')).toBe(true);
    expect(canTransition('loading', 'no_file')).toBe(true);
    expect(canTransition('searching', 'ready')).toBe(true);
    expect(canTransition('searching', 'searching')).toBe(false);
    expect(canTransition('ready', 'loading')).toBe(false);
  });
});

describe('statusLabel', () => {
  it('renders no_file with a space', () => {
    expect(statusLabel('no_file')).toBe('no file');
    expect(statusLabel('searching')).toBe('searching');
  });
});
