import { describe, expect, it, vi } from 'vitest';
import { activateOnKeyDown, activateOnPointerDown } from './pressActivation';

function key(k: string, init: Partial<{ repeat: boolean; altKey: boolean; ctrlKey: boolean }> = {}) {
  return { key: k, repeat: false, altKey: false, ctrlKey: false, ...init };
}

describe('activateOnPointerDown', () => {
  it('activates on the primary button with the same event', () => {
    const onActivate = vi.fn();
    const e = { button: 0 };
    expect(activateOnPointerDown(e, onActivate)).toBe(true);
    expect(onActivate).toHaveBeenCalledWith(e);
  });

  it('ignores secondary and middle buttons', () => {
    const onActivate = vi.fn();
    expect(activateOnPointerDown({ button: 1 }, onActivate)).toBe(false);
    expect(activateOnPointerDown({ button: 2 }, onActivate)).toBe(false);
    expect(onActivate).not.toHaveBeenCalled();
  });

  it('works without a handler', () => {
    expect(activateOnPointerDown({ button: 0 })).toBe(true);
  });
});

describe('activateOnKeyDown', () => {
  it('activates on Space and Enter', () => {
    const onActivate = vi.fn();
    expect(activateOnKeyDown(key(' '), onActivate)).toBe(true);
    expect(activateOnKeyDown(key('Enter'), onActivate)).toBe(true);
    expect(onActivate).toHaveBeenCalledTimes(2);
  });

  it('ignores key repeats', () => {
    const onActivate = vi.fn();
    expect(activateOnKeyDown(key('Enter', { repeat: true }), onActivate)).toBe(false);
    expect(onActivate).not.toHaveBeenCalled();
  });

  it('ignores Alt+Space but not Ctrl+Alt+Space', () => {
    const onActivate = vi.fn();
    expect(activateOnKeyDown(key(' ', { altKey: true }), onActivate)).toBe(false);
    expect(activateOnKeyDown(key(' ', { altKey: true, ctrlKey: true }), onActivate)).toBe(true);
    expect(onActivate).toHaveBeenCalledTimes(1);
  });

  it('ignores other keys', () => {
    const onActivate = vi.fn();
    expect(activateOnKeyDown(key('a'), onActivate)).toBe(false);
    expect(activateOnKeyDown(key('Escape'), onActivate)).toBe(false);
    expect(onActivate).not.toHaveBeenCalled();
  });
});
