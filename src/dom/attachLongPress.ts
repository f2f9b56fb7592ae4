import { reaction } from 'mobx';
import { LongPressStore, type Capture } from '../store/LongPressStore';
import { activateOnKeyDown, activateOnPointerDown } from '../components/pressActivation';

export type DomActivationEvent = PointerEvent | KeyboardEvent;
export type ElementLongPressStore = LongPressStore<PointerEvent, KeyboardEvent>;

interface LongPressAttachOptions {
  /** Defaults to true. */
  isLongPressEnabled?: boolean;
  /** Defaults to HOLD_SECONDS. */
  holdSeconds?: number;
  /** Fired with the original pointer/key event once the hold completes. */
  onActivate: (e: DomActivationEvent) => void;
  /** Called on every countdown step, and with null when the hold ends. */
  onLeftSecondsChange?: (leftSeconds: number | null) => void;
  /** Reuse a store, e.g. to change settings after attaching. */
  store?: ElementLongPressStore;
}

/**
 * Attach hold-to-activate behaviour to an existing element.
 *
 * Space/Enter key-downs the store consumes get preventDefault so the element's
 * own keyboard click never fires. Returns a function that removes every
 * listener and cancels a running countdown.
 */
export function attachLongPress(
  element: HTMLElement,
  { isLongPressEnabled, holdSeconds, onActivate, onLeftSecondsChange, store: sharedStore }: LongPressAttachOptions,
): () => void {
  const replay = (capture: Capture<PointerEvent, KeyboardEvent>) => {
    if (capture.source === 'pointer') activateOnPointerDown(capture.event, onActivate);
    else activateOnKeyDown(capture.event, onActivate);
  };
  const store = sharedStore ?? new LongPressStore<PointerEvent, KeyboardEvent>({ replay });
  store.setReplay(replay);
  if (isLongPressEnabled !== undefined) store.setHoldEnabled(isLongPressEnabled);
  if (holdSeconds !== undefined) store.setHoldSeconds(holdSeconds);

  const onPointerDown = (e: PointerEvent) => {
    if (e.isPrimary === false) return;
    store.pointerDown(e);
  };
  const onPointerUp = (e: PointerEvent) => { store.pointerUp(e); };
  const onPointerLeave = () => { store.pointerLeave(); };
  const onKeyDown = (e: KeyboardEvent) => {
    if (store.keyDown(e)) e.preventDefault();
  };
  const onKeyUp = (e: KeyboardEvent) => { store.keyUp(e); };
  const onBlur = () => { store.lostFocus(); };

  element.addEventListener('pointerdown', onPointerDown);
  element.addEventListener('pointerup', onPointerUp);
  element.addEventListener('pointerleave', onPointerLeave);
  element.addEventListener('keydown', onKeyDown);
  element.addEventListener('keyup', onKeyUp);
  element.addEventListener('blur', onBlur);

  const disposeReaction = onLeftSecondsChange
    ? reaction(() => store.leftSeconds, (left) => onLeftSecondsChange(left))
    : () => undefined;

  store.mount();

  return () => {
    store.unmount();
    disposeReaction();
    element.removeEventListener('pointerdown', onPointerDown);
    element.removeEventListener('pointerup', onPointerUp);
    element.removeEventListener('pointerleave', onPointerLeave);
    element.removeEventListener('keydown', onKeyDown);
    element.removeEventListener('keyup', onKeyUp);
    element.removeEventListener('blur', onBlur);
  };
}
