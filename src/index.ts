export {
  LongPressStore,
  HOLD_SECONDS,
  TICK_INTERVAL_MS,
  type Capture,
  type HoldSource,
  type KeyInput,
  type LongPressOptions,
  type PendingCaptures,
  type PointerInput,
} from './store/LongPressStore';
export { PressButton, type PressButtonProps, type PressInterceptor } from './components/PressButton';
export {
  LongPressButton,
  replayInto,
  type ButtonLongPressStore,
  type HoldRenderState,
  type LongPressButtonProps,
} from './components/LongPressButton';
export {
  activateOnKeyDown,
  activateOnPointerDown,
  type ActivationEvent,
  type PressKeyEvent,
  type PressPointerEvent,
} from './components/pressActivation';
export { attachLongPress, type DomActivationEvent, type ElementLongPressStore } from './dom/attachLongPress';
export { Display, formatLeftSeconds } from './components/Display';
export { Log } from './utils/Log';
