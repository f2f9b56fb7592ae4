import React, { useEffect, useRef } from 'react';
import { observer } from 'mobx-react-lite';
import { reaction } from 'mobx';
import clsx from 'clsx';
import { LongPressStore, type Capture } from '../store/LongPressStore';
import { PressButton, type PressButtonProps, type PressInterceptor } from './PressButton';
import {
  activateOnKeyDown,
  activateOnPointerDown,
  type ActivationEvent,
  type PressKeyEvent,
  type PressPointerEvent,
} from './pressActivation';

export type ButtonLongPressStore = LongPressStore<PressPointerEvent, PressKeyEvent>;

export interface HoldRenderState {
  leftSeconds: number | null;
}

export type LongPressButtonProps = Omit<PressButtonProps, 'intercept' | 'children' | 'onActivate'> & {
  /**
   * Receives the event captured at press time. After a completed hold React has
   * already cleared its currentTarget; read e.target for the button.
   */
  onActivate?: (e: ActivationEvent) => void;
  isLongPressEnabled?: boolean;
  holdSeconds?: number;
  onLeftSecondsChange?: (leftSeconds: number | null) => void;
  /** Share or observe the controller from outside; one is created per button otherwise. */
  store?: ButtonLongPressStore;
  children?: React.ReactNode | ((state: HoldRenderState) => React.ReactNode);
};

export function replayInto(onActivate: ((e: ActivationEvent) => void) | undefined){
  return (capture: Capture<PressPointerEvent, PressKeyEvent>) => {
    if(capture.source === 'pointer'){
      activateOnPointerDown(capture.event, onActivate);
    }else{
      activateOnKeyDown(capture.event, onActivate);
    }
  };
}

// Built on first use, so a button handed a store never creates its own.
function ownStore(ref: React.MutableRefObject<ButtonLongPressStore | null>, create: () => ButtonLongPressStore){
  if(ref.current === null) ref.current = create();
  return ref.current;
}

export const LongPressButton = observer(({
  isLongPressEnabled,
  holdSeconds,
  onActivate,
  onLeftSecondsChange,
  store: externalStore,
  className,
  children,
  ...rest
}: LongPressButtonProps) => {
  const onActivateRef = useRef(onActivate);
  onActivateRef.current = onActivate;

  const ownStoreRef = useRef<ButtonLongPressStore | null>(null);
  const store = externalStore ?? ownStore(ownStoreRef, () => new LongPressStore<PressPointerEvent, PressKeyEvent>({
    replay: (capture) => replayInto(onActivateRef.current)(capture),
  }));

  useEffect(() => {
    if(!externalStore) return;
    externalStore.setReplay((capture) => replayInto(onActivateRef.current)(capture));
    return () => externalStore.setReplay(() => undefined);
  }, [externalStore]);

  useEffect(() => {
    if(isLongPressEnabled !== undefined) store.setHoldEnabled(isLongPressEnabled);
  }, [store, isLongPressEnabled]);

  useEffect(() => {
    if(holdSeconds !== undefined) store.setHoldSeconds(holdSeconds);
  }, [store, holdSeconds]);

  useEffect(() => {
    store.mount();
    return () => store.unmount();
  }, [store]);

  const onLeftSecondsChangeRef = useRef(onLeftSecondsChange);
  onLeftSecondsChangeRef.current = onLeftSecondsChange;
  useEffect(() => reaction(
    () => store.leftSeconds,
    (left) => onLeftSecondsChangeRef.current?.(left)
  ), [store]);

  const intercept: PressInterceptor = {
    pointerDown: store.pointerDown,
    pointerUp: store.pointerUp,
    pointerLeave: () => store.pointerLeave(),
    keyDown: store.keyDown,
    keyUp: store.keyUp,
    lostFocus: () => store.lostFocus(),
  };

  const { leftSeconds, isCountingDown } = store;

  return (
    <PressButton
      {...rest}
      className={clsx(className, { 'is-holding': isCountingDown })}
      data-holding={isCountingDown ? 'true' : undefined}
      data-left-seconds={leftSeconds ?? undefined}
      onActivate={onActivate}
      intercept={intercept}
    >
      {typeof children === 'function' ? children({ leftSeconds }) : children}
    </PressButton>
  );
});
