import React from 'react';
import {
  activateOnKeyDown,
  activateOnPointerDown,
  type ActivationEvent,
  type PressKeyEvent,
  type PressPointerEvent,
} from './pressActivation';

/**
 * Hooks that see each input before the button's own activation logic.
 * A press hook returning true consumes the input; release hooks only observe.
 */
export interface PressInterceptor {
  pointerDown?(e: PressPointerEvent): boolean;
  keyDown?(e: PressKeyEvent): boolean;
  pointerUp?(e: PressPointerEvent): void;
  pointerLeave?(e: PressPointerEvent): void;
  keyUp?(e: PressKeyEvent): void;
  lostFocus?(e: React.FocusEvent<HTMLButtonElement>): void;
}

export type PressButtonProps = Omit<
  React.ButtonHTMLAttributes<HTMLButtonElement>,
  'onClick' | 'onPointerDown' | 'onPointerUp' | 'onPointerLeave' | 'onKeyDown' | 'onKeyUp' | 'onBlur'
> & {
  onActivate?: (e: ActivationEvent) => void;
  intercept?: PressInterceptor;
};

export const PressButton = React.forwardRef<HTMLButtonElement, PressButtonProps>(
  ({ onActivate, intercept, type = 'button', children, ...rest }, ref) => {
    const handlePointerDown = (e: PressPointerEvent) => {
      if(intercept?.pointerDown?.(e)) return;
      activateOnPointerDown(e, onActivate);
    };
    const handleKeyDown = (e: PressKeyEvent) => {
      if(intercept?.keyDown?.(e)){
        e.preventDefault();
        return;
      }
      if(activateOnKeyDown(e, onActivate)) e.preventDefault();
    };

    return (
      <button
        {...rest}
        ref={ref}
        type={type}
        onPointerDown={handlePointerDown}
        onPointerUp={(e) => { intercept?.pointerUp?.(e); }}
        onPointerLeave={(e) => { intercept?.pointerLeave?.(e); }}
        onKeyDown={handleKeyDown}
        onKeyUp={(e) => { intercept?.keyUp?.(e); }}
        onBlur={(e) => { intercept?.lostFocus?.(e); }}
      >
        {children}
      </button>
    );
  }
);

PressButton.displayName = 'PressButton';
