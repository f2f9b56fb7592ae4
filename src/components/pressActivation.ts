import type React from 'react';
import { ENTER_KEY, SPACE_KEY, isSystemMenuChord } from '../utils/keys';

export type PressPointerEvent = React.PointerEvent<HTMLButtonElement>;
export type PressKeyEvent = React.KeyboardEvent<HTMLButtonElement>;
export type ActivationEvent = PressPointerEvent | PressKeyEvent;

interface KeyLike {
  key: string;
  repeat: boolean;
  altKey: boolean;
  ctrlKey: boolean;
}

/**
 * Press-mode activation of a plain button: the activation fires on the way
 * down instead of on release, for the primary pointer button and for the first
 * Space or Enter key-down.
 */
export function activateOnPointerDown<E extends { button: number }>(e: E, onActivate?: (e: E) => void){
  if(e.button !== 0) return false;
  onActivate?.(e);
  return true;
}

export function activateOnKeyDown<E extends KeyLike>(e: E, onActivate?: (e: E) => void){
  if(e.repeat) return false;
  if(e.key === SPACE_KEY){
    if(isSystemMenuChord(e)) return false;
  }else if(e.key !== ENTER_KEY){
    return false;
  }
  onActivate?.(e);
  return true;
}
