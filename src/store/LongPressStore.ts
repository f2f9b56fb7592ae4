import { makeAutoObservable, observable } from "mobx";
import { Log } from "../utils/Log";
import { ENTER_KEY, SPACE_KEY, isSystemMenuChord } from "../utils/keys";

export const HOLD_SECONDS = 3;
export const TICK_INTERVAL_MS = 1000;

/** Minimal shape of a pointer event the store needs to look at. */
export interface PointerInput {
  button: number;
}

/** Minimal shape of a keyboard event the store needs to look at. */
export interface KeyInput {
  key: string;
  repeat: boolean;
  altKey: boolean;
  ctrlKey: boolean;
}

export type HoldSource = 'pointer' | 'spaceKey' | 'enterKey';

export type Capture<P extends PointerInput, K extends KeyInput> =
  | { source: 'pointer'; event: P }
  | { source: 'spaceKey'; event: K }
  | { source: 'enterKey'; event: K };

export interface PendingCaptures<P extends PointerInput, K extends KeyInput> {
  pointer: P | null;
  spaceKey: K | null;
  enterKey: K | null;
}

export interface LongPressOptions<P extends PointerInput, K extends KeyInput> {
  holdEnabled?: boolean;
  holdSeconds?: number;
  /** Feeds a deferred input back into the base button's own handling. */
  replay: (capture: Capture<P, K>) => void;
}

const REPLAY_ORDER: HoldSource[] = ['pointer', 'spaceKey', 'enterKey'];

function emptyCaptures<P extends PointerInput, K extends KeyInput>(): PendingCaptures<P, K> {
  return { pointer: null, spaceKey: null, enterKey: null };
}

function withCapture<P extends PointerInput, K extends KeyInput>(
  captures: PendingCaptures<P, K>,
  capture: Capture<P, K>
): PendingCaptures<P, K> {
  switch(capture.source){
    case 'pointer': return { ...captures, pointer: capture.event };
    case 'spaceKey': return { ...captures, spaceKey: capture.event };
    case 'enterKey': return { ...captures, enterKey: capture.event };
  }
}

export class LongPressStore<P extends PointerInput = PointerInput, K extends KeyInput = KeyInput> {
  holdEnabled = true;
  holdSeconds = HOLD_SECONDS;

  attached = false;

  private _leftSeconds: number | null = null;
  private _captures: PendingCaptures<P, K> = emptyCaptures();

  private countdownTimer: ReturnType<typeof setInterval> | null = null;
  private replay: (capture: Capture<P, K>) => void;

  constructor(options: LongPressOptions<P, K>) {
    this.replay = options.replay;
    if(options.holdEnabled !== undefined) this.setHoldEnabled(options.holdEnabled);
    if(options.holdSeconds !== undefined) this.setHoldSeconds(options.holdSeconds);
    makeAutoObservable<LongPressStore<P, K>, '_captures' | 'countdownTimer' | 'replay'>(this, {
      _captures: observable.ref,
      countdownTimer: false,
      replay: false,
    }, { autoBind: true });
  }

  /** Seconds left before activation; null while idle. */
  get leftSeconds(){
    return this._leftSeconds;
  }

  get captures(){
    return this._captures;
  }

  get isCountingDown(){
    return this.leftSeconds !== null;
  }

  get holdSources(): HoldSource[] {
    return REPLAY_ORDER.filter(source => this.captures[source] !== null);
  }

  get hasKeyboardCapture(){
    return this.captures.spaceKey !== null || this.captures.enterKey !== null;
  }

  setHoldEnabled(value: boolean){
    this.holdEnabled = Boolean(value);
  }

  setHoldSeconds(value: number){
    if(!Number.isFinite(value)){
      Log.warn('non-finite hold seconds, hold disabled:', value);
      this.holdSeconds = 0;
      return;
    }
    this.holdSeconds = Math.trunc(value);
  }

  setReplay(replay: (capture: Capture<P, K>) => void){
    this.replay = replay;
  }

  // Lifecycle
  mount(){
    if(this.attached) return;
    this.attached = true;
  }

  unmount(){
    this.stopCountdownIfActive();
    this.attached = false;
  }

  // Countdown
  startCountdownIfIdle(capture: Capture<P, K>){
    if(this._leftSeconds !== null) return false;

    if(!this.holdEnabled || this.holdSeconds < 1){
      Log.debug('hold bypassed', capture.source);
      this.fire(capture);
      return false;
    }

    this._captures = withCapture(this._captures, capture);
    this._leftSeconds = this.holdSeconds;
    this.countdownTimer = setInterval(() => this.tick(), TICK_INTERVAL_MS);
    Log.debug('countdown started', capture.source, this._leftSeconds);
    return true;
  }

  stopCountdownIfActive(){
    if(this._leftSeconds === null) return false;

    this.clearTimer();
    this._leftSeconds = null;
    this._captures = emptyCaptures();
    Log.debug('countdown cancelled');
    return true;
  }

  tick(){
    if(this._leftSeconds === null) return;

    if(this._leftSeconds <= 1){
      this.clearTimer();
      this._leftSeconds = null;
      this.firePending();
    }else{
      this._leftSeconds--;
    }
  }

  // Press handlers; a true result means the base button must not see the event.
  // A detached store leaves every press to the base button.
  pointerDown(e: P){
    if(!this.attached || e.button !== 0) return false;
    this.startCountdownIfIdle({ source: 'pointer', event: e });
    return true;
  }

  keyDown(e: K){
    if(!this.attached) return false;
    if(e.key === SPACE_KEY){
      if(isSystemMenuChord(e)) return false;
      if(!e.repeat){
        this.startCountdownIfIdle({ source: 'spaceKey', event: e });
      }
      return true;
    }
    if(e.key === ENTER_KEY){
      if(!e.repeat){
        this.startCountdownIfIdle({ source: 'enterKey', event: e });
      }
      return true;
    }
    return false;
  }

  // Release handlers only ever cancel the hold their own source started.
  pointerUp(e: P){
    if(e.button === 0 && this._captures.pointer !== null){
      this.stopCountdownIfActive();
    }
  }

  pointerLeave(){
    if(this._captures.pointer !== null){
      this.stopCountdownIfActive();
    }
  }

  keyUp(e: K){
    if(e.key === SPACE_KEY && !isSystemMenuChord(e) && this._captures.spaceKey !== null){
      this.stopCountdownIfActive();
    }
    if(e.key === ENTER_KEY && this._captures.enterKey !== null){
      this.stopCountdownIfActive();
    }
  }

  lostFocus(){
    if(this.hasKeyboardCapture){
      this.stopCountdownIfActive();
    }
  }

  private clearTimer(){
    if(this.countdownTimer !== null){
      clearInterval(this.countdownTimer);
      this.countdownTimer = null;
    }
  }

  private firePending(){
    const { pointer, spaceKey, enterKey } = this._captures;
    if(pointer !== null){
      this._captures = { ...this._captures, pointer: null };
      this.fire({ source: 'pointer', event: pointer });
    }
    if(spaceKey !== null){
      this._captures = { ...this._captures, spaceKey: null };
      this.fire({ source: 'spaceKey', event: spaceKey });
    }
    if(enterKey !== null){
      this._captures = { ...this._captures, enterKey: null };
      this.fire({ source: 'enterKey', event: enterKey });
    }
  }

  private fire(capture: Capture<P, K>){
    Log.debug('activate', capture.source);
    this.replay(capture);
  }
}
