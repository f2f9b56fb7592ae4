import React, { useState } from 'react';
import { LongPressButton, type ButtonLongPressStore } from './components/LongPressButton';
import { Display } from './components/Display';
import { DebugPanel } from './components/DebugPanel';
import { LongPressStore } from './store/LongPressStore';
import type { ActivationEvent, PressKeyEvent, PressPointerEvent } from './components/pressActivation';
import './App.css';

export function describeActivation(e: ActivationEvent){
  return 'key' in e ? `key ${e.key === ' ' ? 'Space' : e.key}` : `pointer ${e.pointerType || 'mouse'}`;
}

function App() {
  const [store] = useState<ButtonLongPressStore>(() => new LongPressStore<PressPointerEvent, PressKeyEvent>({ replay: () => undefined }));
  const [activations, setActivations] = useState<string[]>([]);

  return (
    <div className="root">
      <Display store={store} />
      <LongPressButton
        className="hold-button"
        store={store}
        onActivate={(e) => setActivations(list => [...list, describeActivation(e)])}
      >
        {({ leftSeconds }) => leftSeconds === null ? 'Hold to confirm' : `Keep holding… ${leftSeconds}`}
      </LongPressButton>
      <DebugPanel store={store} activations={activations} onClear={() => setActivations([])} />
    </div>
  );
}

export default App;
