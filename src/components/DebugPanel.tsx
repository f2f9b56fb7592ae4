import React from 'react';
import { observer } from 'mobx-react-lite';
import type { LongPressStore } from '../store/LongPressStore';

type SettingsStore = Pick<
  LongPressStore,
  'holdEnabled' | 'holdSeconds' | 'leftSeconds' | 'attached' | 'setHoldEnabled' | 'setHoldSeconds' | 'stopCountdownIfActive'
>;

interface DebugPanelProps {
  store: SettingsStore;
  activations: string[];
  onClear: () => void;
}

export const DebugPanel = observer(({ store, activations, onClear }: DebugPanelProps) => {
  const { holdEnabled, holdSeconds, leftSeconds, attached } = store;

  return (
    <div className="debug-container">
      <div className="debug-panel">
        <h3>Settings</h3>
        <label>
          <input
            type="checkbox"
            checked={holdEnabled}
            onChange={(e) => store.setHoldEnabled(e.target.checked)}
          />
          Long press enabled
        </label>
        <label>
          Hold seconds
          <input
            type="number"
            min={0}
            value={holdSeconds}
            onChange={(e) => store.setHoldSeconds(e.target.valueAsNumber)}
          />
        </label>
        <div className="debug-info">
          <div>Attached: {attached ? 'yes' : 'no'}</div>
          <div>Left seconds: {leftSeconds ?? 'null'}</div>
        </div>
        <div className="debug-buttons">
          <button onClick={() => store.stopCountdownIfActive()}>Cancel hold</button>
          <button onClick={onClear}>Clear log</button>
        </div>
      </div>

      <div className="intro-panel">
        <h4>Activations</h4>
        <ol data-testid="activation-log">
          {activations.map((line, idx) => <li key={idx}>{line}</li>)}
        </ol>
      </div>
    </div>
  );
});
