import React from 'react';
import { observer } from 'mobx-react-lite';
import clsx from 'clsx';
import type { LongPressStore } from '../store/LongPressStore';

const SOURCE_LABELS = {
  pointer: 'mouse',
  spaceKey: 'Space',
  enterKey: 'Enter',
} as const;

export function formatLeftSeconds(leftSeconds: number | null){
  if(leftSeconds === null) return 'idle';
  return leftSeconds === 1 ? '1 second left' : `${leftSeconds} seconds left`;
}

type DisplayStore = Pick<LongPressStore, 'leftSeconds' | 'holdSources' | 'holdSeconds' | 'holdEnabled'>;

export const Display = observer(({ store }: { store: DisplayStore }) => {
  const { leftSeconds, holdSources, holdSeconds, holdEnabled } = store;
  const bypass = !holdEnabled || holdSeconds < 1;

  return (
    <div className={clsx('display', { 'display-active': leftSeconds !== null })}>
      <div className="display-seconds" data-testid="left-seconds">
        {formatLeftSeconds(leftSeconds)}
      </div>
      <div className="display-info">
        {bypass
          ? 'hold disabled: activates on press'
          : `hold for ${holdSeconds}s`}
        {holdSources.length > 0 && (
          <span> · via {holdSources.map(s => SOURCE_LABELS[s]).join(' + ')}</span>
        )}
      </div>
    </div>
  );
});
