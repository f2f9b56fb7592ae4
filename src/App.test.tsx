import React from 'react';
import { act, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import App from './App';

describe('App', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('logs an activation after a three second hold', () => {
    render(<App />);
    const button = screen.getByRole('button', { name: 'Hold to confirm' });

    fireEvent.pointerDown(button, { button: 0 });
    expect(button.textContent).toBe('Keep holding… 3');
    expect(screen.getByTestId('left-seconds').textContent).toBe('3 seconds left');

    act(() => {
      vi.advanceTimersByTime(3000);
    });

    expect(screen.getByTestId('activation-log').textContent).toBe('pointer mouse');
    expect(screen.getByTestId('left-seconds').textContent).toBe('idle');
  });

  it('activates on Enter at once after the hold is switched off', () => {
    render(<App />);

    fireEvent.click(screen.getByRole('checkbox'));
    fireEvent.keyDown(screen.getByRole('button', { name: 'Hold to confirm' }), { key: 'Enter' });

    expect(screen.getByTestId('activation-log').textContent).toBe('key Enter');
  });

  it('cancels a running hold from the settings panel', () => {
    render(<App />);

    fireEvent.keyDown(screen.getByRole('button', { name: 'Hold to confirm' }), { key: ' ' });
    fireEvent.click(screen.getByRole('button', { name: 'Cancel hold' }));

    expect(screen.getByTestId('left-seconds').textContent).toBe('idle');
    act(() => {
      vi.advanceTimersByTime(5000);
    });
    expect(screen.getByTestId('activation-log').textContent).toBe('');
  });
});
