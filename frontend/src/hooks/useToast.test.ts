import { renderHook, act } from '@testing-library/react';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { TOAST_DURATION, useToast } from '@/hooks/useToast';

describe('useToast', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should add a toast and remove it after the duration', () => {
    const { result } = renderHook(() => useToast());

    act(() => {
      result.current.addToast('Failed to send input', 'error');
    });

    expect(result.current.toasts).toEqual([
      { id: 1, message: 'Failed to send input', type: 'error', count: 1 },
    ]);

    act(() => {
      vi.advanceTimersByTime(TOAST_DURATION);
    });

    expect(result.current.toasts).toEqual([]);
  });

  it('should count a repeated message instead of stacking it', () => {
    const { result } = renderHook(() => useToast());

    act(() => {
      result.current.addToast('Failed to send input', 'error');
      result.current.addToast('Failed to send input', 'error');
      result.current.addToast('Something else');
    });

    expect(result.current.toasts).toEqual([
      { id: 1, message: 'Failed to send input', type: 'error', count: 2 },
      { id: 2, message: 'Something else', type: 'info', count: 1 },
    ]);
  });

  it('should remove a counted toast once, when its first timer ends', () => {
    const { result } = renderHook(() => useToast());
    act(() => {
      result.current.addToast('Failed to send input', 'error');
    });
    act(() => {
      vi.advanceTimersByTime(TOAST_DURATION / 2);
      result.current.addToast('Failed to send input', 'error');
    });

    act(() => {
      vi.advanceTimersByTime(TOAST_DURATION / 2);
    });

    expect(result.current.toasts).toEqual([]);
  });

  it('should remove a toast on request', () => {
    const { result } = renderHook(() => useToast());
    act(() => {
      result.current.addToast('hello');
    });

    act(() => {
      result.current.removeToast(1);
    });

    expect(result.current.toasts).toEqual([]);
  });
});
