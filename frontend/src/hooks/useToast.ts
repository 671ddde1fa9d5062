import { useState, useCallback, useRef } from 'react';

type ToastType = 'error' | 'info';

interface Toast {
  id: number;
  message: string;
  type: ToastType;
  /** Times the same message was raised while this toast was showing */
  count: number;
}

interface ToastContextValue {
  toasts: Toast[];
  addToast: (message: string, type?: ToastType) => void;
  removeToast: (id: number) => void;
}

/** Time a toast stays on screen, in milliseconds */
export const TOAST_DURATION = 4000;

/**
 * Toast notifications. A message already on screen is counted instead of
 * stacked, since a failing pointer drag raises the same error many times.
 */
export function useToast(): ToastContextValue {
  const [toasts, setToasts] = useState<Toast[]>([]);
  // Toasts as of the last call, so calls made in the same tick see each other
  const current = useRef<Toast[]>([]);
  const nextId = useRef(1);

  const update = useCallback((next: Toast[]) => {
    current.current = next;
    setToasts(next);
  }, []);

  const removeToast = useCallback(
    (id: number) => {
      update(current.current.filter((t) => t.id !== id));
    },
    [update]
  );

  const addToast = useCallback(
    (message: string, type: ToastType = 'info') => {
      const shown = current.current;
      if (shown.some((t) => t.message === message && t.type === type)) {
        update(
          shown.map((t) =>
            t.message === message && t.type === type ? { ...t, count: t.count + 1 } : t
          )
        );
        return;
      }

      const id = nextId.current;
      nextId.current += 1;
      update([...shown, { id, message, type, count: 1 }]);
      setTimeout(() => {
        removeToast(id);
      }, TOAST_DURATION);
    },
    [update, removeToast]
  );

  return { toasts, addToast, removeToast };
}

export type { Toast, ToastType, ToastContextValue };
