import type { Toast, ToastType } from '@/hooks/useToast';

interface ToastContainerProps {
  toasts: Toast[];
  onRemove: (id: number) => void;
}

const TOAST_STYLES: Record<ToastType, string> = {
  error: 'bg-red-600 text-white',
  info: 'bg-gray-800 text-white dark:bg-gray-700',
};

/**
 * Container for displaying toast notifications.
 */
export function ToastContainer({ toasts, onRemove }: ToastContainerProps): React.ReactNode {
  if (toasts.length === 0) return null;

  return (
    <div className="fixed bottom-4 right-4 z-50 flex flex-col gap-2">
      {toasts.map((toast) => (
        <div
          key={toast.id}
          className={`${TOAST_STYLES[toast.type]} flex min-w-[250px] max-w-[400px] items-center justify-between gap-3 rounded-lg px-4 py-3 shadow-lg`}
          role="alert"
        >
          <span className="text-sm font-medium">
            {toast.message}
            {toast.count > 1 && <span className="ml-1 opacity-75">(×{toast.count})</span>}
          </span>
          <button
            type="button"
            onClick={() => onRemove(toast.id)}
            className="text-white/80 transition-colors hover:text-white"
            aria-label="Dismiss"
          >
            ×
          </button>
        </div>
      ))}
    </div>
  );
}
