export { useSession } from './useSession';
export { useToast } from './useToast';
export type { Toast, ToastType, ToastContextValue } from './useToast';
