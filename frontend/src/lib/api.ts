import axios from 'axios';
import type { Frame, InputEvent } from '@/types';

const api = axios.create({
  baseURL: '/api',
});

/** Latest frame rendered by the session */
export async function getFrame(): Promise<Frame> {
  const response = await api.get<Frame>('/frame');
  return response.data;
}

/**
 * Queues one input event and resolves with the first frame rendered after
 * the session handled it.
 */
export async function sendEvent(event: InputEvent): Promise<Frame> {
  const response = await api.post<Frame>('/events', event);
  return response.data;
}

export function getImageUrl(imageIndex: number): string {
  return `/api/images/${imageIndex}`;
}

/** True once the session has quit and the API answers 410 Gone */
export function isSessionClosed(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response?.status === 410;
}

/** Server `detail` message of a failed request, else the error message */
export function getErrorDetail(err: unknown, fallback: string): string {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    if (typeof data === 'object' && data !== null && 'detail' in data) {
      const { detail } = data;
      if (typeof detail === 'string') return detail;
    }
    return err.message;
  }
  return err instanceof Error ? err.message : fallback;
}
