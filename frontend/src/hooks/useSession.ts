import { useState, useCallback, useRef } from 'react';
import type { Frame, InputEvent } from '@/types';
import * as api from '@/lib/api';

interface UseSessionResult {
  frame: Frame | null;
  loading: boolean;
  error: string | null;
  closed: boolean;
  loadFrame: () => Promise<void>;
  sendEvent: (event: InputEvent) => Promise<void>;
  sendKey: (key: string) => Promise<void>;
}

/** Keeps `current` when `next` was rendered before it */
function newer(current: Frame | null, next: Frame): Frame | null {
  return current && next.revision < current.revision ? current : next;
}

/**
 * Hook mirroring the annotator session: holds the latest frame and forwards
 * input events to the command line process, one request at a time and in
 * the order they happened.
 */
export function useSession(): UseSessionResult {
  const [frame, setFrame] = useState<Frame | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [closed, setClosed] = useState(false);

  const handleFailure = useCallback((err: unknown, fallback: string) => {
    if (api.isSessionClosed(err)) {
      setClosed(true);
      return;
    }
    setError(api.getErrorDetail(err, fallback));
  }, []);

  const loadFrame = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      const data = await api.getFrame();
      setFrame((prev) => newer(prev, data));
    } catch (err) {
      handleFailure(err, 'Failed to load frame');
    } finally {
      setLoading(false);
    }
  }, [handleFailure]);

  // Tail of the events already sent; each request waits for the one before it
  const outbox = useRef<Promise<void>>(Promise.resolve());

  const sendEvent = useCallback(
    (event: InputEvent) => {
      const sent = outbox.current.then(async () => {
        try {
          const data = await api.sendEvent(event);
          setFrame((prev) => newer(prev, data));
        } catch (err) {
          handleFailure(err, 'Failed to send input');
        }
      });
      outbox.current = sent;
      return sent;
    },
    [handleFailure]
  );

  const sendKey = useCallback((key: string) => sendEvent({ kind: 'key', key }), [sendEvent]);

  return { frame, loading, error, closed, loadFrame, sendEvent, sendKey };
}
