import { DEFAULT_POLL_MS } from '../config';
import type { Frame, InputEvent } from '../types';
import type { AnnotatorSession } from './AnnotatorSession';

/**
 * Where frames are shown and input comes from. `poll` waits at most
 * `timeoutMs` and resolves `null` when nothing arrived.
 */
export interface Display {
  open(): Promise<void>;
  present(frame: Frame): void;
  poll(timeoutMs: number): Promise<InputEvent | null>;
  close(): Promise<void>;
}

export interface RunOptions {
  pollMs?: number;
}

/** One render/poll/dispatch cycle; resolves `true` once the session quits. */
export async function tick(
  session: AnnotatorSession,
  display: Display,
  pollMs: number
): Promise<boolean> {
  display.present(session.render());
  const event = await display.poll(pollMs);
  if (!event) {
    return false;
  }
  return session.dispatch(event);
}

/**
 * Drives `session` on `display` until a quit command. Whatever ends the
 * loop, the current image is flushed and the display released, in that
 * order; errors still reach the caller.
 */
export async function runSession(
  session: AnnotatorSession,
  display: Display,
  options: RunOptions = {}
): Promise<void> {
  const pollMs = options.pollMs ?? DEFAULT_POLL_MS;

  await display.open();
  try {
    let quit = false;
    while (!quit) {
      quit = await tick(session, display, pollMs);
    }
  } finally {
    try {
      session.close();
    } finally {
      await display.close();
    }
  }
}
