/**
 * Shared constants for the annotation page.
 */
import type { SessionCommand } from '@/types';

/** Keys forwarded to the session, and the command each one runs */
export const COMMAND_KEYS: Readonly<Record<string, SessionCommand>> = {
  q: 'quit',
  c: 'clear',
  n: 'next',
  p: 'previous',
  u: 'undo',
};

/** Key sent for a command, for toolbar buttons */
export const KEY_FOR_COMMAND: Readonly<Record<SessionCommand, string>> = {
  quit: 'q',
  clear: 'c',
  next: 'n',
  previous: 'p',
  undo: 'u',
};

/** Delay before asking again for a frame the session has not rendered yet */
export const FRAME_RETRY_MS = 500;
