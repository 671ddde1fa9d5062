import type { InputEvent, PointerEventKind } from '../types';

const POINTER_KINDS: ReadonlySet<string> = new Set<PointerEventKind>(['press', 'move', 'release']);

function isPointerKind(value: unknown): value is PointerEventKind {
  return typeof value === 'string' && POINTER_KINDS.has(value);
}

function isCoordinate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Validates an event posted by the page; `null` when it is not one. */
export function parseInputEvent(raw: unknown): InputEvent | null {
  if (!raw || typeof raw !== 'object') {
    return null;
  }
  const { kind, x, y, key } = raw as Record<string, unknown>;

  if (kind === 'key') {
    if (typeof key !== 'string' || key.length !== 1) {
      return null;
    }
    return { kind, key };
  }

  if (!isPointerKind(kind) || !isCoordinate(x) || !isCoordinate(y)) {
    return null;
  }
  return { kind, x, y };
}
