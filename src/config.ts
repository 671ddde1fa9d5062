import { AnnotatorError } from './errors';
import type { RectStyle, SessionCommand } from './types';

/** Subfolder of the image folder holding one annotation file per image */
export const ANNOTATION_DIR = 'Annotations';
export const ANNOTATION_EXTENSION = '.xml';
export const DEFAULT_IMAGE_EXTENSION = '.jpg';

export const RECT_STYLE: RectStyle = {
  color: '#00ff00',
  thickness: 2,
};

export const KEY_BINDINGS: Readonly<Record<string, SessionCommand>> = {
  q: 'quit',
  c: 'clear',
  n: 'next',
  p: 'previous',
  u: 'undo',
};

export const DEFAULT_POLL_MS = 250;
export const DEFAULT_PORT = 5173;

export interface AnnotatorConfig {
  folder: string;
  label: string;
  imageExtension: string;
  port: number;
  pollMs: number;
  open: boolean;
}

/** Flags as they come off the command line, before defaults apply */
export interface ConfigArgs {
  folder?: string;
  label?: string;
  extension?: string;
  port?: string;
  pollMs?: string;
  open?: boolean;
}

/** Bad or missing command line flag */
export class ConfigError extends AnnotatorError {}

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got ${JSON.stringify(raw)})`);
  }
  return value;
}

function normalizeExtension(raw: string): string {
  const trimmed = raw.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Merges command line flags over `ANNOTATOR_*` environment variables over
 * the defaults above.
 */
export function resolveConfig(
  args: ConfigArgs,
  env: Record<string, string | undefined> = process.env
): AnnotatorConfig {
  if (!args.folder) {
    throw new ConfigError('--folder is required');
  }
  if (args.label === undefined) {
    throw new ConfigError('--label is required');
  }

  const port = args.port ?? env['ANNOTATOR_PORT'];
  const pollMs = args.pollMs ?? env['ANNOTATOR_POLL_MS'];

  return {
    folder: args.folder,
    label: args.label,
    imageExtension: normalizeExtension(args.extension ?? DEFAULT_IMAGE_EXTENSION),
    port: port === undefined ? DEFAULT_PORT : parsePositiveInt('port', port),
    pollMs: pollMs === undefined ? DEFAULT_POLL_MS : parsePositiveInt('poll interval', pollMs),
    open: args.open ?? true,
  };
}
