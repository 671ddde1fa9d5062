const PREFIX = '[annotator]';

function quiet(): boolean {
  return process.env['ANNOTATOR_QUIET'] === '1';
}

/** Console logger for the command line side of the annotator */
export const log = {
  info(...args: unknown[]): void {
    if (quiet()) return;
    console.log(PREFIX, ...args);
  },
  warn(...args: unknown[]): void {
    console.warn(PREFIX, ...args);
  },
  error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
  },
};
