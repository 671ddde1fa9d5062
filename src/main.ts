import { parseArgs } from 'node:util';
import { resolveConfig, type AnnotatorConfig } from './config';
import { BrowserDisplay } from './display/BrowserDisplay';
import { startDisplayServer } from './display/server';
import { AnnotatorError } from './errors';
import { log } from './log';
import { AnnotatorSession } from './session/AnnotatorSession';
import { runSession } from './session/runSession';

const USAGE = `usage: voc-annotate --folder <path> --label <string> [options]

  -f, --folder <path>     folder holding the images to annotate
  -l, --label <string>    object class label given to every box
  -e, --extension <ext>   image file extension (default .jpg)
      --port <n>          port of the annotation page (default 5173)
      --poll-ms <n>       input poll interval in milliseconds (default 250)
      --no-open           do not open a browser
  -h, --help              show this message

keys: q quit, n next, p previous, u undo, c clear`;

/** Exit codes of the command */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function parseCommandLine(argv: string[]): AnnotatorConfig | 'help' {
  const { values } = parseArgs({
    args: argv,
    options: {
      folder: { type: 'string', short: 'f' },
      label: { type: 'string', short: 'l' },
      extension: { type: 'string', short: 'e' },
      port: { type: 'string' },
      'poll-ms': { type: 'string' },
      'no-open': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  if (values.help) {
    return 'help';
  }
  return resolveConfig({
    folder: values.folder,
    label: values.label,
    extension: values.extension,
    port: values.port,
    pollMs: values['poll-ms'],
    open: !values['no-open'],
  });
}

/** Runs one annotation session; resolves with the process exit code. */
export async function main(argv: string[]): Promise<number> {
  let config: AnnotatorConfig;
  try {
    const parsed = parseCommandLine(argv);
    if (parsed === 'help') {
      console.log(USAGE);
      return EXIT_OK;
    }
    config = parsed;
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return EXIT_USAGE;
  }

  try {
    const session = await AnnotatorSession.open(config.folder, config.label, {
      imageExtension: config.imageExtension,
    });
    const display = new BrowserDisplay({
      serve: (display) =>
        startDisplayServer(
          { display, imagePath: (handle) => session.imagePath(handle) },
          { port: config.port, open: config.open }
        ),
    });

    await runSession(session, display, { pollMs: config.pollMs });
    log.info('session finished');
    return EXIT_OK;
  } catch (err) {
    if (err instanceof AnnotatorError) {
      log.error(`${err.name}: ${err.message}`);
    } else {
      log.error(err);
    }
    return EXIT_FAILURE;
  }
}
