/**
 * Error types raised by the annotator. Every one of them is fatal to the
 * session; callers decide how to report them.
 */
export class AnnotatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The folder given to the session does not exist or is not a directory. */
export class NotADirectoryError extends AnnotatorError {
  constructor(readonly folder: string) {
    super(`${folder} is not a directory`);
  }
}

export class NoImagesFoundError extends AnnotatorError {
  constructor(
    readonly folder: string,
    readonly extension: string
  ) {
    super(`no ${extension} images were found in directory ${folder}`);
  }
}

export class InvalidLabelError extends AnnotatorError {
  constructor(readonly label: string) {
    super(`object label must not be empty (got ${JSON.stringify(label)})`);
  }
}

/** Label and bounding box sequences of one image have different lengths. */
export class LabelMismatchError extends AnnotatorError {
  constructor(
    readonly labelCount: number,
    readonly boxCount: number
  ) {
    super(
      `label and bounding box collection sizes are mismatched (${labelCount} labels, ${boxCount} boxes)`
    );
  }
}

export class AlreadyExistsError extends AnnotatorError {
  constructor(readonly path: string) {
    super(`${path} already exists`);
  }
}

export class ParseError extends AnnotatorError {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`could not parse annotation file ${path}: ${reason}`);
  }
}

export class ImageReadError extends AnnotatorError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`could not read image at ${path}`);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** The display was released while something still waited on it. */
export class DisplayClosedError extends AnnotatorError {
  constructor() {
    super('Session closed');
  }
}
