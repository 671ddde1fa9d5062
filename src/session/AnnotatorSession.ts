import { existsSync, readdirSync, rmSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import {
  ANNOTATION_DIR,
  ANNOTATION_EXTENSION,
  DEFAULT_IMAGE_EXTENSION,
  KEY_BINDINGS,
  RECT_STYLE,
} from '../config';
import {
  InvalidLabelError,
  LabelMismatchError,
  NoImagesFoundError,
  NotADirectoryError,
} from '../errors';
import { log } from '../log';
import type {
  BoundingBox,
  Frame,
  ImageRecord,
  InputEvent,
  RectStyle,
  SessionCommand,
} from '../types';
import {
  annotationPathFor,
  encode,
  imageStem,
  loadAndDecode,
  readAnnotation,
  writeAnnotation,
  type DecodedImage,
} from '../voc/codec';

export interface SessionOptions {
  /** Extension of the files treated as images, matched case-insensitively */
  imageExtension?: string;
  style?: RectStyle;
  keyBindings?: Readonly<Record<string, SessionCommand>>;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function emptyRecord(): ImageRecord {
  return { boxes: [], labels: [] };
}

/** Orders the corners so that min <= max on both axes. */
export function normalizeBox(box: BoundingBox): BoundingBox {
  return {
    xmin: Math.min(box.xmin, box.xmax),
    ymin: Math.min(box.ymin, box.ymax),
    xmax: Math.max(box.xmin, box.xmax),
    ymax: Math.max(box.ymin, box.ymax),
  };
}

/**
 * Image files of `folder`, sorted. Images share an annotation file when their
 * stems are equal (`a.jpg` and `a.JPG`), so only the first of those is kept.
 */
function listImages(folder: string, extension: string): string[] {
  const paths = readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === extension)
    .map((entry) => join(folder, entry.name))
    .sort();

  const stems = new Set<string>();
  return paths.filter((path) => {
    const stem = imageStem(path);
    if (stems.has(stem)) {
      log.warn(`skipping ${path}: another image already saves to ${stem}${ANNOTATION_EXTENSION}`);
      return false;
    }
    stems.add(stem);
    return true;
  });
}

/**
 * Reads every annotation file of `<folder>/Annotations` and keys it by the
 * handle of the image with the same stem.
 */
function loadSavedAnnotations(folder: string, imagePaths: string[]): Map<number, ImageRecord> {
  const records = new Map<number, ImageRecord>();
  const annotationDir = join(folder, ANNOTATION_DIR);
  if (!isDirectory(annotationDir)) {
    return records;
  }

  const handles = new Map(imagePaths.map((path, handle) => [imageStem(path), handle]));
  for (const filename of readdirSync(annotationDir).sort()) {
    if (extname(filename).toLowerCase() !== ANNOTATION_EXTENSION) continue;

    const handle = handles.get(imageStem(filename));
    if (handle === undefined) {
      log.warn(`skipping ${filename}: no matching image in ${folder}`);
      continue;
    }
    records.set(handle, readAnnotation(join(annotationDir, filename)));
  }
  return records;
}

/**
 * Annotation state of one folder of images: which image is shown, the boxes
 * drawn on each image, and the box being dragged right now.
 *
 * Images are addressed by their handle, the position in the sorted image
 * list. Annotation files are written when the session leaves an image whose
 * boxes changed, and deleted when it leaves an image without boxes.
 */
export class AnnotatorSession {
  private index = 0;
  private current: ImageRecord = emptyRecord();
  private image: DecodedImage | null = null;
  private inProgress: BoundingBox | null = null;
  private dirty = false;
  private revision = 0;
  private readonly style: RectStyle;
  private readonly keyBindings: Readonly<Record<string, SessionCommand>>;

  private constructor(
    readonly folder: string,
    readonly label: string,
    private readonly imagePaths: readonly string[],
    private readonly records: Map<number, ImageRecord>,
    options: SessionOptions
  ) {
    this.style = options.style ?? RECT_STYLE;
    this.keyBindings = options.keyBindings ?? KEY_BINDINGS;
  }

  /**
   * Scans `folder` for images, restores the annotation files already saved
   * for them and shows the first image.
   */
  static async open(
    folder: string,
    label: string,
    options: SessionOptions = {}
  ): Promise<AnnotatorSession> {
    if (label.trim() === '') {
      throw new InvalidLabelError(label);
    }
    if (!isDirectory(folder)) {
      throw new NotADirectoryError(folder);
    }

    const extension = (options.imageExtension ?? DEFAULT_IMAGE_EXTENSION).toLowerCase();
    const imagePaths = listImages(folder, extension);
    if (imagePaths.length === 0) {
      throw new NoImagesFoundError(folder, extension);
    }

    const records = loadSavedAnnotations(folder, imagePaths);
    log.info(
      `${imagePaths.length} images in ${folder}, ${records.size} with saved annotations`
    );

    const session = new AnnotatorSession(folder, label, imagePaths, records, options);
    await session.transitionTo(0);
    return session;
  }

  get currentIndex(): number {
    return this.index;
  }

  get imageCount(): number {
    return this.imagePaths.length;
  }

  get currentImagePath(): string {
    return this.imagePath(this.index) ?? '';
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get isDrawing(): boolean {
    return this.inProgress !== null;
  }

  imagePath(handle: number): string | undefined {
    return this.imagePaths[handle];
  }

  annotationPath(handle: number): string {
    return annotationPathFor(this.folder, this.imagePath(handle) ?? '');
  }

  /** Copy of the current image's committed boxes and labels */
  currentRecord(): ImageRecord {
    return {
      boxes: this.current.boxes.map((box) => ({ ...box })),
      labels: [...this.current.labels],
    };
  }

  /** Whether the in-memory annotation map holds an entry for `handle` */
  hasRecord(handle: number): boolean {
    return this.records.has(handle);
  }

  beginDraw(x: number, y: number): void {
    const px = Math.round(x);
    const py = Math.round(y);
    this.inProgress = { xmin: px, ymin: py, xmax: px, ymax: py };
    this.revision += 1;
  }

  updateDraw(x: number, y: number): void {
    if (!this.inProgress) return;
    this.inProgress = { ...this.inProgress, xmax: Math.round(x), ymax: Math.round(y) };
    this.revision += 1;
  }

  commitDraw(x: number, y: number): void {
    if (!this.inProgress) return;
    this.updateDraw(x, y);

    const box = normalizeBox(this.inProgress);
    this.current.boxes.push(box);
    this.current.labels.push(this.label);
    // a cleared image drops out of the map; drawing on it again brings it back
    this.records.set(this.index, this.current);
    this.inProgress = null;
    this.dirty = true;
  }

  undo(): void {
    if (this.inProgress || this.current.boxes.length === 0 || this.current.labels.length === 0) {
      return;
    }
    this.current.boxes.pop();
    this.current.labels.pop();
    this.dirty = true;
    this.revision += 1;
  }

  clear(): void {
    this.records.delete(this.index);
    this.current = emptyRecord();
    this.dirty = true;
    this.revision += 1;
  }

  next(): Promise<void> {
    return this.transitionTo(this.index + 1);
  }

  previous(): Promise<void> {
    return this.transitionTo(this.index - 1);
  }

  /**
   * Leaves the current image and shows image `newIndex` (taken modulo the
   * image count):
   *
   * 1. the outgoing image's file is deleted when it has no boxes, or
   *    rewritten when its boxes changed;
   * 2. the incoming image's record is bound (a new empty one on first visit)
   *    and the dirty flag and any drag are reset;
   * 3. the incoming image is decoded. An `ImageReadError` here is fatal.
   */
  async transitionTo(newIndex: number): Promise<void> {
    this.reconcileOutgoing();

    const count = this.imagePaths.length;
    this.index = ((newIndex % count) + count) % count;
    this.image = null;

    let record = this.records.get(this.index);
    if (!record) {
      record = emptyRecord();
      this.records.set(this.index, record);
    }
    this.current = record;
    this.dirty = false;
    this.inProgress = null;
    this.revision += 1;

    this.image = await loadAndDecode(this.currentImagePath);
  }

  /** Saves or deletes the current image's file, like leaving the image does. */
  close(): void {
    this.reconcileOutgoing();
  }

  private reconcileOutgoing(): void {
    if (!this.image) return;

    const path = this.annotationPath(this.index);
    const { boxes, labels } = this.current;
    if (boxes.length === 0 || labels.length === 0) {
      if (existsSync(path)) {
        rmSync(path);
        log.info(`removed ${path}`);
      }
    } else if (this.dirty) {
      if (labels.length !== boxes.length) {
        throw new LabelMismatchError(labels.length, boxes.length);
      }
      writeAnnotation(encode(this.image.dimensions, labels, boxes), path, true);
      log.info(`saved ${boxes.length} boxes to ${path}`);
    }
    this.dirty = false;
  }

  /** Runs a command; resolves `true` when the session should stop. */
  async execute(command: SessionCommand): Promise<boolean> {
    switch (command) {
      case 'quit':
        this.close();
        return true;
      case 'next':
        await this.next();
        return false;
      case 'previous':
        await this.previous();
        return false;
      case 'clear':
        this.clear();
        return false;
      case 'undo':
        this.undo();
        return false;
    }
  }

  /** Routes one input event; resolves `true` when the session should stop. */
  async dispatch(event: InputEvent): Promise<boolean> {
    switch (event.kind) {
      case 'press':
        this.beginDraw(event.x, event.y);
        return false;
      case 'move':
        this.updateDraw(event.x, event.y);
        return false;
      case 'release':
        this.commitDraw(event.x, event.y);
        return false;
      case 'key': {
        const command = this.keyBindings[event.key];
        return command ? this.execute(command) : false;
      }
    }
  }

  render(): Frame {
    const dimensions = this.image?.dimensions;
    return {
      revision: this.revision,
      imageIndex: this.index,
      imageCount: this.imagePaths.length,
      imageName: basename(this.currentImagePath),
      width: dimensions?.width ?? 0,
      height: dimensions?.height ?? 0,
      label: this.label,
      boxes: this.current.boxes.map((box, i) => ({
        label: this.current.labels[i] ?? this.label,
        box: { ...box },
      })),
      inProgress: this.inProgress ? normalizeBox(this.inProgress) : null,
      dirty: this.dirty,
      style: this.style,
    };
  }
}
