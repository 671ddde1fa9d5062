import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import sharp from 'sharp';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { ANNOTATION_DIR, ANNOTATION_EXTENSION } from '../config';
import { AlreadyExistsError, ImageReadError, LabelMismatchError, ParseError } from '../errors';
import type { BoundingBox, ImageDimensions, ImageRecord } from '../types';

/** One `object` block of a Pascal VOC file */
export interface VocObject {
  name: string;
  truncated: 0;
  difficult: 0;
  bndbox: BoundingBox;
}

/** In-memory tree of a Pascal VOC annotation file */
export interface VocDocument {
  annotation: {
    size: ImageDimensions;
    object: VocObject[];
  };
}

export interface DecodedImage {
  /** Interleaved 8-bit samples, `dimensions.depth` per pixel */
  pixels: Buffer;
  dimensions: ImageDimensions;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  // labels keep their spaces; coordinates are trimmed when parsed
  trimValues: false,
  isArray: (_name, jpath) => jpath === 'annotation.object',
});

/**
 * Builds the annotation tree for one image. Labels and boxes are paired by
 * position.
 */
export function encode(
  dimensions: ImageDimensions,
  labels: readonly string[],
  boxes: readonly BoundingBox[]
): VocDocument {
  if (labels.length !== boxes.length) {
    throw new LabelMismatchError(labels.length, boxes.length);
  }

  return {
    annotation: {
      size: {
        width: dimensions.width,
        height: dimensions.height,
        depth: dimensions.depth,
      },
      object: boxes.map((box, i) => ({
        name: labels[i] ?? '',
        truncated: 0,
        difficult: 0,
        bndbox: { xmin: box.xmin, ymin: box.ymin, xmax: box.xmax, ymax: box.ymax },
      })),
    },
  };
}

export function serialize(document: VocDocument): string {
  return builder.build(document);
}

/**
 * Writes `document` to `path`, replacing whatever is there when `overwrite`
 * is set. Missing parent folders are created.
 */
export function writeAnnotation(document: VocDocument, path: string, overwrite = false): void {
  if (!overwrite && existsSync(path)) {
    throw new AlreadyExistsError(path);
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serialize(document), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCoordinate(path: string, index: number, key: string, raw: unknown): number {
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    throw new ParseError(path, `object ${index} is missing ${key}`);
  }
  const text = String(raw).trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new ParseError(path, `object ${index} has a non-integer ${key} (${JSON.stringify(text)})`);
  }
  return Number.parseInt(text, 10);
}

/** Parses annotation text; `path` is only used in error messages. */
export function decode(xml: string, path: string): ImageRecord {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ParseError(path, `${validation.err.msg} (line ${validation.err.line})`);
  }

  const parsed: unknown = parser.parse(xml);
  if (!isRecord(parsed) || !('annotation' in parsed)) {
    throw new ParseError(path, 'missing <annotation> root');
  }

  const root = parsed['annotation'];
  const objects = isRecord(root) && Array.isArray(root['object']) ? root['object'] : [];

  const record: ImageRecord = { boxes: [], labels: [] };
  objects.forEach((obj: unknown, index) => {
    const name = isRecord(obj) ? obj['name'] : undefined;
    const bndbox = isRecord(obj) ? obj['bndbox'] : undefined;
    if (typeof name !== 'string') {
      throw new ParseError(path, `object ${index} has no name`);
    }
    if (!isRecord(bndbox)) {
      throw new ParseError(path, `object ${index} has no bndbox`);
    }

    const coordinate = (key: keyof BoundingBox): number =>
      parseCoordinate(path, index, key, bndbox[key]);
    record.labels.push(name);
    record.boxes.push({
      xmin: coordinate('xmin'),
      ymin: coordinate('ymin'),
      xmax: coordinate('xmax'),
      ymax: coordinate('ymax'),
    });
  });

  return record;
}

/** Reads the boxes and labels of an annotation file, in document order. */
export function readAnnotation(path: string): ImageRecord {
  let xml: string;
  try {
    xml = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ParseError(path, err instanceof Error ? err.message : 'unreadable');
  }
  return decode(xml, path);
}

/**
 * Decodes an image to 3-channel pixels. Anything sharp cannot decode is an
 * `ImageReadError`.
 */
export async function loadAndDecode(imagePath: string): Promise<DecodedImage> {
  try {
    const { data, info } = await sharp(imagePath)
      .toColourspace('srgb')
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    return {
      pixels: data,
      dimensions: { width: info.width, height: info.height, depth: info.channels },
    };
  } catch (err) {
    throw new ImageReadError(imagePath, { cause: err });
  }
}

export function imageStem(imagePath: string): string {
  return basename(imagePath, extname(imagePath));
}

/** `<folder>/Annotations/<image stem>.xml` */
export function annotationPathFor(folder: string, imagePath: string): string {
  return join(folder, ANNOTATION_DIR, imageStem(imagePath) + ANNOTATION_EXTENSION);
}

/**
 * Decodes `imagePath` for its size and writes its annotation file into
 * `annotationDir`, a folder relative to the image's own folder.
 *
 * @returns the path written
 */
export async function writeAnnotationForImage(
  imagePath: string,
  labels: readonly string[],
  boxes: readonly BoundingBox[],
  annotationDir: string = ANNOTATION_DIR,
  overwrite = false
): Promise<string> {
  const { dimensions } = await loadAndDecode(imagePath);
  const target = join(
    dirname(imagePath),
    annotationDir,
    imageStem(imagePath) + ANNOTATION_EXTENSION
  );
  writeAnnotation(encode(dimensions, labels, boxes), target, overwrite);
  return target;
}
