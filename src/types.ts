/** Axis-aligned box in image pixel coordinates */
export interface BoundingBox {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
}

/** Image size as written in the `size` block of an annotation file */
export interface ImageDimensions {
  width: number;
  height: number;
  depth: number;
}

/**
 * Annotations of one image. `boxes[i]` carries `labels[i]`; both sequences
 * must have the same length whenever the record is persisted.
 */
export interface ImageRecord {
  boxes: BoundingBox[];
  labels: string[];
}

/** Commands reachable from a single key press */
export type SessionCommand = 'quit' | 'clear' | 'next' | 'previous' | 'undo';

/** Pointer gestures, in image pixel coordinates */
export type PointerEventKind = 'press' | 'move' | 'release';

export type InputEvent =
  | { kind: PointerEventKind; x: number; y: number }
  | { kind: 'key'; key: string };

/** Rectangle drawing style shared by every box of a frame */
export interface RectStyle {
  color: string;
  thickness: number;
}

export interface LabeledBox {
  label: string;
  box: BoundingBox;
}

/** Everything the display needs to draw one tick */
export interface Frame {
  revision: number;
  imageIndex: number;
  imageCount: number;
  imageName: string;
  width: number;
  height: number;
  label: string;
  boxes: LabeledBox[];
  inProgress: BoundingBox | null;
  dirty: boolean;
  style: RectStyle;
}
