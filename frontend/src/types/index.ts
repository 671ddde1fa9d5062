export type {
  BoundingBox,
  Frame,
  InputEvent,
  LabeledBox,
  PointerEventKind,
  RectStyle,
  SessionCommand,
} from '../../../src/types';
