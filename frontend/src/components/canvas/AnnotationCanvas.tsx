import { useRef, useState, useEffect, useCallback } from 'react';
import { Stage, Layer, Image as KonvaImage, Rect, Text } from 'react-konva';
import type Konva from 'konva';
import type { BoundingBox, LabeledBox, PointerEventKind, RectStyle } from '@/types';

const IMAGE_FRAME_COLOR = 'rgba(14, 165, 233, 0.55)'; // primary-500

interface AnnotationCanvasProps {
  imageUrl: string | null;
  imageWidth: number;
  imageHeight: number;
  boxes: LabeledBox[];
  inProgress: BoundingBox | null;
  style: RectStyle;
  disabled: boolean;
  onPointer: (kind: PointerEventKind, x: number, y: number) => void;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Canvas showing the current image with its boxes. Mouse gestures are
 * reported in image pixel coordinates; drawing itself happens in the session.
 */
export function AnnotationCanvas({
  imageUrl,
  imageWidth,
  imageHeight,
  boxes,
  inProgress,
  style,
  disabled,
  onPointer,
}: AnnotationCanvasProps): JSX.Element {
  const containerRef = useRef<HTMLDivElement>(null);
  const [image, setImage] = useState<HTMLImageElement | null>(null);
  const [stageSize, setStageSize] = useState({ width: 800, height: 600 });
  const [scale, setScale] = useState(1);

  // Button held since a press inside the image
  const pressedRef = useRef(false);
  const lastSentRef = useRef<{ x: number; y: number } | null>(null);

  // Load image when URL changes
  useEffect(() => {
    if (!imageUrl) {
      setImage(null);
      return;
    }

    let cancelled = false;
    const img = new window.Image();
    img.src = imageUrl;
    img.onload = () => {
      if (!cancelled) setImage(img);
    };
    return () => {
      cancelled = true;
    };
  }, [imageUrl]);

  // Resize stage to fit container
  useEffect(() => {
    const updateSize = (): void => {
      if (!containerRef.current || imageWidth <= 0 || imageHeight <= 0) return;
      const containerWidth = containerRef.current.clientWidth;
      const containerHeight = containerRef.current.clientHeight;

      setScale(Math.min(containerWidth / imageWidth, containerHeight / imageHeight, 1));
      setStageSize({ width: containerWidth, height: containerHeight });
    };

    updateSize();
    window.addEventListener('resize', updateSize);
    return () => window.removeEventListener('resize', updateSize);
  }, [imageWidth, imageHeight]);

  // Convert pointer position from stage space to image space
  const getImagePosition = useCallback(
    (e: Konva.KonvaEventObject<MouseEvent>): { x: number; y: number } | null => {
      const pos = e.target.getStage()?.getPointerPosition();
      if (!pos) return null;
      return { x: pos.x / scale, y: pos.y / scale };
    },
    [scale]
  );

  const send = useCallback(
    (kind: PointerEventKind, x: number, y: number): void => {
      const clamped = {
        x: Math.round(clamp(x, 0, imageWidth)),
        y: Math.round(clamp(y, 0, imageHeight)),
      };
      const last = lastSentRef.current;
      if (kind === 'move' && last && last.x === clamped.x && last.y === clamped.y) return;
      lastSentRef.current = clamped;
      onPointer(kind, clamped.x, clamped.y);
    },
    [imageWidth, imageHeight, onPointer]
  );

  const handleMouseDown = (e: Konva.KonvaEventObject<MouseEvent>): void => {
    if (disabled || !image || e.evt.button !== 0) return;
    const pos = getImagePosition(e);
    if (!pos || pos.x > imageWidth || pos.y > imageHeight) return;

    pressedRef.current = true;
    send('press', pos.x, pos.y);
  };

  const handleMouseMove = (e: Konva.KonvaEventObject<MouseEvent>): void => {
    if (!pressedRef.current) return;
    const pos = getImagePosition(e);
    if (pos) send('move', pos.x, pos.y);
  };

  const handleMouseUp = (e: Konva.KonvaEventObject<MouseEvent>): void => {
    if (!pressedRef.current) return;
    pressedRef.current = false;
    const pos = getImagePosition(e) ?? lastSentRef.current;
    if (pos) send('release', pos.x, pos.y);
  };

  const toRect = (box: BoundingBox): { x: number; y: number; width: number; height: number } => ({
    x: box.xmin,
    y: box.ymin,
    width: box.xmax - box.xmin,
    height: box.ymax - box.ymin,
  });

  return (
    <div ref={containerRef} className="relative h-full w-full overflow-hidden bg-gray-100 dark:bg-gray-900">
      <Stage
        width={stageSize.width}
        height={stageSize.height}
        scaleX={scale}
        scaleY={scale}
        onMouseDown={handleMouseDown}
        onMouseMove={handleMouseMove}
        onMouseUp={handleMouseUp}
        onMouseLeave={handleMouseUp}
        style={{ cursor: disabled ? 'default' : 'crosshair' }}
      >
        <Layer>
          {image && (
            <>
              <KonvaImage image={image} />
              <Rect
                x={0}
                y={0}
                width={imageWidth}
                height={imageHeight}
                stroke={IMAGE_FRAME_COLOR}
                strokeWidth={2}
                strokeScaleEnabled={false}
                listening={false}
              />
            </>
          )}
          {boxes.map(({ box }, index) => {
            const rect = toRect(box);
            return (
              <Rect
                key={`box-${index}`}
                {...rect}
                stroke={style.color}
                strokeWidth={style.thickness}
                strokeScaleEnabled={false}
                listening={false}
              />
            );
          })}
          {boxes.map(({ label, box }, index) => (
            <Text
              key={`label-${index}`}
              x={box.xmin}
              y={box.ymin - 16 / scale}
              text={label}
              fontSize={13 / scale}
              fill={style.color}
              fontStyle="bold"
              listening={false}
            />
          ))}
          {/* Drawing rectangle */}
          {inProgress && (
            <Rect
              {...toRect(inProgress)}
              stroke={style.color}
              strokeWidth={style.thickness}
              strokeScaleEnabled={false}
              dash={[5, 5]}
              listening={false}
            />
          )}
        </Layer>
      </Stage>
    </div>
  );
}
