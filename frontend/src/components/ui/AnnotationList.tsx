import type { LabeledBox } from '@/types';

interface AnnotationListProps {
  boxes: LabeledBox[];
  color: string;
}

/**
 * List of boxes drawn on the current image, in drawing order.
 */
export function AnnotationList({ boxes, color }: AnnotationListProps): JSX.Element {
  if (boxes.length === 0) {
    return (
      <div className="p-4 text-center text-sm text-gray-500 dark:text-gray-400">
        No boxes yet. Drag on the image to draw one.
      </div>
    );
  }

  return (
    <ol className="flex flex-col gap-1 p-2">
      {boxes.map(({ label, box }, index) => (
        <li
          key={`${index}-${box.xmin}-${box.ymin}-${box.xmax}-${box.ymax}`}
          className="flex items-center gap-2 rounded-lg p-2 hover:bg-gray-50 dark:hover:bg-gray-700"
        >
          <div className="h-4 w-4 flex-shrink-0 rounded" style={{ backgroundColor: color }} />
          <div className="min-w-0 flex-1">
            <p className="text-sm font-medium text-gray-900 dark:text-gray-100">
              {index + 1}. {label}
            </p>
            <p className="text-xs text-gray-500 dark:text-gray-400">
              ({box.xmin}, {box.ymin}) – ({box.xmax}, {box.ymax})
            </p>
          </div>
        </li>
      ))}
    </ol>
  );
}
