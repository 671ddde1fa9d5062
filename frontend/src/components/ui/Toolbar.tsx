interface ToolbarProps {
  label: string;
  imageName: string;
  imageIndex: number;
  imageCount: number;
  dirty: boolean;
  disabled: boolean;
  onPrevImage: () => void;
  onNextImage: () => void;
  onUndo: () => void;
  onClearAnnotations: () => void;
  onQuit: () => void;
}

const BUTTON_CLASS =
  'rounded-lg border border-gray-300 bg-white px-3 py-1.5 text-sm font-medium text-gray-700 hover:bg-gray-50 disabled:opacity-50 dark:border-gray-600 dark:bg-gray-700 dark:text-gray-200 dark:hover:bg-gray-600';

/**
 * Main toolbar with the session label, navigation and edit commands.
 */
export function Toolbar({
  label,
  imageName,
  imageIndex,
  imageCount,
  dirty,
  disabled,
  onPrevImage,
  onNextImage,
  onUndo,
  onClearAnnotations,
  onQuit,
}: ToolbarProps): JSX.Element {
  return (
    <div className="flex items-center justify-between border-b border-gray-200 bg-white px-4 py-2 dark:border-gray-700 dark:bg-gray-800">
      {/* Label & image */}
      <div className="flex items-center gap-3">
        <span className="text-sm text-gray-600 dark:text-gray-300">Label:</span>
        <span className="rounded-full bg-primary-50 px-3 py-1 text-sm font-semibold text-primary-700 dark:bg-primary-900/30 dark:text-primary-300">
          {label}
        </span>
        <span className="text-sm text-gray-500 dark:text-gray-400">{imageName}</span>
        {dirty && (
          <span className="text-xs font-medium text-amber-600 dark:text-amber-400" title="Saved when you leave this image">
            unsaved
          </span>
        )}
      </div>

      {/* Navigation & Actions */}
      <div className="flex items-center gap-2">
        <button
          onClick={onPrevImage}
          disabled={disabled || imageCount === 0}
          className={BUTTON_CLASS}
          title="Previous image (p)"
        >
          ← Prev
        </button>
        <span className="min-w-[80px] text-center text-sm text-gray-600 dark:text-gray-300">
          {imageCount > 0 ? `${imageIndex + 1} / ${imageCount}` : '0 / 0'}
        </span>
        <button
          onClick={onNextImage}
          disabled={disabled || imageCount === 0}
          className={BUTTON_CLASS}
          title="Next image (n)"
        >
          Next →
        </button>

        <div className="mx-2 h-6 w-px bg-gray-200 dark:bg-gray-600" />

        <button onClick={onUndo} disabled={disabled} className={BUTTON_CLASS} title="Remove the last box (u)">
          Undo
        </button>
        <button
          onClick={onClearAnnotations}
          disabled={disabled}
          className={BUTTON_CLASS}
          title="Remove every box of this image (c)"
        >
          Clear
        </button>

        <div className="mx-2 h-6 w-px bg-gray-200 dark:bg-gray-600" />

        <button
          onClick={onQuit}
          disabled={disabled}
          className="rounded-lg bg-primary-600 px-4 py-1.5 text-sm font-medium text-white hover:bg-primary-700 disabled:opacity-50"
          title="Save and end the session (q)"
        >
          Quit
        </button>
      </div>
    </div>
  );
}
