import { useEffect, useCallback } from 'react';
import { AnnotationCanvas, AnnotationList, Toolbar, ToastContainer } from '@/components';
import { useSession, useToast } from '@/hooks';
import { getImageUrl } from '@/lib/api';
import { COMMAND_KEYS, FRAME_RETRY_MS, KEY_FOR_COMMAND } from '@/lib/constants';
import type { PointerEventKind, SessionCommand } from '@/types';

const SHORTCUTS: Array<{ key: string; action: string }> = [
  { key: 'N', action: 'Next' },
  { key: 'P', action: 'Previous' },
  { key: 'U', action: 'Undo' },
  { key: 'C', action: 'Clear' },
  { key: 'Q', action: 'Save & quit' },
];

function App(): JSX.Element {
  const { frame, loading, error, closed, loadFrame, sendEvent, sendKey } = useSession();
  const { toasts, addToast, removeToast } = useToast();

  // Load the first frame, then keep asking until the session has rendered one
  useEffect(() => {
    void loadFrame();
  }, [loadFrame]);

  useEffect(() => {
    if (frame || closed || loading) return;
    const timer = setTimeout(() => {
      void loadFrame();
    }, FRAME_RETRY_MS);
    return () => clearTimeout(timer);
  }, [frame, closed, loading, loadFrame]);

  // Surface request failures once a frame is on screen
  const hasFrame = frame !== null;
  useEffect(() => {
    if (error && hasFrame) {
      addToast(error, 'error');
    }
  }, [error, hasFrame, addToast]);

  const runCommand = useCallback(
    (command: SessionCommand): void => {
      void sendKey(KEY_FOR_COMMAND[command]);
    },
    [sendKey]
  );

  const handlePointer = useCallback(
    (kind: PointerEventKind, x: number, y: number): void => {
      void sendEvent({ kind, x, y });
    },
    [sendEvent]
  );

  // Keyboard shortcuts
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent): void => {
      if (closed || e.metaKey || e.ctrlKey || e.altKey) return;
      const key = e.key.toLowerCase();
      if (COMMAND_KEYS[key] === undefined) return;
      e.preventDefault();
      void sendKey(key);
    };

    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [closed, sendKey]);

  return (
    <div className="flex h-screen flex-col bg-white dark:bg-gray-900">
      {/* Header */}
      <header className="flex items-center justify-between border-b border-gray-200 bg-white px-4 py-3 dark:border-gray-700 dark:bg-gray-800">
        <h1 className="bg-gradient-to-r from-primary-500 via-purple-500 to-pink-500 bg-clip-text text-xl font-extrabold tracking-tight text-transparent">
          VOC Box Annotator
        </h1>
        <span className="text-sm text-gray-600 dark:text-gray-300">
          {frame ? `${frame.width} × ${frame.height}` : ''}
        </span>
      </header>

      <Toolbar
        label={frame?.label ?? ''}
        imageName={frame?.imageName ?? ''}
        imageIndex={frame?.imageIndex ?? 0}
        imageCount={frame?.imageCount ?? 0}
        dirty={frame?.dirty ?? false}
        disabled={closed || !frame}
        onPrevImage={() => runCommand('previous')}
        onNextImage={() => runCommand('next')}
        onUndo={() => runCommand('undo')}
        onClearAnnotations={() => runCommand('clear')}
        onQuit={() => runCommand('quit')}
      />

      <div className="flex flex-1 overflow-hidden">
        {/* Canvas */}
        <main className="relative flex-1">
          {frame ? (
            <AnnotationCanvas
              imageUrl={getImageUrl(frame.imageIndex)}
              imageWidth={frame.width}
              imageHeight={frame.height}
              boxes={frame.boxes}
              inProgress={frame.inProgress}
              style={frame.style}
              disabled={closed}
              onPointer={handlePointer}
            />
          ) : (
            !closed && (
              <div className="flex h-full items-center justify-center text-sm text-gray-500 dark:text-gray-400">
                Waiting for the session…
              </div>
            )
          )}

          {closed && (
            <div className="absolute inset-0 flex items-center justify-center bg-gray-900/60">
              <div className="rounded-lg bg-white px-6 py-4 text-center shadow-lg dark:bg-gray-800">
                <h2 className="text-lg font-semibold text-gray-900 dark:text-white">Session ended</h2>
                <p className="mt-1 text-sm text-gray-600 dark:text-gray-300">
                  Annotations are saved. You can close this tab.
                </p>
              </div>
            </div>
          )}
        </main>

        {/* Right sidebar - Boxes */}
        <aside className="flex w-64 flex-col border-l border-gray-200 bg-white dark:border-gray-700 dark:bg-gray-800">
          <div className="border-b border-gray-200 p-3 dark:border-gray-700">
            <h2 className="text-sm font-semibold text-gray-700 dark:text-gray-300">
              Boxes ({frame?.boxes.length ?? 0})
            </h2>
          </div>
          <div className="flex-1 overflow-y-auto">
            <AnnotationList boxes={frame?.boxes ?? []} color={frame?.style.color ?? '#00ff00'} />
          </div>
        </aside>
      </div>

      {/* Status bar */}
      <footer className="border-t border-gray-200 bg-gradient-to-r from-gray-50 to-gray-100 px-4 py-2 text-xs dark:border-gray-700 dark:from-gray-800 dark:to-gray-900">
        <div className="flex items-center gap-6">
          {SHORTCUTS.map(({ key, action }) => (
            <div key={key} className="flex items-center gap-1.5">
              <kbd className="rounded-md border border-gray-300 bg-white px-1.5 py-0.5 font-mono text-[10px] font-medium text-gray-600 shadow-sm dark:border-gray-600 dark:bg-gray-700 dark:text-gray-300">
                {key}
              </kbd>
              <span className="text-gray-500 dark:text-gray-400">{action}</span>
            </div>
          ))}
        </div>
      </footer>

      {/* Toast notifications */}
      <ToastContainer toasts={toasts} onRemove={removeToast} />
    </div>
  );
}

export default App;
