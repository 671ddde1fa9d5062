import { DisplayClosedError } from '../errors';
import type { Display } from '../session/runSession';
import type { Frame, InputEvent } from '../types';

/** Something the display keeps running while it is open, e.g. an HTTP server */
export interface DisplayServer {
  close(): Promise<void>;
}

export interface BrowserDisplayOptions {
  /** Started by `open()`, stopped by `close()` */
  serve?: (display: BrowserDisplay) => Promise<DisplayServer>;
}

interface QueuedEvent {
  seq: number;
  event: InputEvent;
}

interface PendingPush {
  seq: number;
  resolve: (frame: Frame) => void;
  reject: (err: Error) => void;
}

/**
 * Display whose window is a browser page. The page reads the latest frame
 * and pushes input events; the session loop polls those events one at a
 * time.
 */
export class BrowserDisplay implements Display {
  private frame: Frame | null = null;
  private readonly queue: QueuedEvent[] = [];
  private readonly pending: PendingPush[] = [];
  private waiter: ((event: InputEvent | null) => void) | null = null;
  private server: DisplayServer | null = null;
  private pushed = 0;
  private polled = 0;
  private closed = false;

  constructor(private readonly options: BrowserDisplayOptions = {}) {}

  get currentFrame(): Frame | null {
    return this.frame;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async open(): Promise<void> {
    if (this.options.serve) {
      this.server = await this.options.serve(this);
    }
  }

  present(frame: Frame): void {
    this.frame = frame;

    // every event handed out by poll() has been dispatched by now
    let i = 0;
    while (i < this.pending.length) {
      const push = this.pending[i];
      if (push && push.seq <= this.polled) {
        this.pending.splice(i, 1);
        push.resolve(frame);
      } else {
        i += 1;
      }
    }
  }

  poll(timeoutMs: number): Promise<InputEvent | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const next = this.queue.shift();
    if (next) {
      this.polled = next.seq;
      return Promise.resolve(next.event);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (event) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(event);
      };
    });
  }

  /**
   * Queues an event from the page. Resolves with the first frame presented
   * after the event was dispatched.
   */
  push(event: InputEvent): Promise<Frame> {
    if (this.closed) {
      return Promise.reject(new DisplayClosedError());
    }

    this.pushed += 1;
    const seq = this.pushed;
    const result = new Promise<Frame>((resolve, reject) => {
      this.pending.push({ seq, resolve, reject });
    });

    if (this.waiter) {
      this.polled = seq;
      this.waiter(event);
    } else {
      this.queue.push({ seq, event });
    }
    return result;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.waiter?.(null);
    this.queue.length = 0;
    for (const push of this.pending.splice(0)) {
      push.reject(new DisplayClosedError());
    }

    const server = this.server;
    this.server = null;
    if (server) {
      await server.close();
    }
  }
}
