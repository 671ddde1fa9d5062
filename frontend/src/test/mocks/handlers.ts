import { http, HttpResponse } from 'msw';
import type { Frame, InputEvent } from '@/types';

// Mock data
export const mockFrame: Frame = {
  revision: 1,
  imageIndex: 0,
  imageCount: 3,
  imageName: 'kitchen.jpg',
  width: 640,
  height: 480,
  label: 'red roomba',
  boxes: [
    { label: 'red roomba', box: { xmin: 10, ymin: 20, xmax: 110, ymax: 90 } },
    { label: 'red roomba', box: { xmin: 200, ymin: 150, xmax: 260, ymax: 230 } },
  ],
  inProgress: null,
  dirty: false,
  style: { color: '#00ff00', thickness: 2 },
};

/** Frame the mock session answers with after handling `event` */
export function frameAfter(event: InputEvent): Frame {
  const next: Frame = { ...mockFrame, revision: mockFrame.revision + 1 };
  switch (event.kind) {
    case 'press':
    case 'move':
      return { ...next, inProgress: { xmin: 1, ymin: 1, xmax: event.x, ymax: event.y } };
    case 'release':
      return {
        ...next,
        dirty: true,
        boxes: [
          ...mockFrame.boxes,
          { label: mockFrame.label, box: { xmin: 1, ymin: 1, xmax: event.x, ymax: event.y } },
        ],
      };
    case 'key':
      return event.key === 'n' ? { ...next, imageIndex: 1, imageName: 'porch.jpg' } : next;
  }
}

function isInputEvent(value: unknown): value is InputEvent {
  return typeof value === 'object' && value !== null && 'kind' in value;
}

export const handlers = [
  http.get('/api/frame', () => {
    return HttpResponse.json(mockFrame);
  }),

  http.post('/api/events', async ({ request }) => {
    const body: unknown = await request.json();
    if (!isInputEvent(body)) {
      return HttpResponse.json({ detail: 'Invalid input event' }, { status: 400 });
    }
    return HttpResponse.json(frameAfter(body));
  }),

  http.get('/api/images/:index', () => {
    return HttpResponse.arrayBuffer(new ArrayBuffer(8), {
      headers: { 'Content-Type': 'image/jpeg' },
    });
  }),
];
