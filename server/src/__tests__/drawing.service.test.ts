import { DrawingService } from '../services/drawing.service';
import { InvalidDrawingError } from '../errors/toolpath.errors';

function rejectedLocation(value: unknown): string | undefined {
  try {
    new DrawingService().readDrawing(value);
  } catch (error) {
    if (error instanceof InvalidDrawingError) return error.location;
    throw error;
  }
  return undefined;
}

describe('DrawingService', () => {
  let service: DrawingService;

  beforeEach(() => {
    service = new DrawingService();
  });

  it('should read every segment type', () => {
    const drawing = service.readDrawing({
      unit: 'in',
      width: 4,
      height: 3,
      layers: [
        {
          name: 'cut',
          paths: [
            {
              segments: [
                { type: 'line', start: { x: 0, y: 0 }, end: { x: 1, y: 0 } },
                {
                  type: 'cubic',
                  start: { x: 1, y: 0 },
                  control1: { x: 1.5, y: 0 },
                  control2: { x: 2, y: 0.5 },
                  end: { x: 2, y: 1 },
                },
                { type: 'arc', start: { x: 2, y: 1 }, end: { x: 0, y: 1 }, radius: 1, sweep: 'ccw', largeArc: false },
              ],
            },
          ],
        },
      ],
    });

    expect(drawing.unit).toBe('in');
    expect(drawing.width).toBe(4);
    expect(drawing.layers[0].name).toBe('cut');
    expect(drawing.layers[0].paths[0].segments.map(segment => segment.type)).toEqual(['line', 'cubic', 'arc']);
    expect(drawing.layers[0].paths[0].segments[2]).toEqual({
      type: 'arc',
      start: { x: 2, y: 1 },
      end: { x: 0, y: 1 },
      radius: 1,
      sweep: 'ccw',
      largeArc: false,
    });
  });

  it('should allow unnamed layers and a missing unit', () => {
    const drawing = service.readDrawing({ layers: [{ paths: [] }] });

    expect(drawing.unit).toBeUndefined();
    expect(drawing.layers[0].name).toBeUndefined();
    expect(drawing.layers[0].paths).toEqual([]);
  });

  it('should drop properties it does not know', () => {
    const drawing = service.readDrawing({
      layers: [{ name: 'x', color: 'red', paths: [{ id: 7, segments: [{ type: 'line', start: { x: 0, y: 0 }, end: { x: 1, y: 1 } }] }] }],
    });

    expect(drawing.layers[0]).toEqual({
      name: 'x',
      paths: [{ segments: [{ type: 'line', start: { x: 0, y: 0 }, end: { x: 1, y: 1 } }] }],
    });
  });

  it.each<[string, unknown]>([
    ['drawing', null],
    ['drawing', []],
    ['drawing.layers', {}],
    ['drawing.unit', { unit: 'cm', layers: [] }],
    ['drawing.width', { width: '100', layers: [] }],
    ['drawing.layers[0].name', { layers: [{ name: 3, paths: [] }] }],
    ['drawing.layers[0].paths', { layers: [{ name: 'cut' }] }],
    ['drawing.layers[0].paths[0].segments', { layers: [{ paths: [{ segments: [] }] }] }],
    [
      'drawing.layers[0].paths[0].segments[0].type',
      { layers: [{ paths: [{ segments: [{ type: 'quad', start: { x: 0, y: 0 }, end: { x: 1, y: 1 } }] }] }] },
    ],
    [
      'drawing.layers[0].paths[0].segments[0].end.y',
      { layers: [{ paths: [{ segments: [{ type: 'line', start: { x: 0, y: 0 }, end: { x: 1, y: null } }] }] }] },
    ],
    [
      'drawing.layers[0].paths[0].segments[0].sweep',
      { layers: [{ paths: [{ segments: [{ type: 'arc', start: { x: 0, y: 0 }, end: { x: 1, y: 1 }, radius: 1, sweep: 'left' }] }] }] },
    ],
    [
      'drawing.layers[0].paths[0].segments[0].control2',
      { layers: [{ paths: [{ segments: [{ type: 'cubic', start: { x: 0, y: 0 }, control1: { x: 0, y: 1 }, end: { x: 1, y: 1 } }] }] }] },
    ],
  ])('should reject %s', (location, value) => {
    expect(rejectedLocation(value)).toBe(location);
  });

  it('should prefix the message with the location', () => {
    expect(() => service.readDrawing({ layers: [{ paths: [{ segments: [] }] }] })).toThrow(
      'drawing.layers[0].paths[0].segments: a path needs at least one segment'
    );
  });
});
