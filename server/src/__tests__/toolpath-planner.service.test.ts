import { ToolpathPlannerService } from '../services/toolpath-planner.service';
import { MotionInstruction, Polyline } from '../types/toolpath.types';
import { countOf, profile, traversalDepths } from './helpers/shape-generator.helper';

const SQUARE: Polyline = {
  points: [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }],
  closed: true,
};

const STROKE: Polyline = {
  points: [{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 5 }],
  closed: false,
};

describe('ToolpathPlannerService', () => {
  let planner: ToolpathPlannerService;

  beforeEach(() => {
    planner = new ToolpathPlannerService();
  });

  describe('planPolyline', () => {
    it('should travel, switch on, cut back to the start of a closed polyline, then switch off', () => {
      const instructions = planner.planPolyline(SQUARE, profile());

      expect(instructions).toEqual<MotionInstruction[]>([
        { type: 'travel', to: { x: 0, y: 0 } },
        { type: 'tool-on' },
        { type: 'cut', to: { x: 10, y: 0 }, depth: 0 },
        { type: 'cut', to: { x: 10, y: 10 }, depth: 0 },
        { type: 'cut', to: { x: 0, y: 10 }, depth: 0 },
        { type: 'cut', to: { x: 0, y: 0 }, depth: 0 },
        { type: 'tool-off' },
      ]);
    });

    it('should not return to the start of an open polyline', () => {
      const instructions = planner.planPolyline(STROKE, profile());

      const cuts = instructions.filter(instruction => instruction.type === 'cut');
      expect(cuts).toHaveLength(2);
      expect(cuts[cuts.length - 1]).toEqual({ type: 'cut', to: { x: 5, y: 5 }, depth: 0 });
    });

    it('should step depth by passDepth on every pass', () => {
      const instructions = planner.planPolyline(SQUARE, profile({ passes: 3, passDepth: 0.5 }));

      expect(traversalDepths(instructions)).toEqual([0, 0.5, 1]);
      expect(countOf(instructions, 'travel')).toBe(3);
      expect(countOf(instructions, 'cut')).toBe(12);
    });

    it('should bracket all passes with one tool-on and one tool-off by default', () => {
      const instructions = planner.planPolyline(SQUARE, profile({ passes: 3 }));

      expect(countOf(instructions, 'tool-on')).toBe(1);
      expect(countOf(instructions, 'tool-off')).toBe(1);
      expect(instructions[1]).toEqual({ type: 'tool-on' });
      expect(instructions[instructions.length - 1]).toEqual({ type: 'tool-off' });
    });

    it('should re-trigger the tool on every pass when asked', () => {
      const instructions = planner.planPolyline(SQUARE, profile({ passes: 3, retriggerPerPass: true }));

      expect(countOf(instructions, 'tool-on')).toBe(3);
      expect(countOf(instructions, 'tool-off')).toBe(3);
      expect(instructions.slice(0, 2)).toEqual([{ type: 'travel', to: { x: 0, y: 0 } }, { type: 'tool-on' }]);
      expect(instructions.slice(6, 9)).toEqual([
        { type: 'tool-off' },
        { type: 'travel', to: { x: 0, y: 0 } },
        { type: 'tool-on' },
      ]);
    });

    it('should dwell after each tool-on when a dwell time is set', () => {
      const instructions = planner.planPolyline(SQUARE, profile({ dwellTime: 250 }));

      expect(instructions.slice(1, 3)).toEqual([{ type: 'tool-on' }, { type: 'dwell', ms: 250 }]);
      expect(countOf(instructions, 'dwell')).toBe(1);
    });

    it('should ignore polylines with fewer than two points', () => {
      expect(planner.planPolyline({ points: [{ x: 1, y: 1 }], closed: false }, profile())).toEqual([]);
      expect(planner.planPolyline({ points: [], closed: true }, profile())).toEqual([]);
    });
  });

  describe('plan', () => {
    it('should keep layer order and path order, with a comment per layer', () => {
      const instructions = planner.plan([
        { name: 'b', profile: profile(), polylines: [STROKE] },
        { name: 'a', profile: profile(), polylines: [SQUARE, STROKE] },
      ]);

      const comments = instructions.filter(instruction => instruction.type === 'comment');
      expect(comments).toEqual([
        { type: 'comment', text: 'Layer: b' },
        { type: 'comment', text: 'Layer: a' },
      ]);

      const travels = instructions.filter(instruction => instruction.type === 'travel');
      expect(travels).toHaveLength(3);
      expect(instructions[0]).toEqual({ type: 'comment', text: 'Layer: b' });
      expect(instructions[instructions.length - 1]).toEqual({ type: 'tool-off' });
    });

    it('should never emit a cut while the tool is off', () => {
      const instructions = planner.plan([
        { name: 'x', profile: profile({ passes: 2 }), polylines: [SQUARE, STROKE] },
        { name: 'y', profile: profile({ passes: 2, retriggerPerPass: true }), polylines: [SQUARE] },
      ]);

      let on = false;
      for (const instruction of instructions) {
        if (instruction.type === 'tool-on') on = true;
        if (instruction.type === 'tool-off') on = false;
        if (instruction.type === 'cut') expect(on).toBe(true);
      }
      expect(on).toBe(false);
    });
  });
});
