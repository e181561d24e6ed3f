/**
 * Toolpath Planner Service
 *
 * Expands machine-space polylines into pass-stepped motion. Order is layer order,
 * then path order; nothing is reordered. Each path gets one tool-on/tool-off
 * window, or one per pass when the profile asks for re-triggering.
 */
import { MotionInstruction, OperationProfile, Polyline } from '../types/toolpath.types';

export interface PlannedLayer {
  name: string;
  profile: OperationProfile;
  polylines: Polyline[];
}

export class ToolpathPlannerService {
  plan(layers: readonly PlannedLayer[]): MotionInstruction[] {
    const instructions: MotionInstruction[] = [];

    for (const layer of layers) {
      instructions.push({ type: 'comment', text: `Layer: ${layer.name}` });
      for (const polyline of layer.polylines) {
        instructions.push(...this.planPolyline(polyline, layer.profile));
      }
    }

    return instructions;
  }

  planPolyline(polyline: Polyline, profile: OperationProfile): MotionInstruction[] {
    const [start, ...rest] = polyline.points;
    if (!start || rest.length === 0) return [];

    const targets = polyline.closed ? [...rest, start] : rest;
    const instructions: MotionInstruction[] = [];

    for (let pass = 0; pass < profile.passes; pass++) {
      const depth = profile.passDepth * pass;
      const engage = pass === 0 || profile.retriggerPerPass;

      instructions.push({ type: 'travel', to: start });

      if (engage) {
        instructions.push({ type: 'tool-on' });
        if (profile.dwellTime > 0) {
          instructions.push({ type: 'dwell', ms: profile.dwellTime });
        }
      }

      for (const to of targets) {
        instructions.push({ type: 'cut', to, depth });
      }

      if (profile.retriggerPerPass) {
        instructions.push({ type: 'tool-off' });
      }
    }

    if (!profile.retriggerPerPass) {
      instructions.push({ type: 'tool-off' });
    }

    return instructions;
  }
}
