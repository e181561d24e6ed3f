/**
 * Layer Selector Service
 * Picks layers by exact, case-sensitive name and binds them to the run's operation profile
 */
import { CompileWarning, Layer, OperationProfile } from '../types/toolpath.types';

export const DEFAULT_LAYER_NAME = 'default';

export interface LayerSelection<T extends Layer = Layer> {
  layers: T[];
  warnings: CompileWarning[];
}

export interface BoundLayer<T extends Layer = Layer> {
  layer: T;
  name: string;
  profile: OperationProfile;
}

export class LayerSelectorService {
  layerName(layer: Layer): string {
    return layer.name ?? DEFAULT_LAYER_NAME;
  }

  /**
   * An empty filter selects every layer. Layers keep their original order either way.
   */
  select<T extends Layer>(layers: readonly T[], filter: readonly string[] = []): LayerSelection<T> {
    if (filter.length === 0) {
      return { layers: [...layers], warnings: [] };
    }

    const wanted = new Set(filter);
    const selected = layers.filter(layer => wanted.has(this.layerName(layer)));
    const warnings: CompileWarning[] = [];

    if (selected.length === 0) {
      const available = layers.map(layer => `"${this.layerName(layer)}"`).join(', ') || 'none';
      warnings.push({
        kind: 'selection',
        message: `No layer matches ${filter.map(name => `"${name}"`).join(', ')} (available: ${available})`,
      });
    }

    return { layers: selected, warnings };
  }

  bind<T extends Layer>(layers: readonly T[], profile: OperationProfile): BoundLayer<T>[] {
    return layers.map(layer => ({ layer, name: this.layerName(layer), profile }));
  }
}
