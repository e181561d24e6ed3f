import { CombineJobService } from '../services/combine-job.service';
import { OperationPresetService } from '../services/operation-preset.service';
import { CombineJobError, ConfigurationError } from '../errors/toolpath.errors';
import { Drawing } from '../types/toolpath.types';
import { drawing, layer, squarePath } from './helpers/shape-generator.helper';

describe('CombineJobService', () => {
  let service: CombineJobService;

  const both: Drawing = drawing(
    layer('engrave', squarePath(5, 2, 2)),
    layer('cut', squarePath(20))
  );

  beforeEach(() => {
    service = new CombineJobService();
  });

  it('should engrave first, then cut, with the preset speeds and powers', () => {
    const { gcode } = service.combine(both, {}, false);

    expect(gcode.split('\n')).toEqual([
      'G21;',
      'G90;',
      'M5;',
      '; Layer: engrave',
      'G0 X2.000 Y2.000 F3000;',
      'M3 S75;',
      'G1 X7.000 Y2.000 F1000;',
      'G1 X7.000 Y7.000 F1000;',
      'G1 X2.000 Y7.000 F1000;',
      'G1 X2.000 Y2.000 F1000;',
      'M5;',
      '; ==========================================',
      '; Layer transition: engrave -> cut',
      '; ==========================================',
      '; Layer: cut',
      'G0 X0.000 Y0.000 F3000;',
      'M3 S255;',
      'G1 X20.000 Y0.000 F250;',
      'G1 X20.000 Y20.000 F250;',
      'G1 X0.000 Y20.000 F250;',
      'G1 X0.000 Y0.000 F250;',
      'M5;',
      'M5;',
      '',
    ]);
  });

  it('should summarise each layer and the total', () => {
    const { summary } = service.combine(both, {}, false);

    expect(summary.engrave).toEqual({
      layer: 'engrave',
      instructions: 8,
      lines: 12,
      cuttingSpeed: 1000,
      power: 75,
      powerPercent: 29,
    });
    expect(summary.cut).toEqual({
      layer: 'cut',
      instructions: 8,
      lines: 12,
      cuttingSpeed: 250,
      power: 255,
      powerPercent: 100,
    });
    expect(summary.totalLines).toBe(23);
  });

  it('should continue with the cut layer alone when there is nothing to engrave', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    try {
      const { gcode, summary, result } = service.combine(drawing(layer('cut', squarePath(20))), {}, false);

      expect(summary.engrave).toBeNull();
      expect(result.layers).toEqual(['cut']);
      expect(gcode.startsWith('G21;\nG90;\nM5;\n; Layer: cut\n')).toBe(true);
      expect(warn).toHaveBeenCalledWith('[Combine] Engrave layer not found; continuing with cut only');
    } finally {
      warn.mockRestore();
    }
  });

  it('should fail when the cut layer is missing', () => {
    expect(() => service.combine(drawing(layer('engrave', squarePath(5))), {}, false)).toThrow(
      new CombineJobError('cut', 'Cut layer "cut" is required but not found in the drawing')
    );
  });

  it('should fail when the cut layer has nothing to cut', () => {
    try {
      service.combine(drawing(layer('engrave', squarePath(5)), layer('cut')), {}, false);
      throw new Error('expected the combine job to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(CombineJobError);
      expect(error instanceof CombineJobError ? error.layer : undefined).toBe('cut');
      expect(error instanceof Error ? error.message : '').toContain('found but contains no paths to process');
    }
  });

  it('should honour custom layer names, speeds and powers', () => {
    const { gcode, summary } = service.combine(
      drawing(layer('Etch', squarePath(5)), layer('Outline', squarePath(10))),
      { engraveLayer: 'Etch', cutLayer: 'Outline', cutCuttingSpeed: 300, cutPower: 200, engravePower: 0 },
      false
    );

    expect(gcode).toContain('M3 S200;\nG1 X10.000 Y0.000 F300;');
    expect(gcode).toContain('M3 S0;');
    expect(summary.cut.powerPercent).toBe(78);
    expect(summary.engrave?.layer).toBe('Etch');
  });

  it('should pass shared options to both runs', () => {
    const { gcode } = service.combine(both, { header: ['; job start'], moveToOriginEnd: true }, false);

    expect(gcode.startsWith('; job start\nG21;')).toBe(true);
    expect(gcode.endsWith('M5;\nG0 X0 Y0;\n')).toBe(true);
  });

  it('should reject an out-of-range power before compiling anything', () => {
    try {
      service.combine(both, { engravePower: 300 }, false);
      throw new Error('expected the combine job to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.parameter : undefined).toBe('engravePower');
    }
  });
});

describe('OperationPresetService', () => {
  it('should expose the engrave and cut presets', () => {
    expect(OperationPresetService.getPreset('engrave')).toMatchObject({ layer: 'engrave', cuttingSpeed: 1000, power: 75 });
    expect(OperationPresetService.getPreset('cut')).toMatchObject({ layer: 'cut', cuttingSpeed: 250, power: 255 });
  });

  it('should build a power command and reject fractional power', () => {
    expect(OperationPresetService.powerCommand(128)).toBe('M3 S128;');
    expect(() => OperationPresetService.powerCommand(12.5, 'cutPower')).toThrow('Invalid cutPower');
  });
});
