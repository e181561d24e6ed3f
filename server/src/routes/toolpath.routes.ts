import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { upload } from '../config/multer';
import { CombineJobService } from '../services/combine-job.service';
import { ToolpathCompilerService } from '../services/compiler.service';
import { ConfigService, OptionSource, isOptionSource } from '../services/config.service';
import { DrawingService } from '../services/drawing.service';
import { GcodeEmitterService } from '../services/gcode-emitter.service';
import {
  CombineJobError,
  ConfigurationError,
  InvalidDrawingError,
  MergeError,
} from '../errors/toolpath.errors';
import { Drawing } from '../types/toolpath.types';

const router = Router();
const configService = new ConfigService();
const drawingService = new DrawingService();
const compiler = new ToolpathCompilerService();
const emitter = new GcodeEmitterService();
const combineJobService = new CombineJobService();

interface JobRequest {
  drawing: Drawing;
  options: OptionSource;
}

function readJob(body: unknown): JobRequest {
  if (!isOptionSource(body)) {
    throw new InvalidDrawingError('body', 'must be an object with "drawing" and "options"');
  }

  const options = body.options ?? {};
  if (!isOptionSource(options)) {
    throw new ConfigurationError('options', 'must be an object');
  }

  return { drawing: drawingService.readDrawing(body.drawing), options };
}

function splitTemplate(file: Express.Multer.File | undefined): string[] | undefined {
  if (!file) return undefined;
  const lines = file.buffer.toString('utf-8').split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function sendError(res: Response, jobId: string, error: unknown): Response {
  if (error instanceof ConfigurationError) {
    return res.status(400).json({ jobId, error: error.message, parameter: error.parameter });
  }
  if (error instanceof InvalidDrawingError) {
    return res.status(400).json({ jobId, error: error.message, parameter: error.location });
  }
  if (error instanceof CombineJobError) {
    return res.status(400).json({ jobId, error: error.message, layer: error.layer });
  }
  if (error instanceof SyntaxError) {
    return res.status(400).json({ jobId, error: `Malformed job JSON: ${error.message}` });
  }
  if (error instanceof MergeError) {
    return res.status(422).json({ jobId, error: error.message, parameter: error.parameter });
  }

  console.error(`[Toolpath] Job ${jobId} failed:`, error);
  return res.status(500).json({ jobId, error: error instanceof Error ? error.message : String(error) });
}

/**
 * Compile one layer selection with one operation profile
 */
router.post('/compile', (req: Request, res: Response) => {
  const jobId = uuidv4();

  try {
    const { drawing, options } = readJob(req.body);
    const config = configService.buildCompilerConfig(options);
    console.log(`[Toolpath] Compile job ${jobId}: ${drawing.layers.length} layers, filter [${config.layers.join(', ')}]`);

    const result = compiler.compile(drawing, config);

    res.json({
      jobId,
      gcode: emitter.render(result.program),
      instructions: result.instructions,
      layers: result.layers,
      boundingBox: result.boundingBox,
      estimatedDuration: result.estimatedDuration,
      warnings: result.warnings,
    });
  } catch (error) {
    sendError(res, jobId, error);
  }
});

/**
 * Engrave + cut job. Accepts JSON, or multipart with a "job" JSON field
 * and optional "header"/"footer" template files.
 */
router.post(
  '/combine',
  upload.fields([
    { name: 'header', maxCount: 1 },
    { name: 'footer', maxCount: 1 },
  ]),
  (req: Request, res: Response) => {
    const jobId = uuidv4();

    try {
      const raw: unknown = req.body;
      const body: unknown = isOptionSource(raw) && typeof raw.job === 'string' ? JSON.parse(raw.job) : raw;
      const { drawing, options } = readJob(body);

      const files: Record<string, Express.Multer.File[]> =
        req.files && !Array.isArray(req.files) ? req.files : {};
      const header = splitTemplate(files.header?.[0]);
      const footer = splitTemplate(files.footer?.[0]);

      console.log(
        `[Toolpath] Combine job ${jobId}: ${drawing.layers.length} layers` +
        `${header ? `, header ${header.length} lines` : ''}${footer ? `, footer ${footer.length} lines` : ''}`
      );

      const { result, gcode, summary } = combineJobService.combine(drawing, {
        ...options,
        ...(header ? { header } : {}),
        ...(footer ? { footer } : {}),
      });

      res.json({
        jobId,
        gcode,
        summary,
        layers: result.layers,
        boundingBox: result.boundingBox,
        estimatedDuration: result.estimatedDuration,
        warnings: result.warnings,
      });
    } catch (error) {
      sendError(res, jobId, error);
    }
  }
);

export const toolpathRouter = router;
