import { NextFunction, Request, Response } from 'express';
import multer from 'multer';

/**
 * Final error middleware: client mistakes the routes never see (uploads, JSON bodies) are 400s
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  console.error('Error occurred:', err);

  if (res.headersSent) {
    return next(err);
  }

  // Template uploads that are too large or of the wrong type
  if (err instanceof multer.MulterError) {
    return res.status(400).json({
      error: 'File upload error',
      message: err.message,
      code: err.code,
      field: err.field
    });
  }

  // Malformed JSON bodies rejected by express.json
  if (err instanceof SyntaxError) {
    return res.status(400).json({ error: 'Malformed JSON', message: err.message });
  }

  res.status(500).json({
    error: 'Internal Server Error',
    message: err instanceof Error ? err.message : String(err)
  });
}
