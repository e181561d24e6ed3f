import multer from 'multer';

export const MAX_TEMPLATE_BYTES = 256 * 1024;

/**
 * Header/footer templates are small text files, kept in memory
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_TEMPLATE_BYTES,
    files: 2,
  },
  fileFilter: (req, file, cb) => {
    if (file.mimetype.startsWith('text/') || file.mimetype === 'application/octet-stream') {
      cb(null, true);
    } else {
      console.warn(`[Toolpath] Rejected ${file.fieldname} template of type ${file.mimetype}`);
      cb(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
    }
  },
});
