import { Router } from "express";
import multer from "multer";
import express from "express";
import { createUploadController } from "../controllers/uploadController.js";
import { SUPPORTED_EXTENSIONS } from "../lib/fileParser.js";
import type { AppContext } from "../services/context.js";

const ALLOWED_MIME_TYPES = [
  'text/csv',
  'application/vnd.ms-excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
];
const EXTENSION_PATTERN = new RegExp(`\\.(${SUPPORTED_EXTENSIONS.join('|')})$`, 'i');

export function createUploadRoutes(context: AppContext): Router {
  const { maxUploadMb, uploadDir } = context.config;
  const { uploadFile } = createUploadController(context);

  // Disk storage: the stored path keys the schema analysis cache
  const upload = multer({
    storage: multer.diskStorage({
      destination: uploadDir,
      filename: (req, file, cb) => {
        cb(null, `${Date.now()}-${file.originalname.replace(/[^\w.-]/g, '_')}`);
      },
    }),
    limits: {
      fileSize: maxUploadMb * 1024 * 1024,
    },
    fileFilter: (req: express.Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
      if (ALLOWED_MIME_TYPES.includes(file.mimetype) || EXTENSION_PATTERN.test(file.originalname)) {
        cb(null, true);
      } else {
        cb(new Error('Invalid file type. Please upload CSV or Excel files.'));
      }
    },
  });

  const router = Router();

  router.post('/upload', upload.single('file'), (err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    // Handle multer errors
    if (err instanceof multer.MulterError) {
      if (err.code === 'LIMIT_FILE_SIZE') {
        return res.status(400).json({
          error: 'File too large',
          message: `File size exceeds the maximum limit of ${maxUploadMb}MB.`,
          maxSize: `${maxUploadMb}MB`,
        });
      }
      return res.status(400).json({ error: 'Upload error', message: err.message });
    }
    // Handle other errors
    if (err) {
      return res.status(400).json({ error: 'Upload error', message: err instanceof Error ? err.message : String(err) });
    }
    next();
  }, uploadFile);

  return router;
}
