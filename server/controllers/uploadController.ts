import { Request, Response } from "express";
import { processUpload } from "../services/upload/upload.service.js";
import type { AppContext } from "../services/context.js";
import { sendError, sendServiceResult, sendValidationError } from "../utils/index.js";

export function createUploadController(context: AppContext) {
  const uploadFile = async (req: Request, res: Response) => {
    if (!req.file) {
      return sendValidationError(res, 'No file uploaded');
    }

    try {
      const result = await processUpload({ path: req.file.path, originalName: req.file.originalname }, context);
      sendServiceResult(res, result);
    } catch (error) {
      console.error('❌ Upload request failed:', error);
      sendError(res, 'Failed to process file');
    }
  };

  return { uploadFile };
}
