/**
 * Upload Router
 * Image submission into the analysis pipeline
 */

import express from 'express';
import multer from 'multer';
import { UploadController } from '../controllers/UploadController.js';
import type { AnalysisPipeline } from '../services/AnalysisPipeline.js';
import { IMAGE_STORAGE_CONFIG } from '../config/imageStorage.js';

export function createUploadRouter(pipeline: AnalysisPipeline, defaultTargetLanguage: string): express.Router {
  // --- Configure Multer ---
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: IMAGE_STORAGE_CONFIG.maxFileSizeMB * 1024 * 1024,
      files: 1
    }
  });

  const router = express.Router();
  const controller = new UploadController(pipeline, defaultTargetLanguage);

  /**
   * POST /api/v1/upload
   */
  router.post('/', upload.single('file'), controller.uploadImage);

  return router;
}
