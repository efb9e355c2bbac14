import type { NextFunction, Request, Response } from 'express';
import type { AnalysisPipeline } from '../services/AnalysisPipeline.js';
import { isRecord } from '../services/ai/JsonUtils.js';
import { ValidationError } from '../utils/errors.js';

export class UploadController {
  constructor(
    private readonly pipeline: AnalysisPipeline,
    private readonly defaultTargetLanguage: string
  ) {}

  /**
   * POST /upload - multipart image in field `file`, optional `target_language`
   */
  uploadImage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const file = req.file;
      if (!file || file.buffer.length === 0) {
        throw new ValidationError('An image file is required in field "file"');
      }
      if (!file.mimetype.startsWith('image/')) {
        throw new ValidationError(`Unsupported file type: ${file.mimetype}`);
      }

      const body: unknown = req.body;
      const requested = isRecord(body) && typeof body.target_language === 'string' && body.target_language.trim() !== ''
        ? body.target_language
        : this.defaultTargetLanguage;

      console.log(`📥 [UPLOAD] Processing ${file.originalname} (${file.size} bytes, target: ${requested})`);
      const result = await this.pipeline.submitImage(file.buffer, requested, {
        contentType: file.mimetype,
        filename: file.originalname
      });

      res.status(201).json({
        success: true,
        message: 'Image processed successfully',
        data: {
          question: result.question,
          translation: result.translation
        }
      });
    } catch (error) {
      next(error);
    }
  };
}
