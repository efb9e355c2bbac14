import sharp from 'sharp';
import type { PreparedImage } from '../types/index.js';
import { IMAGE_STORAGE_CONFIG, getFileSizeMB, validateFileSize, type ImageStorageConfig } from '../config/imageStorage.js';
import { ValidationError } from './errors.js';

/**
 * ImageUtils - image preparation ahead of the vision model
 */
export class ImageUtils {

  /**
   * Decode the upload, fix EXIF orientation, cap its dimensions and re-encode as JPEG.
   * @throws ValidationError for empty, oversized or undecodable input
   */
  static async prepareImage(bytes: Buffer, config: ImageStorageConfig = IMAGE_STORAGE_CONFIG): Promise<PreparedImage> {
    if (bytes.length === 0) {
      throw new ValidationError('Image is empty');
    }

    if (!validateFileSize(bytes, config)) {
      throw new ValidationError(
        `Image too large: ${getFileSizeMB(bytes).toFixed(2)}MB (max: ${config.maxFileSizeMB}MB)`,
        { maxFileSizeMB: config.maxFileSizeMB }
      );
    }

    let output: { data: Buffer; info: sharp.OutputInfo };
    try {
      output = await sharp(bytes)
        .rotate()
        .resize(config.maxWidth, config.maxHeight, {
          fit: 'inside',
          withoutEnlargement: true
        })
        .jpeg({
          quality: config.compressionQuality,
          progressive: true
        })
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      console.error('❌ [IMAGE UTILS] Could not decode image:', error instanceof Error ? error.message : error);
      throw new ValidationError('Uploaded file is not a readable image');
    }

    return {
      buffer: output.data,
      base64: output.data.toString('base64'),
      mimeType: 'image/jpeg',
      width: output.info.width,
      height: output.info.height
    };
  }

  /**
   * Strip a data URL prefix, returning the raw base64 payload.
   */
  static toRawBase64(imageData: string): string {
    if (imageData.startsWith('data:')) {
      const base64Data = imageData.split(',')[1];
      if (!base64Data) throw new ValidationError('Invalid data URL format');
      return base64Data;
    }
    return imageData;
  }
}
