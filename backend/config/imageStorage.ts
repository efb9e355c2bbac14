/**
 * Image Storage Configuration
 * Settings for image uploads, compression, size limits and object naming
 */

export interface ImageStorageConfig {
  // Size limits
  maxFileSizeMB: number;
  maxWidth: number;
  maxHeight: number;

  // Compression settings
  compressionQuality: number;

  // Storage settings
  defaultContentType: string;
  signedUrlExpirySeconds: number;

  // File naming
  filenamePrefix: string;
  filenameSuffix: string;
}

export const IMAGE_STORAGE_CONFIG: ImageStorageConfig = {
  // Size limits (in MB)
  maxFileSizeMB: 10,

  // Image dimensions (pixels)
  maxWidth: 2048,
  maxHeight: 2048,

  // Compression settings (1-100)
  compressionQuality: 85,

  // Storage settings
  defaultContentType: 'image/jpeg',
  signedUrlExpirySeconds: 3600,

  // File naming
  filenamePrefix: 'question-images',
  filenameSuffix: '.jpg'
};

/**
 * Validate file size against configured limits
 */
export const validateFileSize = (buffer: Buffer, config: ImageStorageConfig = IMAGE_STORAGE_CONFIG): boolean => {
  return getFileSizeMB(buffer) <= config.maxFileSizeMB;
};

/**
 * Get file size in MB
 */
export const getFileSizeMB = (buffer: Buffer): number => {
  return buffer.length / (1024 * 1024);
};
