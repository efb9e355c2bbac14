import { v4 as uuidv4 } from 'uuid';
import type { ImageStorage, UploadOptions } from '../types/index.js';
import type { StorageBucket } from '../config/firebase.js';
import { IMAGE_STORAGE_CONFIG, getFileSizeMB, type ImageStorageConfig } from '../config/imageStorage.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { ErrorHandler } from '../utils/errorHandler.js';

export interface StorageReference {
  bucket: string;
  objectName: string;
}

const PUBLIC_STORAGE_HOST = 'storage.googleapis.com';

/**
 * Parse `gs://bucket/key` or `https://storage.googleapis.com/bucket/key`.
 */
export function parseStorageReference(reference: string): StorageReference {
  const gsMatch = /^gs:\/\/([^/]+)\/(.+)$/.exec(reference);
  if (gsMatch) {
    return { bucket: gsMatch[1], objectName: gsMatch[2] };
  }

  let url: URL;
  try {
    url = new URL(reference);
  } catch {
    throw new ValidationError(`Unrecognized storage reference: ${reference}`);
  }

  if (url.protocol === 'https:' && url.hostname === PUBLIC_STORAGE_HOST) {
    const [, bucket, ...rest] = url.pathname.split('/');
    const objectName = decodeURIComponent(rest.join('/'));
    if (bucket && objectName) {
      return { bucket, objectName };
    }
  }
  throw new ValidationError(`Unrecognized storage reference: ${reference}`);
}

export function toStorageReference(bucket: string, objectName: string): string {
  return `gs://${bucket}/${objectName}`;
}

/**
 * `<prefix>/<uuid>_<yyyymmdd_hhmmss><suffix>`, timestamp in UTC.
 */
export function buildObjectName(config: ImageStorageConfig = IMAGE_STORAGE_CONFIG, now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`
    + `_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${config.filenamePrefix}/${uuidv4()}_${stamp}${config.filenameSuffix}`;
}

/**
 * Stores question images in Firebase Storage (a Google Cloud Storage bucket)
 */
export class FirebaseImageStorage implements ImageStorage {
  constructor(
    private readonly bucket: StorageBucket,
    private readonly config: ImageStorageConfig = IMAGE_STORAGE_CONFIG
  ) {}

  async upload(data: Buffer, options: UploadOptions = {}): Promise<string> {
    const objectName = buildObjectName(this.config);
    try {
      await this.bucket.file(objectName).save(data, {
        metadata: {
          contentType: options.contentType ?? this.config.defaultContentType,
          metadata: {
            originalFileName: options.filename ?? '',
            originalContentType: options.originalContentType ?? '',
            uploadedAt: new Date().toISOString(),
            sizeMB: getFileSizeMB(data).toFixed(2)
          }
        }
      });
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'uploading image');
    }

    const reference = toStorageReference(this.bucket.name, objectName);
    console.log(`✅ [IMAGE STORAGE] Uploaded ${reference}`);
    return reference;
  }

  async download(reference: string): Promise<Buffer> {
    const file = this.bucket.file(this.resolveObjectName(reference));
    try {
      const [exists] = await file.exists();
      if (!exists) {
        throw new NotFoundError('Image not found', { reference });
      }
      const [contents] = await file.download();
      return contents;
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'downloading image');
    }
  }

  async delete(reference: string): Promise<void> {
    const file = this.bucket.file(this.resolveObjectName(reference));
    try {
      await file.delete({ ignoreNotFound: true });
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'deleting image');
    }
  }

  async getSignedUrl(reference: string, expiresInSeconds: number = this.config.signedUrlExpirySeconds): Promise<string> {
    const file = this.bucket.file(this.resolveObjectName(reference));
    try {
      const [url] = await file.getSignedUrl({
        action: 'read',
        expires: Date.now() + expiresInSeconds * 1000
      });
      return url;
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'signing image URL');
    }
  }

  private resolveObjectName(reference: string): string {
    const parsed = parseStorageReference(reference);
    if (parsed.bucket !== this.bucket.name) {
      throw new ValidationError(`Image reference points at bucket ${parsed.bucket}, expected ${this.bucket.name}`);
    }
    return parsed.objectName;
  }
}

/**
 * Process-local image store for development runs and tests
 */
export class InMemoryImageStorage implements ImageStorage {
  private readonly objects = new Map<string, Buffer>();

  constructor(
    readonly bucketName: string = 'local-bucket',
    private readonly config: ImageStorageConfig = IMAGE_STORAGE_CONFIG
  ) {}

  get size(): number {
    return this.objects.size;
  }

  async upload(data: Buffer, _options: UploadOptions = {}): Promise<string> {
    const objectName = buildObjectName(this.config);
    this.objects.set(objectName, Buffer.from(data));
    return toStorageReference(this.bucketName, objectName);
  }

  async download(reference: string): Promise<Buffer> {
    const contents = this.objects.get(this.resolveObjectName(reference));
    if (!contents) {
      throw new NotFoundError('Image not found', { reference });
    }
    return Buffer.from(contents);
  }

  async delete(reference: string): Promise<void> {
    this.objects.delete(this.resolveObjectName(reference));
  }

  async getSignedUrl(reference: string, expiresInSeconds: number = this.config.signedUrlExpirySeconds): Promise<string> {
    const objectName = this.resolveObjectName(reference);
    if (!this.objects.has(objectName)) {
      throw new NotFoundError('Image not found', { reference });
    }
    return `https://${PUBLIC_STORAGE_HOST}/${this.bucketName}/${objectName}?X-Goog-Expires=${expiresInSeconds}`;
  }

  private resolveObjectName(reference: string): string {
    const parsed = parseStorageReference(reference);
    if (parsed.bucket !== this.bucketName) {
      throw new ValidationError(`Image reference points at bucket ${parsed.bucket}, expected ${this.bucketName}`);
    }
    return parsed.objectName;
  }
}
