import sharp from 'sharp';
import { ImageUtils } from './ImageUtils.js';
import { IMAGE_STORAGE_CONFIG } from '../config/imageStorage.js';
import { ValidationError } from './errors.js';

describe('ImageUtils', () => {
  const png = (width: number, height: number) => sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 220, b: 240 } }
  }).png().toBuffer();

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('prepareImage', () => {
    it('should re-encode the upload as JPEG', async () => {
      const prepared = await ImageUtils.prepareImage(await png(40, 20));

      expect(prepared.mimeType).toBe('image/jpeg');
      expect(prepared.width).toBe(40);
      expect(prepared.height).toBe(20);
      expect([...prepared.buffer.subarray(0, 2)]).toEqual([0xff, 0xd8]);
      expect(prepared.base64).toBe(prepared.buffer.toString('base64'));
    });

    it('should shrink to fit inside the configured box', async () => {
      const prepared = await ImageUtils.prepareImage(await png(40, 20), { ...IMAGE_STORAGE_CONFIG, maxWidth: 10, maxHeight: 10 });

      expect(prepared.width).toBe(10);
      expect(prepared.height).toBe(5);
    });

    it('should not enlarge small images', async () => {
      const prepared = await ImageUtils.prepareImage(await png(8, 6));

      expect(prepared.width).toBe(8);
      expect(prepared.height).toBe(6);
    });

    it('should reject an empty buffer', async () => {
      await expect(ImageUtils.prepareImage(Buffer.alloc(0))).rejects.toThrow(new ValidationError('Image is empty'));
    });

    it('should reject bytes that are not an image', async () => {
      await expect(ImageUtils.prepareImage(Buffer.from('not an image')))
        .rejects.toThrow(new ValidationError('Uploaded file is not a readable image'));
    });

    it('should reject files over the size limit', async () => {
      const image = await png(40, 20);
      const config = { ...IMAGE_STORAGE_CONFIG, maxFileSizeMB: 1 / (1024 * 1024) };

      await expect(ImageUtils.prepareImage(image, config)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('toRawBase64', () => {
    it('should strip a data URL prefix', () => {
      expect(ImageUtils.toRawBase64('data:image/png;base64,AAAA')).toBe('AAAA');
    });

    it('should pass raw base64 through', () => {
      expect(ImageUtils.toRawBase64('AAAA')).toBe('AAAA');
    });

    it('should reject a data URL without payload', () => {
      expect(() => ImageUtils.toRawBase64('data:image/png;base64,')).toThrow(ValidationError);
    });
  });
});
