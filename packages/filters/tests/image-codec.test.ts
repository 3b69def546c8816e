import { describe, expect, test } from 'vitest';
import { PngImageCodec } from '../src/image-codec.js';
import { PNG_1X1, pngImage } from './fakes.js';

describe('PngImageCodec', () => {
  const codec = new PngImageCodec();

  test('encodes PNG clipboard images as base64', async () => {
    expect(await codec.toPngBase64(pngImage())).toBe(PNG_1X1);
  });

  test('refuses images that are not PNG', async () => {
    const jpeg = { data: new Uint8Array([0xff, 0xd8, 0xff, 0xe0]), mimeType: 'image/jpeg' };
    await expect(codec.toPngBase64(jpeg)).rejects.toMatchObject({
      name: 'AcquisitionError',
      code: 'IMAGE_ENCODE_FAILED',
      message: 'Clipboard image is image/jpeg, not PNG',
    });
  });

  test('decodes base64 images with their detected type', async () => {
    const image = await codec.fromBase64(PNG_1X1);
    expect(image?.mimeType).toBe('image/png');
    expect(image?.data).toEqual(pngImage().data);
  });

  test('returns null for data that is not an image', async () => {
    expect(await codec.fromBase64('SGVsbG8=')).toBeNull();
    expect(await codec.fromBase64('%%%')).toBeNull();
  });
});
