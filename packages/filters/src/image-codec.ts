import {
  AcquisitionError,
  ErrorCodes,
  base64ToBytes,
  bytesToBase64,
  detectImageMimeType,
  isPng,
} from '@clipfilter/core';
import type { EncodedImage, ImageCodec } from '@clipfilter/core';

/**
 * Codec for encoded image bytes. Clipboard images must already be PNG;
 * decoded results keep whatever image format the API returned.
 */
export class PngImageCodec implements ImageCodec<EncodedImage> {
  async toPngBase64(image: EncodedImage): Promise<string> {
    if (!isPng(image.data)) {
      throw new AcquisitionError(
        ErrorCodes.IMAGE_ENCODE_FAILED,
        `Clipboard image is ${image.mimeType}, not PNG`
      );
    }
    return bytesToBase64(image.data);
  }

  /**
   * @returns The image, or null when the data is not base64 or not an image format
   */
  async fromBase64(base64: string): Promise<EncodedImage | null> {
    const data = base64ToBytes(base64);
    if (!data) return null;
    const mimeType = await detectImageMimeType(data);
    return mimeType ? { data, mimeType } : null;
  }

  /** Byte buffers need no explicit release */
  release(): void {}
}
