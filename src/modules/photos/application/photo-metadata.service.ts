import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';

const MAX_INPUT_PIXELS = 100_000_000;

const SHARP_INPUT_OPTIONS = {
  failOn: 'none' as const,
  limitInputPixels: MAX_INPUT_PIXELS,
};

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Reads pixel dimensions from image headers. Returns null instead of throwing
 * when the bytes cannot be parsed.
 */
@Injectable()
export class PhotoMetadataService {
  private readonly logger = new Logger(PhotoMetadataService.name);

  async extractDimensions(data: Buffer, mimeType: string): Promise<ImageDimensions | null> {
    if (data.length === 0) {
      return null;
    }

    try {
      const metadata = await sharp(data, SHARP_INPUT_OPTIONS).metadata();
      if (metadata.width && metadata.height) {
        return { width: metadata.width, height: metadata.height };
      }
      this.logger.debug(`No dimensions in ${mimeType} header`);
      return null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Could not read ${mimeType} dimensions: ${message}`);
      return null;
    }
  }
}
