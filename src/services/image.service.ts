import * as fs from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import * as bmp from 'bmp-js';
import {
  IMAGE_FORMATS,
  type ImageFormat,
  type RasterImage,
  type RawFrame,
} from '../types/capture.types';
import { ConfigurationError, EncodingError, toCaptureError } from '../utils/errors';

const BMP_SIGNATURE = Buffer.from('BM', 'ascii');

const SHARP_FORMAT_NAMES: Record<ImageFormat, string> = {
  PNG: 'png',
  TIFF: 'tiff',
  BMP: 'bmp',
};

export interface EncodedImage {
  data: Buffer;
  width: number;
  height: number;
}

export interface ImageInfo {
  width: number;
  height: number;
  format: string;
  channels: number;
  mode: string;
  size: number;
}

export function parseImageFormat(value: string): ImageFormat {
  const normalized = value.trim().toUpperCase();
  const format = IMAGE_FORMATS.find((candidate) => candidate === normalized);

  if (!format) {
    throw new ConfigurationError(
      `Unsupported format "${value}". Lossless formats supported: ${IMAGE_FORMATS.join(', ')}`
    );
  }

  return format;
}

export function fileExtension(format: ImageFormat): string {
  return format.toLowerCase();
}

/**
 * Converts a decoder frame (B, G, R byte order) into the RGB raster every encoder takes.
 */
export function bgrToRgb(frame: RawFrame): RasterImage {
  const byteLength = frame.width * frame.height * 3;

  if (frame.width <= 0 || frame.height <= 0 || frame.data.length < byteLength) {
    throw new EncodingError(
      `Frame buffer holds ${frame.data.length} bytes, expected ${byteLength} for ${frame.width}x${frame.height}`
    );
  }

  const data = Buffer.alloc(byteLength);
  for (let i = 0; i < byteLength; i += 3) {
    data[i] = frame.data[i + 2];
    data[i + 1] = frame.data[i + 1];
    data[i + 2] = frame.data[i];
  }

  return { data, width: frame.width, height: frame.height, channels: 3 };
}

function encodeBmp(raster: RasterImage): Buffer {
  const pixelCount = raster.width * raster.height;
  const abgr = Buffer.alloc(pixelCount * 4);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const src = pixel * 3;
    const dst = pixel * 4;
    abgr[dst] = 0xff;
    abgr[dst + 1] = raster.data[src + 2];
    abgr[dst + 2] = raster.data[src + 1];
    abgr[dst + 3] = raster.data[src];
  }

  const image: bmp.ImageData = { data: abgr, width: raster.width, height: raster.height };
  return bmp.encode(image).data;
}

function decodeBmp(bytes: Buffer): RasterImage {
  const decoded: bmp.BmpDecoder = bmp.decode(bytes);
  const pixelCount = decoded.width * decoded.height;
  const data = Buffer.alloc(pixelCount * 3);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const src = pixel * 4;
    const dst = pixel * 3;
    data[dst] = decoded.data[src + 3];
    data[dst + 1] = decoded.data[src + 2];
    data[dst + 2] = decoded.data[src + 1];
  }

  return { data, width: decoded.width, height: decoded.height, channels: 3 };
}

function isBmp(bytes: Buffer): boolean {
  return bytes.length > BMP_SIGNATURE.length && bytes.subarray(0, BMP_SIGNATURE.length).equals(BMP_SIGNATURE);
}

const encoders: Record<ImageFormat, (raster: RasterImage) => Promise<Buffer>> = {
  PNG: (raster) =>
    sharp(raster.data, { raw: { width: raster.width, height: raster.height, channels: 3 } })
      .png()
      .toBuffer(),
  TIFF: (raster) =>
    sharp(raster.data, { raw: { width: raster.width, height: raster.height, channels: 3 } })
      .tiff({ compression: 'none' })
      .toBuffer(),
  BMP: async (raster) => encodeBmp(raster),
};

export async function encodeRaster(raster: RasterImage, format: ImageFormat): Promise<Buffer> {
  try {
    return await encoders[format](raster);
  } catch (error) {
    throw toCaptureError(error, (message, options) => new EncodingError(`Could not encode ${format}: ${message}`, options));
  }
}

/**
 * Decodes any image the codec understands into an RGB raster. Alpha is dropped and
 * greyscale is widened to three channels.
 */
export async function decodeImage(bytes: Buffer): Promise<RasterImage> {
  try {
    if (isBmp(bytes)) {
      return decodeBmp(bytes);
    }

    const { data, info } = await sharp(bytes)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels === 3) {
      return { data, width: info.width, height: info.height, channels: 3 };
    }

    if (info.channels === 1) {
      const rgb = Buffer.alloc(data.length * 3);
      data.forEach((value, i) => rgb.fill(value, i * 3, i * 3 + 3));
      return { data: rgb, width: info.width, height: info.height, channels: 3 };
    }

    throw new EncodingError(`Unsupported channel count ${info.channels}`);
  } catch (error) {
    throw toCaptureError(error, (message, options) => new EncodingError(`Could not decode image data: ${message}`, options));
  }
}

/**
 * Re-encodes arbitrary image bytes into the requested format. Bytes already in that
 * format are returned untouched.
 */
export async function transcodeImage(bytes: Buffer, format: ImageFormat): Promise<EncodedImage> {
  if (bytes.length === 0) {
    throw new EncodingError('Image data is empty');
  }

  if (!isBmp(bytes)) {
    const metadata = await sharp(bytes)
      .metadata()
      .catch((error: unknown) => {
        throw toCaptureError(error, (message, options) => new EncodingError(`Unrecognised image data: ${message}`, options));
      });

    if (metadata.format === SHARP_FORMAT_NAMES[format] && metadata.width && metadata.height) {
      return { data: bytes, width: metadata.width, height: metadata.height };
    }
  }

  const raster = await decodeImage(bytes);
  if (format === 'BMP' && isBmp(bytes)) {
    return { data: bytes, width: raster.width, height: raster.height };
  }

  return {
    data: await encodeRaster(raster, format),
    width: raster.width,
    height: raster.height,
  };
}

/**
 * Writes through a temporary sibling and renames, so the target either holds the
 * complete image or does not exist.
 */
export async function writeImageFile(outputPath: string, data: Buffer): Promise<void> {
  const directory = path.dirname(outputPath);
  const tempPath = path.join(directory, `.${path.basename(outputPath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await fs.promises.mkdir(directory, { recursive: true });
    await fs.promises.writeFile(tempPath, data);
    await fs.promises.rename(tempPath, outputPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw toCaptureError(error, (message, options) => new EncodingError(`Could not write ${outputPath}: ${message}`, options));
  }
}

const MODES: Record<number, string> = { 1: 'L', 2: 'LA', 3: 'RGB', 4: 'RGBA' };

export async function readImageInfo(filePath: string): Promise<ImageInfo> {
  const bytes = await fs.promises.readFile(filePath);

  if (isBmp(bytes)) {
    const decoded = bmp.decode(bytes);
    return { width: decoded.width, height: decoded.height, format: 'bmp', channels: 3, mode: 'RGB', size: bytes.length };
  }

  const metadata = await sharp(bytes).metadata();
  const channels = metadata.channels ?? 0;

  return {
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    format: metadata.format ?? 'unknown',
    channels,
    mode: MODES[channels] ?? `${channels}-channel`,
    size: bytes.length,
  };
}
