import type { CaptureError } from '../utils/errors';

export const IMAGE_FORMATS = ['PNG', 'TIFF', 'BMP'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const CAPTURE_METHODS = ['auto', 'stream-only', 'http-only'] as const;
export type CaptureMethod = (typeof CAPTURE_METHODS)[number];

export interface DeviceEndpoint {
  readonly address: string;
  readonly username: string;
  readonly password: string;
}

export interface CaptureTarget {
  readonly outputPath: string;
  readonly format: ImageFormat;
}

/** A frame as delivered by the stream decoder, 3 bytes per pixel in B, G, R order. */
export interface RawFrame {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly pixelOrder: 'bgr';
}

/** Interleaved 8-bit RGB pixels. */
export interface RasterImage {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
}

export type StrategyOutcome =
  | { success: true; message: string; width: number; height: number }
  | { success: false; message: string; error: CaptureError };

export interface CaptureStrategy {
  readonly name: string;
  attempt(endpoint: DeviceEndpoint, target: CaptureTarget): Promise<StrategyOutcome>;
}

export interface StrategyAttempt {
  strategy: string;
  outcome: StrategyOutcome;
}

export type CaptureResult =
  | { success: true; outputPath: string; message: string; strategy: string }
  | { success: false; message: string; attempts: StrategyAttempt[] };
