import { config } from '../config/env.config';
import type {
  CaptureStrategy,
  CaptureTarget,
  DeviceEndpoint,
  RawFrame,
  StrategyOutcome,
} from '../types/capture.types';
import type { Clock, FrameStream, StreamClient } from '../types/stream.types';
import {
  CaptureError,
  ConnectionError,
  EncodingError,
  TimeoutError,
  describeError,
  toCaptureError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { bgrToRgb, encodeRaster, writeImageFile } from './image.service';
import { FfmpegStreamClient } from './ffmpeg.service';

const log = logger.scope('stream');

export interface StreamLocator {
  url: string;
  /** Same locator with the password masked, safe to log. */
  redacted: string;
}

export interface StreamCaptureOptions {
  client?: StreamClient;
  clock?: Clock;
  port?: number;
  paths?: readonly string[];
  openTimeoutMs?: number;
  readAttempts?: number;
  readDelayMs?: number;
  readTimeoutMs?: number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Stream locators to try, in order: every configured path with the credentials as given,
 * then the first path again with the password percent-encoded for devices whose
 * firmware expects reserved characters escaped.
 */
export function buildStreamLocators(
  endpoint: DeviceEndpoint,
  port: number,
  paths: readonly string[]
): StreamLocator[] {
  const locate = (password: string, streamPath: string): StreamLocator => ({
    url: `rtsp://${endpoint.username}:${password}@${endpoint.address}:${port}/${streamPath}`,
    redacted: `rtsp://${endpoint.username}:***@${endpoint.address}:${port}/${streamPath}`,
  });

  const locators = paths.map((streamPath) => locate(endpoint.password, streamPath));
  if (paths.length > 0) {
    locators.push(locate(encodeURIComponent(endpoint.password), paths[0]));
  }
  return locators;
}

export function isUsableFrame(frame: RawFrame | null): frame is RawFrame {
  return (
    frame !== null &&
    frame.width > 0 &&
    frame.height > 0 &&
    frame.data.length > 0 &&
    frame.data.length >= frame.width * frame.height * 3
  );
}

export class StreamCaptureStrategy implements CaptureStrategy {
  readonly name = 'rtsp';

  private readonly client: StreamClient;
  private readonly clock: Clock;
  private readonly port: number;
  private readonly paths: readonly string[];
  private readonly openTimeoutMs: number;
  private readonly readAttempts: number;
  private readonly readDelayMs: number;
  private readonly readTimeoutMs: number;

  constructor(options: StreamCaptureOptions = {}) {
    this.client = options.client ?? new FfmpegStreamClient();
    this.clock = options.clock ?? systemClock;
    this.port = options.port ?? config.rtsp.port;
    this.paths = options.paths ?? config.rtsp.paths;
    this.openTimeoutMs = options.openTimeoutMs ?? config.rtsp.openTimeoutMs;
    this.readAttempts = options.readAttempts ?? config.rtsp.readAttempts;
    this.readDelayMs = options.readDelayMs ?? config.rtsp.readDelayMs;
    this.readTimeoutMs = options.readTimeoutMs ?? config.rtsp.readTimeoutMs;
  }

  async attempt(endpoint: DeviceEndpoint, target: CaptureTarget): Promise<StrategyOutcome> {
    let lastError: CaptureError = new ConnectionError('No stream locators configured');

    for (const locator of buildStreamLocators(endpoint, this.port, this.paths)) {
      log.info(`🎥 Trying RTSP URL: ${locator.redacted}`);

      let stream: FrameStream;
      try {
        stream = await this.client.open(locator.url, { timeoutMs: this.openTimeoutMs });
      } catch (error) {
        lastError = toCaptureError(error, (message, options) => new ConnectionError(message, options));
        log.warn(`Failed to open RTSP connection: ${lastError.message}`);
        continue;
      }

      log.info('RTSP connection established...');

      let frame: RawFrame | null;
      try {
        frame = await this.pollFrame(stream);
      } finally {
        await stream.close();
      }

      if (!isUsableFrame(frame)) {
        lastError = new TimeoutError(`No usable frame from ${locator.redacted}`);
        log.warn('Failed to capture valid frame');
        continue;
      }

      try {
        const raster = bgrToRgb(frame);
        await writeImageFile(target.outputPath, await encodeRaster(raster, target.format));
      } catch (error) {
        lastError = toCaptureError(error, (message, options) => new EncodingError(message, options));
        log.error(`Could not save frame: ${lastError.message}`);
        continue;
      }

      return {
        success: true,
        message: `Image captured via RTSP: ${frame.width}x${frame.height}`,
        width: frame.width,
        height: frame.height,
      };
    }

    return {
      success: false,
      message: `Failed to capture via RTSP (${lastError.message})`,
      error: lastError,
    };
  }

  /**
   * Reads until a usable frame arrives, the attempt budget runs out or the wall-clock
   * budget has elapsed, whichever comes first.
   */
  private async pollFrame(stream: FrameStream): Promise<RawFrame | null> {
    const startedAt = this.clock.now();

    for (let attempt = 1; attempt <= this.readAttempts; attempt++) {
      if (this.clock.now() - startedAt >= this.readTimeoutMs) {
        log.warn('Timeout reached while reading frames');
        return null;
      }

      try {
        const frame = await stream.read();
        if (isUsableFrame(frame)) {
          log.info(`Successfully captured frame (attempt ${attempt})`);
          return frame;
        }
      } catch (error) {
        log.debug(`Frame read ${attempt} failed: ${describeError(error)}`);
      }

      if (attempt < this.readAttempts) {
        await this.clock.sleep(this.readDelayMs);
      }
    }

    return null;
  }
}
