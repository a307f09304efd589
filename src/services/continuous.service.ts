import * as path from 'path';
import { setTimeout as delay } from 'timers/promises';
import type { CaptureResult, DeviceEndpoint, ImageFormat } from '../types/capture.types';
import { logger } from '../utils/logger';
import type { CaptureService } from './capture.service';
import { fileExtension } from './image.service';

const log = logger.scope('continuous');

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** YYYYMMDD_HHMMSS in local time. */
export function captureTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function defaultOutputPath(address: string, format: ImageFormat, date: Date = new Date(), directory = '.'): string {
  return path.join(directory, `capture_${address}_${captureTimestamp(date)}.${fileExtension(format)}`);
}

export interface ContinuousCaptureOptions {
  endpoint: DeviceEndpoint;
  format: ImageFormat;
  method: string;
  intervalSeconds: number;
  directory?: string;
  now?: () => Date;
}

export interface ContinuousCaptureSummary {
  captures: number;
  succeeded: number;
}

/**
 * Captures on a fixed interval until the signal aborts. A failed capture is logged and
 * the loop carries on.
 */
export class ContinuousCaptureService {
  constructor(private readonly captureService: CaptureService) {}

  async run(options: ContinuousCaptureOptions, signal: AbortSignal): Promise<ContinuousCaptureSummary> {
    const now = options.now ?? (() => new Date());
    const summary: ContinuousCaptureSummary = { captures: 0, succeeded: 0 };

    log.info(`⏱️ Starting continuous capture every ${options.intervalSeconds} seconds...`);
    log.info('Press Ctrl+C to stop');

    while (!signal.aborted) {
      summary.captures++;
      log.info(`--- Capture #${summary.captures} ---`);

      const outputPath = defaultOutputPath(options.endpoint.address, options.format, now(), options.directory);
      const result: CaptureResult = await this.captureService.capture(
        options.endpoint,
        outputPath,
        options.format,
        options.method
      );

      if (result.success) {
        summary.succeeded++;
        log.info(`💾 Saved: ${result.outputPath}`);
      } else {
        log.warn('Capture failed');
      }

      try {
        await delay(options.intervalSeconds * 1000, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }

    log.info('🛑 Continuous capture stopped by user');
    return summary;
  }
}
