import { type CaptureMethod, type CaptureResult, type CaptureStrategy, type DeviceEndpoint, type StrategyAttempt } from '../types/capture.types';
import { parseCaptureMethod } from '../utils/captureMethod';
import { ProtocolError, toCaptureError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { DeviceApiOptions } from './deviceApi.service';
import { HttpCaptureStrategy } from './httpCapture.service';
import { parseImageFormat } from './image.service';
import { StreamCaptureStrategy, type StreamCaptureOptions } from './stream.service';

const log = logger.scope('capture');

export { parseCaptureMethod };

export interface CaptureStrategies {
  stream: CaptureStrategy;
  http: CaptureStrategy;
}

/**
 * Tries acquisition strategies in priority order and stops at the first success.
 * One instance per device: the HTTP strategy keeps that device's session token.
 */
export class CaptureService {
  constructor(private readonly strategies: CaptureStrategies) {}

  strategiesFor(method: CaptureMethod): CaptureStrategy[] {
    switch (method) {
      case 'auto':
        return [this.strategies.stream, this.strategies.http];
      case 'stream-only':
        return [this.strategies.stream];
      case 'http-only':
        return [this.strategies.http];
    }
  }

  /**
   * Captures one still into `outputPath`. Unsupported formats or methods throw a
   * ConfigurationError before any device is contacted; every other failure is
   * reported through the result.
   */
  async capture(
    endpoint: DeviceEndpoint,
    outputPath: string,
    format: string = 'PNG',
    method: string = 'auto'
  ): Promise<CaptureResult> {
    const imageFormat = parseImageFormat(format);
    const captureMethod = parseCaptureMethod(method);
    const target = { outputPath, format: imageFormat };

    log.info(`📸 Capturing image from ${endpoint.address}...`);
    log.info(`Output: ${outputPath}`);
    log.info(`Format: ${imageFormat} (lossless)`);

    const attempts: StrategyAttempt[] = [];

    for (const strategy of this.strategiesFor(captureMethod)) {
      log.info(`Trying ${strategy.name.toUpperCase()} method...`);

      const outcome = await strategy.attempt(endpoint, target).catch((error: unknown) => {
        const captureError = toCaptureError(error, (message, options) => new ProtocolError(message, options));
        return { success: false as const, message: captureError.message, error: captureError };
      });
      attempts.push({ strategy: strategy.name, outcome });

      if (outcome.success) {
        log.info(`✅ ${outcome.message}`);
        return { success: true, outputPath, message: outcome.message, strategy: strategy.name };
      }

      log.warn(`${strategy.name.toUpperCase()} method failed: ${outcome.message}`);
    }

    const message = attempts[attempts.length - 1]?.outcome.message ?? 'No capture strategy attempted';
    log.error(`❌ Failed to capture image: ${message}`);
    return { success: false, message, attempts };
  }
}

export function createCaptureService(
  overrides: { stream?: StreamCaptureOptions; http?: DeviceApiOptions } = {}
): CaptureService {
  return new CaptureService({
    stream: new StreamCaptureStrategy(overrides.stream),
    http: new HttpCaptureStrategy(overrides.http),
  });
}
