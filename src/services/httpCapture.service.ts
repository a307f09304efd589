import type {
  CaptureStrategy,
  CaptureTarget,
  DeviceEndpoint,
  StrategyOutcome,
} from '../types/capture.types';
import { AuthenticationError, ProtocolError, toCaptureError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DeviceApiClient, type DeviceApiOptions, type SnapshotPayload } from './deviceApi.service';
import { transcodeImage, writeImageFile } from './image.service';

const log = logger.scope('http');

export class HttpCaptureStrategy implements CaptureStrategy {
  readonly name = 'http';

  private client: DeviceApiClient | null = null;

  constructor(private readonly options: DeviceApiOptions = {}) {}

  async attempt(endpoint: DeviceEndpoint, target: CaptureTarget): Promise<StrategyOutcome> {
    try {
      const snapshot = await this.fetchSnapshot(this.clientFor(endpoint));
      log.debug(`Snapshot received as ${snapshot.source} (${snapshot.bytes.length} bytes, ${snapshot.contentType})`);

      const image = await transcodeImage(snapshot.bytes, target.format);
      await writeImageFile(target.outputPath, image.data);

      return {
        success: true,
        message: `Image captured via HTTP API: ${image.width}x${image.height}`,
        width: image.width,
        height: image.height,
      };
    } catch (error) {
      const captureError = toCaptureError(error, (message, options) => new ProtocolError(message, options));
      log.warn(captureError.message);
      return { success: false, message: captureError.message, error: captureError };
    }
  }

  /**
   * Authenticates only when no token is cached. A snapshot rejected with 401 drops the
   * stale token and is retried once with a fresh login.
   */
  private async fetchSnapshot(client: DeviceApiClient): Promise<SnapshotPayload> {
    const hadToken = client.sessionToken !== null;
    const token = await client.ensureSession();

    try {
      return await client.requestSnapshot(token);
    } catch (error) {
      if (!hadToken || !(error instanceof AuthenticationError)) throw error;
    }

    log.info('🔑 Session token rejected, logging in again');
    return client.requestSnapshot(await client.login());
  }

  // Session tokens belong to one device and account; a different endpoint starts a new session.
  private clientFor(endpoint: DeviceEndpoint): DeviceApiClient {
    if (!this.client || !this.client.serves(endpoint)) {
      this.client = new DeviceApiClient(endpoint, this.options);
    }
    return this.client;
  }
}

