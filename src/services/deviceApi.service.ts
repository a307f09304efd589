import { createHash } from 'crypto';
import { z } from 'zod';
import { config } from '../config/env.config';
import type { DeviceEndpoint } from '../types/capture.types';
import {
  AuthenticationError,
  ConnectionError,
  ProtocolError,
  TimeoutError,
  describeError,
  type CaptureError,
} from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.scope('device-api');

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface DeviceApiOptions {
  fetch?: FetchFn;
  loginTimeoutMs?: number;
  snapshotTimeoutMs?: number;
}

interface ControlResponse {
  status: number;
  contentType: string;
  body: Buffer;
}

export interface SnapshotPayload {
  bytes: Buffer;
  source: 'image' | 'json';
  contentType: string;
}

const loginResponseSchema = z.object({
  error_code: z.number(),
  result: z.object({ stok: z.string().min(1).optional() }).passthrough().optional(),
});

const snapshotResponseSchema = z.object({
  error_code: z.number(),
  result: z
    .object({
      image: z.object({ snapshot: z.string().optional() }).passthrough().optional(),
    })
    .passthrough()
    .optional(),
});

export function encodeLoginCredentials(username: string, password: string) {
  const passwordDigest = createHash('md5').update(password, 'utf8').digest('hex');

  return {
    hashed: true,
    username: Buffer.from(username, 'utf8').toString('base64'),
    password: Buffer.from(passwordDigest, 'utf8').toString('base64'),
  };
}

export function controlUrl(address: string, token: string | null): string {
  return `http://${address}/stok=${token ?? '0'}/ds`;
}

function stripDataUriPrefix(payload: string): string {
  return payload.replace(/^data:image\/[\w.+-]+;base64,/, '');
}

function withTimeout(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  return { signal: controller.signal, cleanup: () => clearTimeout(timeout) };
}

/**
 * Client for the device's JSON control endpoint. Holds the session token for the
 * lifetime of the instance; a token is only requested when none is cached.
 */
export class DeviceApiClient {
  private token: string | null = null;
  private readonly fetchFn: FetchFn;
  private readonly loginTimeoutMs: number;
  private readonly snapshotTimeoutMs: number;

  constructor(private readonly endpoint: DeviceEndpoint, options: DeviceApiOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.loginTimeoutMs = options.loginTimeoutMs ?? config.http.loginTimeoutMs;
    this.snapshotTimeoutMs = options.snapshotTimeoutMs ?? config.http.snapshotTimeoutMs;
  }

  get sessionToken(): string | null {
    return this.token;
  }

  serves(endpoint: DeviceEndpoint): boolean {
    return (
      endpoint.address === this.endpoint.address &&
      endpoint.username === this.endpoint.username &&
      endpoint.password === this.endpoint.password
    );
  }

  clearSession(): void {
    this.token = null;
  }

  async ensureSession(): Promise<string> {
    return this.token ?? this.login();
  }

  async login(): Promise<string> {
    const body = {
      method: 'login',
      params: encodeLoginCredentials(this.endpoint.username, this.endpoint.password),
    };

    const response = await this.post(controlUrl(this.endpoint.address, null), body, this.loginTimeoutMs, 'Authentication failed');

    if (response.status !== 200) {
      throw new AuthenticationError(`Authentication failed: HTTP ${response.status}`);
    }

    const parsed = loginResponseSchema.safeParse(parseJson(response.body, AuthenticationError));
    if (!parsed.success) {
      throw new AuthenticationError('Authentication failed: malformed login response');
    }

    if (parsed.data.error_code !== 0) {
      throw new AuthenticationError(`Authentication failed: error_code ${parsed.data.error_code}`);
    }

    const stok = parsed.data.result?.stok;
    if (!stok) {
      throw new AuthenticationError('Authentication failed: no session token in response');
    }

    this.token = stok;
    log.debug('🔑 Session token acquired');
    return stok;
  }

  /**
   * Requests a still image with the cached session. The body is either the encoded image
   * itself or a JSON envelope carrying it base64-encoded.
   */
  async requestSnapshot(token: string): Promise<SnapshotPayload> {
    const body = { method: 'get', params: { image: { name: ['snapshot'] } } };

    const response = await this.post(controlUrl(this.endpoint.address, token), body, this.snapshotTimeoutMs, 'HTTP capture failed');

    if (response.status === 401) {
      this.clearSession();
      throw new AuthenticationError('HTTP API failed: 401');
    }

    if (response.status !== 200) {
      throw new ProtocolError(`HTTP API failed: ${response.status}`);
    }

    const { contentType } = response;

    if (contentType.includes('image')) {
      return { bytes: response.body, source: 'image', contentType };
    }

    if (contentType.includes('application/json')) {
      const parsed = snapshotResponseSchema.safeParse(parseJson(response.body, ProtocolError));
      if (!parsed.success) {
        throw new ProtocolError('HTTP API failed: malformed snapshot response');
      }
      if (parsed.data.error_code !== 0) {
        throw new ProtocolError(`HTTP API failed: error_code ${parsed.data.error_code}`);
      }

      const snapshot = parsed.data.result?.image?.snapshot;
      if (!snapshot) {
        throw new ProtocolError('HTTP API failed: response carries no snapshot');
      }

      return { bytes: Buffer.from(stripDataUriPrefix(snapshot), 'base64'), source: 'json', contentType };
    }

    throw new ProtocolError(`HTTP API failed: unexpected content type "${contentType || 'none'}"`);
  }

  private async post(url: string, body: unknown, timeoutMs: number, failurePrefix: string): Promise<ControlResponse> {
    const { signal, cleanup } = withTimeout(timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(body),
        signal,
      });

      return {
        status: response.status,
        contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
        body: Buffer.from(await response.arrayBuffer()),
      };
    } catch (error) {
      if (signal.aborted) {
        throw new TimeoutError(`${failurePrefix}: no response within ${timeoutMs}ms`, { cause: error });
      }
      throw new ConnectionError(`${failurePrefix}: ${describeError(error)}`, { cause: error });
    } finally {
      cleanup();
    }
  }
}

function parseJson(body: Buffer, ErrorType: new (message: string, options?: { cause?: unknown }) => CaptureError): unknown {
  try {
    return JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw new ErrorType(`Response is not valid JSON: ${describeError(error)}`, { cause: error });
  }
}
