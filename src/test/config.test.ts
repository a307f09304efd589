import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config/env.config';
import { ConfigurationError } from '../utils/errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.camera).toEqual({ host: undefined, username: undefined, password: undefined });
    expect(config.defaultFormat).toBe('PNG');
    expect(config.defaultMethod).toBe('auto');
    expect(config.rtsp).toEqual({
      port: 554,
      paths: ['stream1', 'stream2'],
      transport: 'tcp',
      openTimeoutMs: 10000,
      readAttempts: 10,
      readDelayMs: 200,
      readTimeoutMs: 15000,
    });
    expect(config.http).toEqual({ loginTimeoutMs: 10000, snapshotTimeoutMs: 15000 });
    expect(config.logLevel).toBe('info');
  });

  it('reads and normalizes provided values', () => {
    const config = loadConfig({
      CAMERA_HOST: '10.0.0.5',
      CAMERA_USERNAME: 'admin',
      CAMERA_PASSWORD: 'test-secret',
      CAPTURE_FORMAT: 'tiff',
      CAPTURE_METHOD: 'http-only',
      RTSP_PORT: '8554',
      RTSP_PATHS: ' main, ,sub ',
      FRAME_READ_DELAY_MS: '0',
    });

    expect(config.camera).toEqual({ host: '10.0.0.5', username: 'admin', password: 'test-secret' });
    expect(config.defaultFormat).toBe('TIFF');
    expect(config.defaultMethod).toBe('http-only');
    expect(config.rtsp.port).toBe(8554);
    expect(config.rtsp.paths).toEqual(['main', 'sub']);
    expect(config.rtsp.readDelayMs).toBe(0);
  });

  it('accepts the short method aliases', () => {
    expect(loadConfig({ CAPTURE_METHOD: 'rtsp' }).defaultMethod).toBe('stream-only');
    expect(loadConfig({ CAPTURE_METHOD: 'HTTP' }).defaultMethod).toBe('http-only');
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ CAPTURE_FORMAT: '', RTSP_PORT: '' });

    expect(config.defaultFormat).toBe('PNG');
    expect(config.rtsp.port).toBe(554);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ RTSP_PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ RTSP_PORT: 'abc' })).toThrow(/^Invalid RTSP_PORT: /);
    expect(() => loadConfig({ CAPTURE_FORMAT: 'jpeg' })).toThrow(/^Invalid CAPTURE_FORMAT: /);
    expect(() => loadConfig({ FRAME_READ_ATTEMPTS: '0' })).toThrow(/^Invalid FRAME_READ_ATTEMPTS: /);
    expect(() => loadConfig({ CAPTURE_METHOD: 'ftp' })).toThrow(
      'Invalid CAPTURE_METHOD: Unsupported capture method "ftp". Methods: auto, rtsp, http'
    );
  });
});
