import { CAPTURE_METHODS, type CaptureMethod } from '../types/capture.types';
import { ConfigurationError } from './errors';

const METHOD_ALIASES: Record<string, CaptureMethod> = {
  rtsp: 'stream-only',
  stream: 'stream-only',
  http: 'http-only',
};

/** Method name or one of its short aliases, case-insensitive. */
export function resolveCaptureMethod(value: string): CaptureMethod | undefined {
  const normalized = value.trim().toLowerCase();
  return CAPTURE_METHODS.find((candidate) => candidate === normalized) ?? METHOD_ALIASES[normalized];
}

export function unsupportedMethodMessage(value: string): string {
  return `Unsupported capture method "${value}". Methods: auto, rtsp, http`;
}

export function parseCaptureMethod(value: string): CaptureMethod {
  const method = resolveCaptureMethod(value);

  if (!method) {
    throw new ConfigurationError(unsupportedMethodMessage(value));
  }

  return method;
}
