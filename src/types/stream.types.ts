import type { RawFrame } from './capture.types';

export interface StreamOpenOptions {
  timeoutMs: number;
}

/**
 * An opened video stream. `read` resolves promptly with the newest decoded frame, or
 * null when none has arrived since the previous read.
 */
export interface FrameStream {
  read(): Promise<RawFrame | null>;
  close(): Promise<void>;
}

export interface StreamClient {
  open(url: string, options: StreamOpenOptions): Promise<FrameStream>;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}
