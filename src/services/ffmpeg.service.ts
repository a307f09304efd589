import ffmpeg from 'fluent-ffmpeg';
import { PassThrough, type Writable } from 'stream';
import { z } from 'zod';
import { config } from '../config/env.config';
import type { RawFrame } from '../types/capture.types';
import type { FrameStream, StreamClient, StreamOpenOptions } from '../types/stream.types';
import { ConnectionError, ProtocolError, TimeoutError, type CaptureError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.scope('ffmpeg');

if (config.ffmpegPath) {
  ffmpeg.setFfmpegPath(config.ffmpegPath);
}

const codecDataSchema = z.object({
  video_details: z.array(z.string()).default([]),
});

export interface FrameSize {
  width: number;
  height: number;
}

/**
 * Picks the frame size out of ffmpeg's video stream description, e.g.
 * ["h264 (Main)", "yuvj420p(pc, bt709, progressive)", "1920x1080", "15 fps"].
 */
export function parseFrameSize(details: readonly string[]): FrameSize | null {
  for (const detail of details) {
    const match = /\b(\d{2,5})x(\d{2,5})\b/.exec(detail);
    if (match) {
      return { width: Number(match[1]), height: Number(match[2]) };
    }
  }
  return null;
}

/**
 * Cuts a raw bgr24 byte stream into whole frames and keeps only the newest one.
 */
export class RawFrameAssembler {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private latest: Buffer | null = null;
  private size: FrameSize | null = null;

  setFrameSize(size: FrameSize): void {
    this.size = size;
    this.drain();
  }

  push(chunk: Buffer): void {
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
    this.drain();
  }

  take(): RawFrame | null {
    if (!this.latest || !this.size) return null;

    const frame: RawFrame = {
      data: this.latest,
      width: this.size.width,
      height: this.size.height,
      pixelOrder: 'bgr',
    };
    this.latest = null;
    return frame;
  }

  private drain(): void {
    if (!this.size) return;

    const frameBytes = this.size.width * this.size.height * 3;
    if (frameBytes === 0 || this.pendingBytes < frameBytes) return;

    const all = Buffer.concat(this.pending, this.pendingBytes);
    const completeFrames = Math.floor(all.length / frameBytes);
    const lastStart = (completeFrames - 1) * frameBytes;
    this.latest = Buffer.from(all.subarray(lastStart, lastStart + frameBytes));

    const rest = all.subarray(completeFrames * frameBytes);
    this.pending = rest.length > 0 ? [Buffer.from(rest)] : [];
    this.pendingBytes = rest.length;
  }
}

/** The part of a fluent-ffmpeg command the client drives. */
export interface StreamCommand {
  on(event: 'codecData', listener: (data: unknown) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  pipe(destination: Writable, options: { end: boolean }): unknown;
  kill(signal: string): unknown;
}

class FfmpegFrameStream implements FrameStream {
  private closed = false;

  constructor(
    private readonly command: StreamCommand,
    private readonly assembler: RawFrameAssembler,
    private readonly hasEnded: () => boolean
  ) {}

  async read(): Promise<RawFrame | null> {
    const frame = this.assembler.take();
    if (!frame && this.hasEnded()) {
      throw new ConnectionError('Stream closed by the device');
    }
    return frame;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.command.kill('SIGKILL');
  }
}

export type CommandFactory = (url: string) => StreamCommand;

function firstLine(message: string): string {
  return message.split('\n')[0]?.trim() ?? message;
}

/**
 * Opens RTSP streams through the ffmpeg executable, decoding to raw bgr24 frames on a pipe.
 */
export class FfmpegStreamClient implements StreamClient {
  private readonly commandFactory: CommandFactory;

  constructor(options: { transport?: 'tcp' | 'udp'; commandFactory?: CommandFactory } = {}) {
    const transport = options.transport ?? config.rtsp.transport;
    this.commandFactory =
      options.commandFactory ??
      ((url) =>
        ffmpeg(url)
          .inputOptions(['-rtsp_transport', transport])
          .noAudio()
          .outputOptions(['-pix_fmt', 'bgr24'])
          .format('rawvideo'));
  }

  open(url: string, options: StreamOpenOptions): Promise<FrameStream> {
    return new Promise((resolve, reject) => {
      const assembler = new RawFrameAssembler();
      const command = this.commandFactory(url);
      const output = new PassThrough();
      let settled = false;
      let ended = false;

      const fail = (error: CaptureError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        command.kill('SIGKILL');
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new TimeoutError(`Stream did not open within ${options.timeoutMs}ms`));
      }, options.timeoutMs);

      command.on('codecData', (data: unknown) => {
        const parsed = codecDataSchema.safeParse(data);
        const size = parsed.success ? parseFrameSize(parsed.data.video_details) : null;

        if (!size) {
          fail(new ProtocolError('Stream reported no video frame size'));
          return;
        }

        assembler.setFrameSize(size);
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.debug(`Stream opened at ${size.width}x${size.height}`);
        resolve(new FfmpegFrameStream(command, assembler, () => ended));
      });

      command.on('error', (error: Error) => {
        ended = true;
        if (!settled) {
          fail(new ConnectionError(`Failed to open stream: ${firstLine(error.message)}`, { cause: error }));
          return;
        }
        log.debug(`ffmpeg stopped: ${firstLine(error.message)}`);
      });

      command.on('end', () => {
        ended = true;
        fail(new ConnectionError('Stream ended before any video data'));
      });

      output.on('data', (chunk: Buffer) => assembler.push(chunk));
      command.pipe(output, { end: true });
    });
  }
}
