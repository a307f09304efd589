import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { CaptureService } from '../services/capture.service';
import { ContinuousCaptureService, captureTimestamp, defaultOutputPath } from '../services/continuous.service';
import type { CaptureStrategy, CaptureTarget, StrategyOutcome } from '../types/capture.types';
import { ConnectionError } from '../utils/errors';

describe('captureTimestamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(captureTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe('20240105_070809');
    expect(captureTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('20231231_235958');
  });
});

describe('defaultOutputPath', () => {
  it('names the file after the device and the capture time', () => {
    const date = new Date(2024, 2, 14, 15, 9, 26);

    expect(defaultOutputPath('10.0.0.5', 'TIFF', date)).toBe('capture_10.0.0.5_20240314_150926.tiff');
    expect(defaultOutputPath('10.0.0.5', 'BMP', date, 'shots')).toBe(
      path.join('shots', 'capture_10.0.0.5_20240314_150926.bmp')
    );
  });
});

describe('ContinuousCaptureService', () => {
  it('keeps capturing after a failure until the signal aborts', async () => {
    const controller = new AbortController();
    const targets: CaptureTarget[] = [];
    const stream: CaptureStrategy = {
      name: 'rtsp',
      attempt: async (_endpoint, target): Promise<StrategyOutcome> => {
        targets.push(target);
        if (targets.length === 1) {
          return { success: false, message: 'refused', error: new ConnectionError('refused') };
        }
        if (targets.length === 3) controller.abort();
        return { success: true, message: 'Image captured via RTSP: 1x1', width: 1, height: 1 };
      },
    };
    const service = new CaptureService({ stream, http: stream });
    const times = [new Date(2024, 0, 1, 0, 0, 1), new Date(2024, 0, 1, 0, 0, 2), new Date(2024, 0, 1, 0, 0, 3)];
    let tick = 0;

    const summary = await new ContinuousCaptureService(service).run(
      {
        endpoint: { address: '10.0.0.5', username: 'admin', password: 'secret' },
        format: 'PNG',
        method: 'stream-only',
        intervalSeconds: 0.01,
        directory: 'out',
        now: () => times[tick++] ?? new Date(2024, 0, 1),
      },
      controller.signal
    );

    expect(summary).toEqual({ captures: 3, succeeded: 2 });
    expect(targets.map((target) => target.outputPath)).toEqual([
      path.join('out', 'capture_10.0.0.5_20240101_000001.png'),
      path.join('out', 'capture_10.0.0.5_20240101_000002.png'),
      path.join('out', 'capture_10.0.0.5_20240101_000003.png'),
    ]);
  });
});
