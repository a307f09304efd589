import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  EXIT_CAPTURE_FAILED,
  EXIT_SUCCESS,
  EXIT_USAGE,
  MAX_INTERVAL_SECONDS,
  USAGE,
  runCli,
} from '../controllers/cli.controller';
import { CaptureService } from '../services/capture.service';
import { encodeRaster, writeImageFile } from '../services/image.service';
import type { CaptureStrategy, StrategyOutcome } from '../types/capture.types';
import { ConnectionError } from '../utils/errors';

function failingStrategy(name: string, message: string): CaptureStrategy {
  return {
    name,
    attempt: async (): Promise<StrategyOutcome> => ({ success: false, message, error: new ConnectionError(message) }),
  };
}

const writingStrategy: CaptureStrategy = {
  name: 'rtsp',
  attempt: async (_endpoint, target) => {
    const raster = { data: Buffer.alloc(3 * 2 * 3, 77), width: 3, height: 2, channels: 3 as const };
    await writeImageFile(target.outputPath, await encodeRaster(raster, target.format));
    return { success: true, message: 'Image captured via RTSP: 3x2', width: 3, height: 2 };
  },
};

function collect() {
  const lines: string[] = [];
  return { lines, print: (line: string) => lines.push(line) };
}

describe('runCli', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'capture-cli-'));
  });

  afterEach(async () => {
    await fs.promises.rm(directory, { recursive: true, force: true });
  });

  it('prints usage for --help', async () => {
    const { lines, print } = collect();

    expect(await runCli(['--help'], { print })).toBe(EXIT_SUCCESS);
    expect(lines).toEqual([USAGE]);
  });

  it('rejects unknown options with usage', async () => {
    const { lines, print } = collect();

    expect(await runCli(['10.0.0.5', 'admin', 'secret', '--bogus'], { print })).toBe(EXIT_USAGE);
    expect(lines[0]).toMatch(/^Error: /);
    expect(lines[1]).toBe(USAGE);
  });

  it('rejects an unsupported format before capturing', async () => {
    const { lines, print } = collect();
    let created = false;

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '-f', 'jpeg'], {
      print,
      createService: () => {
        created = true;
        return new CaptureService({ stream: writingStrategy, http: writingStrategy });
      },
    });

    expect(code).toBe(EXIT_USAGE);
    expect(lines).toEqual(['Error: Unsupported format "jpeg". Lossless formats supported: PNG, TIFF, BMP']);
    expect(created).toBe(false);
  });

  it('rejects a non-positive interval', async () => {
    const { lines, print } = collect();

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '--continuous', '0'], { print });

    expect(code).toBe(EXIT_USAGE);
    expect(lines).toEqual(['Error: --continuous expects a whole number of seconds from 1 to 2147482, got "0"']);
  });

  it('rejects an interval beyond the timer limit', async () => {
    const { lines, print } = collect();

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '--continuous', '2147483'], { print });

    expect(MAX_INTERVAL_SECONDS).toBe(2147482);
    expect(code).toBe(EXIT_USAGE);
    expect(lines).toEqual(['Error: --continuous expects a whole number of seconds from 1 to 2147482, got "2147483"']);
  });

  it('exits with 1 when the capture fails', async () => {
    const { lines, print } = collect();

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '-m', 'http', '-o', path.join(directory, 'x.png')], {
      print,
      createService: () =>
        new CaptureService({
          stream: failingStrategy('rtsp', 'Failed to capture via RTSP (refused)'),
          http: failingStrategy('http', 'Authentication failed: error_code -40401'),
        }),
    });

    expect(code).toBe(EXIT_CAPTURE_FAILED);
    expect(lines).toEqual(['✗ Failed to capture image: Authentication failed: error_code -40401']);
  });

  it('reports the saved image', async () => {
    const { lines, print } = collect();
    const outputPath = path.join(directory, 'still.png');

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '-o', outputPath], {
      print,
      createService: () =>
        new CaptureService({ stream: writingStrategy, http: failingStrategy('http', 'unused') }),
    });

    const size = (await fs.promises.stat(outputPath)).size;
    expect(code).toBe(EXIT_SUCCESS);
    expect(lines).toEqual([
      `✓ Image saved successfully: ${outputPath}`,
      'Image size: 3x2',
      'Color mode: RGB',
      `File size: ${size.toLocaleString('en-US')} bytes`,
    ]);
  });

  it('accepts the longest interval and stops on the first interrupt', async () => {
    const { lines, print } = collect();
    let released = false;

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '--continuous', '2147482'], {
      print,
      onInterrupt: (stop) => {
        stop();
        return () => {
          released = true;
        };
      },
      createService: () => new CaptureService({ stream: writingStrategy, http: writingStrategy }),
    });

    expect(code).toBe(EXIT_SUCCESS);
    expect(lines).toEqual(['Continuous capture finished: 0/0 captures saved']);
    expect(released).toBe(true);
  });

  it('finishes the capture in progress when interrupted mid-run', async () => {
    const { lines, print } = collect();
    let interrupt = () => {};
    const interrupting: CaptureStrategy = {
      name: 'rtsp',
      attempt: async (): Promise<StrategyOutcome> => {
        interrupt();
        return { success: true, message: 'Image captured via RTSP: 3x2', width: 3, height: 2 };
      },
    };

    const code = await runCli(['10.0.0.5', 'admin', 'secret', '--continuous', '5'], {
      print,
      onInterrupt: (stop) => {
        interrupt = stop;
        return () => {};
      },
      createService: () => new CaptureService({ stream: interrupting, http: interrupting }),
    });

    expect(code).toBe(EXIT_SUCCESS);
    expect(lines).toEqual(['Continuous capture finished: 1/1 captures saved']);
  });

  it('leaves interrupts alone for a single capture', async () => {
    const { print } = collect();
    const before = process.listenerCount('SIGINT');
    let registered = false;

    await runCli(['10.0.0.5', 'admin', 'secret', '-o', path.join(directory, 'still.png')], {
      print,
      onInterrupt: () => {
        registered = true;
        return () => {};
      },
      createService: () => new CaptureService({ stream: writingStrategy, http: writingStrategy }),
    });

    expect(registered).toBe(false);
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
