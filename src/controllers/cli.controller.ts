import { parseArgs } from 'util';
import { config } from '../config/env.config';
import { createCaptureService, parseCaptureMethod, type CaptureService } from '../services/capture.service';
import { ContinuousCaptureService, defaultOutputPath } from '../services/continuous.service';
import { parseImageFormat, readImageInfo } from '../services/image.service';
import type { CaptureMethod, DeviceEndpoint, ImageFormat } from '../types/capture.types';
import { ConfigurationError, describeError } from '../utils/errors';
import { EXIT_CAPTURE_FAILED, EXIT_SUCCESS, EXIT_USAGE } from '../utils/exitCodes';
import { setLogLevel } from '../utils/logger';

export { EXIT_CAPTURE_FAILED, EXIT_SUCCESS, EXIT_USAGE };

// setTimeout holds at most 2^31 - 1 ms.
export const MAX_INTERVAL_SECONDS = Math.floor(2 ** 31 / 1000) - 1;

export const USAGE = [
  'Camera still capture',
  'Captures images from IP cameras and saves them in lossless formats.',
  '',
  'Usage:',
  '  camera-capture <ip> <username> <password> [options]',
  '',
  'Options:',
  '  -o, --output <path>         Output file path',
  '  -f, --format <PNG|TIFF|BMP> Output format (default: PNG)',
  '  -m, --method <auto|rtsp|http>',
  '                              Capture method (default: auto, tries RTSP then HTTP)',
  '      --continuous <seconds>  Capture every N seconds until Ctrl+C',
  '  -v, --verbose               Debug logging',
  '  -h, --help                  Show this help',
  '',
  'Examples:',
  '  camera-capture 192.168.1.100 admin password123',
  '  camera-capture 192.168.1.100 admin password123 -f TIFF -o my_image.tiff',
  '  camera-capture 192.168.1.100 admin password123 --continuous 30',
].join('\n');

/** Registers `stop` for the user's interrupt and returns the matching unregister call. */
export type InterruptHook = (stop: () => void) => () => void;

export interface CliDependencies {
  createService?: () => CaptureService;
  print?: (line: string) => void;
  onInterrupt?: InterruptHook;
}

// Only the first Ctrl+C is taken over; a second one falls back to the default and ends the process.
const onSigint: InterruptHook = (stop) => {
  process.once('SIGINT', stop);
  return () => {
    process.removeListener('SIGINT', stop);
  };
};

function parseInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0 || seconds > MAX_INTERVAL_SECONDS) {
    throw new ConfigurationError(
      `--continuous expects a whole number of seconds from 1 to ${MAX_INTERVAL_SECONDS}, got "${value}"`
    );
  }
  return seconds;
}

function resolveEndpoint(positionals: string[]): DeviceEndpoint {
  const [address = config.camera.host, username = config.camera.username, password = config.camera.password] =
    positionals;

  if (!address || !username || password === undefined) {
    throw new ConfigurationError('Camera IP address, username and password are required');
  }

  return { address, username, password };
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      method: { type: 'string', short: 'm' },
      continuous: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  if (argv.length === 0 && !config.camera.host) {
    print(USAGE);
    return EXIT_SUCCESS;
  }

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    print(`Error: ${describeError(error)}`);
    print(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    print(USAGE);
    return EXIT_SUCCESS;
  }

  let endpoint: DeviceEndpoint;
  let format: ImageFormat;
  let method: CaptureMethod;
  let intervalSeconds: number | undefined;
  try {
    endpoint = resolveEndpoint(positionals);
    format = parseImageFormat(values.format ?? config.defaultFormat);
    method = parseCaptureMethod(values.method ?? config.defaultMethod);
    intervalSeconds = values.continuous === undefined ? undefined : parseInterval(values.continuous);
  } catch (error) {
    print(`Error: ${describeError(error)}`);
    return EXIT_USAGE;
  }

  if (values.verbose) {
    setLogLevel('debug');
  }

  const service = (deps.createService ?? createCaptureService)();

  if (intervalSeconds !== undefined) {
    const controller = new AbortController();
    const release = (deps.onInterrupt ?? onSigint)(() => controller.abort());
    const summary = await new ContinuousCaptureService(service)
      .run({ endpoint, format, method, intervalSeconds }, controller.signal)
      .finally(release);
    print(`Continuous capture finished: ${summary.succeeded}/${summary.captures} captures saved`);
    return EXIT_SUCCESS;
  }

  const outputPath = values.output ?? defaultOutputPath(endpoint.address, format);
  const result = await service.capture(endpoint, outputPath, format, method);

  if (!result.success) {
    print(`✗ Failed to capture image: ${result.message}`);
    return EXIT_CAPTURE_FAILED;
  }

  print(`✓ Image saved successfully: ${result.outputPath}`);

  try {
    const info = await readImageInfo(result.outputPath);
    print(`Image size: ${info.width}x${info.height}`);
    print(`Color mode: ${info.mode}`);
    print(`File size: ${info.size.toLocaleString('en-US')} bytes`);
  } catch (error) {
    print(`Could not read image info: ${describeError(error)}`);
  }

  return EXIT_SUCCESS;
}
