import dotenv from 'dotenv';
import { z } from 'zod';
import { IMAGE_FORMATS } from '../types/capture.types';
import { resolveCaptureMethod, unsupportedMethodMessage } from '../utils/captureMethod';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  CAMERA_HOST: z.string().min(1).optional(),
  CAMERA_USERNAME: z.string().min(1).optional(),
  CAMERA_PASSWORD: z.string().optional(),
  CAPTURE_FORMAT: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(IMAGE_FORMATS))
    .default('PNG'),
  CAPTURE_METHOD: z
    .string()
    .default('auto')
    .transform((value, ctx) => {
      const method = resolveCaptureMethod(value);
      if (!method) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: unsupportedMethodMessage(value) });
        return z.NEVER;
      }
      return method;
    }),
  RTSP_PORT: z.coerce.number().int().min(1).max(65535).default(554),
  RTSP_PATHS: z
    .string()
    .default('stream1,stream2')
    .transform((value) => value.split(',').map((path) => path.trim()).filter((path) => path.length > 0))
    .pipe(z.array(z.string()).min(1)),
  RTSP_TRANSPORT: z.enum(['tcp', 'udp']).default('tcp'),
  STREAM_OPEN_TIMEOUT_MS: positiveInt(10000),
  FRAME_READ_ATTEMPTS: positiveInt(10),
  FRAME_READ_DELAY_MS: z.coerce.number().int().min(0).default(200),
  FRAME_READ_TIMEOUT_MS: positiveInt(15000),
  HTTP_LOGIN_TIMEOUT_MS: positiveInt(10000),
  HTTP_SNAPSHOT_TIMEOUT_MS: positiveInt(15000),
  FFMPEG_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  // Empty strings in .env files mean "unset".
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}`);
  }

  const values = parsed.data;

  return {
    camera: {
      host: values.CAMERA_HOST,
      username: values.CAMERA_USERNAME,
      password: values.CAMERA_PASSWORD,
    },
    defaultFormat: values.CAPTURE_FORMAT,
    defaultMethod: values.CAPTURE_METHOD,
    rtsp: {
      port: values.RTSP_PORT,
      paths: values.RTSP_PATHS,
      transport: values.RTSP_TRANSPORT,
      openTimeoutMs: values.STREAM_OPEN_TIMEOUT_MS,
      readAttempts: values.FRAME_READ_ATTEMPTS,
      readDelayMs: values.FRAME_READ_DELAY_MS,
      readTimeoutMs: values.FRAME_READ_TIMEOUT_MS,
    },
    http: {
      loginTimeoutMs: values.HTTP_LOGIN_TIMEOUT_MS,
      snapshotTimeoutMs: values.HTTP_SNAPSHOT_TIMEOUT_MS,
    },
    ffmpegPath: values.FFMPEG_PATH,
    logLevel: values.LOG_LEVEL,
  };
}

export const config = loadConfig();
