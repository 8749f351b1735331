const parseNumberEnv = (value: string | undefined, fallback: number): number =>
  value !== undefined && value !== '' ? Number(value) : fallback;

const DEFAULT_STREAM_URL = 'http://192.168.4.1/stream';

function deriveCaptureUrl(streamUrl: string): string {
  const parsed = new URL(streamUrl);
  parsed.pathname = parsed.pathname.replace(/\/stream\/?$/, '/capture');
  if (!parsed.pathname.endsWith('/capture')) {
    parsed.pathname = '/capture';
  }
  return parsed.toString();
}

export default () => {
  const streamUrl = process.env.STREAM_URL || DEFAULT_STREAM_URL;

  return {
    env: process.env.NODE_ENV ?? 'development',
    http: {
      port: Number(process.env.PORT ?? 3000),
      prefix: process.env.HTTP_PREFIX ?? 'api',
    },
    frames: {
      width: parseNumberEnv(process.env.FRAME_WIDTH, 1936),
      height: parseNumberEnv(process.env.FRAME_HEIGHT, 1100),
      format: process.env.FRAME_FORMAT ?? 'auto',
      defaultFormat: process.env.FRAME_DEFAULT_FORMAT ?? 'rgb888',
      detectionToleranceBytes: parseNumberEnv(process.env.FRAME_DETECTION_TOLERANCE, 1000),
      minFrameBytes: parseNumberEnv(process.env.FRAME_MIN_BYTES, 1000),
      raw8BitDepth: parseNumberEnv(process.env.FRAME_RAW8_BIT_DEPTH, 10),
      captureDir: process.env.CAPTURE_DIR ?? 'captures',
    },
    stream: {
      enabled: process.env.STREAM_ENABLED !== 'false',
      url: streamUrl,
      captureUrl: process.env.STREAM_CAPTURE_URL || deriveCaptureUrl(streamUrl),
      boundary: process.env.STREAM_BOUNDARY ?? '--raw_frame_boundary',
      connectTimeoutMs: parseNumberEnv(process.env.STREAM_CONNECT_TIMEOUT_MS, 10_000),
      readTimeoutMs: parseNumberEnv(process.env.STREAM_READ_TIMEOUT_MS, 10_000),
      reconnectBaseMs: parseNumberEnv(process.env.STREAM_RECONNECT_BASE_MS, 500),
      reconnectMaxMs: parseNumberEnv(process.env.STREAM_RECONNECT_MAX_MS, 500),
      reconnectJitter: parseNumberEnv(process.env.STREAM_RECONNECT_JITTER, 0),
      reconnectMaxAttempts: parseNumberEnv(process.env.STREAM_RECONNECT_MAX_ATTEMPTS, 0),
    },
    consumer: {
      pollIntervalMs: parseNumberEnv(process.env.CONSUMER_POLL_INTERVAL_MS, 33),
    },
    logging: {
      level: process.env.LOG_LEVEL ?? 'info',
      structured: process.env.STRUCTURED_LOGS !== 'false',
    },
  };
};
