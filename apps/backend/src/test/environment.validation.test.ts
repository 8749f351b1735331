import { afterEach, describe, expect, it, vi } from 'vitest';

import configuration from '../config/configuration';
import { validateEnvironment } from '../config/environment.validation';

describe('validateEnvironment', () => {
  it('fills in defaults for an empty environment', () => {
    expect(validateEnvironment({})).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      HTTP_PREFIX: 'api',
      LOG_LEVEL: 'info',
      STRUCTURED_LOGS: true,
    });
  });

  it('coerces numeric frame settings', () => {
    const env = validateEnvironment({
      FRAME_WIDTH: '1940',
      FRAME_HEIGHT: '1100',
      FRAME_FORMAT: 'raw10-packed-5per4',
      FRAME_RAW8_BIT_DEPTH: '12',
      STREAM_RECONNECT_JITTER: '0.25',
    });

    expect(env).toMatchObject({
      FRAME_WIDTH: 1940,
      FRAME_HEIGHT: 1100,
      FRAME_FORMAT: 'raw10-packed-5per4',
      FRAME_RAW8_BIT_DEPTH: 12,
      STREAM_RECONNECT_JITTER: 0.25,
    });
  });

  it('rejects a width that splits the pixel groups of a fixed format', () => {
    expect(() =>
      validateEnvironment({ FRAME_FORMAT: 'raw10-packed-5per4', FRAME_WIDTH: '1938' }),
    ).toThrow(/FRAME_WIDTH 1938 does not fit the pixel grouping of raw10-packed-5per4/);
  });

  it('rejects unknown formats', () => {
    expect(() => validateEnvironment({ FRAME_FORMAT: 'yuv422' })).toThrow(
      /Invalid environment configuration/,
    );
  });

  it('rejects a jitter outside 0..1', () => {
    expect(() => validateEnvironment({ STREAM_RECONNECT_JITTER: '1.5' })).toThrow(
      /STREAM_RECONNECT_JITTER/,
    );
  });
});

describe('configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses the sensor defaults', () => {
    vi.stubEnv('FRAME_WIDTH', '');
    vi.stubEnv('STREAM_URL', 'http://192.168.4.1/stream');
    vi.stubEnv('STREAM_CAPTURE_URL', '');

    const config = configuration();

    expect(config.frames).toMatchObject({ width: 1936, height: 1100, format: 'auto' });
    expect(config.stream.boundary).toBe('--raw_frame_boundary');
  });

  it('derives the capture endpoint from the stream URL', () => {
    vi.stubEnv('STREAM_URL', 'http://10.0.0.5:8080/stream');
    vi.stubEnv('STREAM_CAPTURE_URL', '');

    expect(configuration().stream.captureUrl).toBe('http://10.0.0.5:8080/capture');
  });
});
