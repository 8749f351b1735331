import { TransportError } from '../frames/frame.errors';
import type { FrameDimensions } from '../frames/frame.types';

export interface StreamSource {
  /** Label used in logs, e.g. the URL. */
  readonly description: string;
  /**
   * Open the transport. The returned iterable yields body chunks until the peer closes
   * or `signal` aborts; failures surface as TransportError.
   */
  open(signal: AbortSignal): Promise<AsyncIterable<Uint8Array>>;
}

export interface HttpStreamSourceOptions {
  url: string;
  connectTimeoutMs: number;
  /** Longest gap between two body chunks before the connection counts as dead. */
  readTimeoutMs: number;
}

export interface CapturedFrame {
  bytes: Uint8Array;
  dimensions: FrameDimensions;
  /** Raw `X-Frame-Format` header, when the device sent one. */
  formatHint?: string;
}

function validateStreamUrl(urlString: string): string {
  const parsed = new URL(urlString);
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error('Only HTTP and HTTPS protocols are allowed');
  }
  return urlString;
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

function toTransportError(error: unknown, signal: AbortSignal, fallback: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (signal.aborted && signal.reason instanceof TransportError) {
    return signal.reason;
  }
  return new TransportError(`${fallback}: ${describeFailure(error)}`, { cause: error });
}

/**
 * Opens `GET <url>` with a connect timeout, forwarding cancellation from the caller.
 * The returned controller aborts the request and is what the timeouts trigger.
 */
async function openRequest(
  url: string,
  connectTimeoutMs: number,
  signal: AbortSignal,
): Promise<{ response: Response; controller: AbortController; detach: () => void }> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal.reason);
  if (signal.aborted) {
    forwardAbort();
  } else {
    signal.addEventListener('abort', forwardAbort, { once: true });
  }
  const detach = () => signal.removeEventListener('abort', forwardAbort);

  const connectTimer = setTimeout(() => {
    controller.abort(new TransportError(`Connection to ${url} timed out after ${connectTimeoutMs}ms`));
  }, connectTimeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal, redirect: 'manual' });
    if (!response.ok) {
      controller.abort();
      throw new TransportError(`${url} responded with HTTP ${response.status}`);
    }
    return { response, controller, detach };
  } catch (error) {
    detach();
    throw toTransportError(error, controller.signal, `Request to ${url} failed`);
  } finally {
    clearTimeout(connectTimer);
  }
}

export class HttpStreamSource implements StreamSource {
  private readonly url: string;

  constructor(private readonly options: HttpStreamSourceOptions) {
    this.url = validateStreamUrl(options.url);
  }

  get description(): string {
    return this.url;
  }

  async open(signal: AbortSignal): Promise<AsyncIterable<Uint8Array>> {
    const { response, controller, detach } = await openRequest(
      this.url,
      this.options.connectTimeoutMs,
      signal,
    );
    const body = response.body;
    if (!body) {
      detach();
      controller.abort();
      throw new TransportError(`${this.url} returned an empty body`);
    }
    return this.readBody(body, controller, detach);
  }

  private async *readBody(
    body: AsyncIterable<unknown>,
    controller: AbortController,
    detach: () => void,
  ): AsyncGenerator<Uint8Array> {
    const { readTimeoutMs } = this.options;
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        controller.abort(new TransportError(`No data from ${this.url} for ${readTimeoutMs}ms`));
      }, readTimeoutMs);
    };

    try {
      armIdleTimer();
      for await (const chunk of body) {
        armIdleTimer();
        if (chunk instanceof Uint8Array) {
          yield chunk;
        }
      }
    } catch (error) {
      throw toTransportError(error, controller.signal, `Reading ${this.url} failed`);
    } finally {
      clearTimeout(idleTimer);
      detach();
      // Closes the socket when the consumer stops early.
      controller.abort();
    }
  }
}

function parseDimensionHeader(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * One frame from the device's single-capture endpoint. `X-Frame-Width` and
 * `X-Frame-Height` response headers take precedence over `fallbackDimensions`.
 */
export async function fetchSingleFrame(
  url: string,
  fallbackDimensions: FrameDimensions,
  timeoutMs: number,
  signal: AbortSignal = new AbortController().signal,
): Promise<CapturedFrame> {
  const target = validateStreamUrl(url);
  const { response, controller, detach } = await openRequest(target, timeoutMs, signal);
  const bodyTimer = setTimeout(() => {
    controller.abort(new TransportError(`Capture from ${target} timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  try {
    const bytes = new Uint8Array(await response.arrayBuffer());
    return {
      bytes,
      dimensions: {
        width: parseDimensionHeader(response.headers.get('x-frame-width')) ?? fallbackDimensions.width,
        height:
          parseDimensionHeader(response.headers.get('x-frame-height')) ?? fallbackDimensions.height,
      },
      formatHint: response.headers.get('x-frame-format') ?? undefined,
    };
  } catch (error) {
    throw toTransportError(error, controller.signal, `Reading capture from ${target} failed`);
  } finally {
    clearTimeout(bodyTimer);
    detach();
  }
}
