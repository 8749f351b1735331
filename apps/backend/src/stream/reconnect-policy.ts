export type ConnectionState =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'failed'
  | 'backoff'
  | 'reconnecting'
  | 'stopped';

export interface ReconnectOptions {
  baseDelayMs: number;
  /** Cap for the exponential delay; equal to `baseDelayMs` gives a fixed backoff. */
  maxDelayMs: number;
  /** Fraction of the delay added or removed at random, 0..1. */
  jitter: number;
  /** 0 retries forever. */
  maxAttempts: number;
}

export const DEFAULT_RECONNECT_OPTIONS: ReconnectOptions = {
  baseDelayMs: 500,
  maxDelayMs: 500,
  jitter: 0,
  maxAttempts: 0,
};

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  idle: ['connecting', 'stopped'],
  connecting: ['connected', 'failed', 'stopped'],
  connected: ['failed', 'stopped'],
  failed: ['backoff', 'stopped'],
  backoff: ['reconnecting', 'stopped'],
  reconnecting: ['connected', 'failed', 'stopped'],
  stopped: ['idle'],
};

export class InvalidTransitionError extends Error {
  constructor(from: ConnectionState, to: ConnectionState) {
    super(`Invalid connection transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Connection lifecycle of one stream session:
 * `connecting → connected → failed → backoff → reconnecting → connected ...`
 * It never sleeps itself; the caller waits for the delay returned by `scheduleBackoff`.
 */
export class ReconnectPolicy {
  private current: ConnectionState = 'idle';
  private attempts = 0;
  private lastFailure?: string;

  constructor(
    private readonly options: ReconnectOptions = DEFAULT_RECONNECT_OPTIONS,
    private readonly random: () => number = Math.random,
  ) {}

  get state(): ConnectionState {
    return this.current;
  }

  get reconnectAttempts(): number {
    return this.attempts;
  }

  get lastError(): string | undefined {
    return this.lastFailure;
  }

  /** `idle → connecting` for the first attempt, `backoff → reconnecting` afterwards. */
  beginAttempt(): void {
    this.transition(this.current === 'backoff' ? 'reconnecting' : 'connecting');
  }

  connected(): void {
    this.transition('connected');
    this.attempts = 0;
    this.lastFailure = undefined;
  }

  failed(reason: string): void {
    this.transition('failed');
    this.lastFailure = reason;
  }

  /**
   * Move `failed → backoff` and return the delay before the next attempt, or stop and
   * return undefined when the attempt budget is spent.
   */
  scheduleBackoff(): number | undefined {
    if (this.options.maxAttempts > 0 && this.attempts >= this.options.maxAttempts) {
      this.transition('stopped');
      return undefined;
    }
    this.transition('backoff');
    this.attempts += 1;
    return this.delayFor(this.attempts);
  }

  stop(): void {
    if (this.current !== 'stopped') {
      this.transition('stopped');
    }
  }

  reset(): void {
    if (this.current !== 'idle') {
      this.stop();
      this.transition('idle');
    }
    this.attempts = 0;
    this.lastFailure = undefined;
  }

  private delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options;
    const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
    const cappedDelay = maxDelayMs > 0 ? Math.min(exponentialDelay, maxDelayMs) : exponentialDelay;
    const jitterRange = cappedDelay * jitter;
    const offset = jitterRange ? (this.random() * 2 - 1) * jitterRange : 0;
    return Math.max(0, Math.round(cappedDelay + offset));
  }

  private transition(next: ConnectionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.current = next;
  }
}
