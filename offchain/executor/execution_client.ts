import { setTimeout as sleep } from 'timers/promises';
import WebSocket, { type RawData } from 'ws';
import type { ZodType, ZodTypeDef } from 'zod';
import type { ExecutionModeName, ExecutionServiceSettings } from '../infra/config';
import { TransportError, ValidationError, errorMessage, isRetryable } from '../infra/errors';
import { log } from '../infra/logger';
import { counter } from '../infra/metrics';
import type { TradeSignal } from '../pipeline/types';
import type { Executor } from './execution_modes';
import {
  BatchResponseSchema,
  ExecuteResponseSchema,
  HealthResponseSchema,
  SimulateResponseSchema,
  StatsResponseSchema,
  parseStreamEvent,
  reportFromStream,
  serializeSignal,
  type BatchResponse,
  type ExecuteResponse,
  type HealthResponse,
  type SimulateResponse,
  type StatsResponse,
  type StreamEvent,
} from './wire';

function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type StreamHandle = { close(): void };

export type ExecutionClientOptions = {
  host: string;
  port: number;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  reconnectDelayMs?: number;
};

/**
 * Transport to the external execution service: JSON over HTTP for requests,
 * a WebSocket for asynchronous results. Non-2xx answers surface as errors:
 * 4xx as ValidationError (permanent), everything else as TransportError.
 */
export class ExecutionClient {
  private readonly clientLog = log.child({ module: 'executor.client' });
  private readonly baseUrl: string;
  private readonly wsUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ExecutionClientOptions) {
    this.baseUrl = `http://${options.host}:${options.port}`;
    this.wsUrl = `ws://${options.host}:${options.port}/ws`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  healthCheck(): Promise<HealthResponse> {
    return this.request('GET', '/health', HealthResponseSchema);
  }

  executeSignal(signal: TradeSignal, tradeId?: string): Promise<ExecuteResponse> {
    return this.request('POST', '/execute', ExecuteResponseSchema, serializeSignal(signal, tradeId));
  }

  executeBatch(signals: readonly TradeSignal[]): Promise<BatchResponse> {
    const body = { signals: signals.map((signal) => serializeSignal(signal)) };
    return this.request('POST', '/execute/batch', BatchResponseSchema, body);
  }

  simulateSignal(signal: TradeSignal): Promise<SimulateResponse> {
    return this.request('POST', '/simulate', SimulateResponseSchema, serializeSignal(signal));
  }

  getStats(): Promise<StatsResponse> {
    return this.request('GET', '/stats', StatsResponseSchema);
  }

  /** Subscribes to result events; reconnects until the handle is closed. */
  streamUpdates(callback: (event: StreamEvent) => void): StreamHandle {
    let closed = false;
    let socket: WebSocket | null = null;
    let retryTimer: NodeJS.Timeout | null = null;
    const reconnectDelayMs = this.options.reconnectDelayMs ?? 5_000;

    const connect = () => {
      socket = new WebSocket(this.wsUrl);
      socket.on('open', () => this.clientLog.info({ url: this.wsUrl }, 'execution-stream-connected'));
      socket.on('message', (data) => {
        const event = parseStreamEvent(decodeFrame(data));
        if (!event) {
          this.clientLog.debug('execution-stream-message-unparsed');
          return;
        }
        try {
          callback(event);
        } catch (err) {
          this.clientLog.warn({ type: event.type, err: errorMessage(err) }, 'execution-stream-callback-failed');
        }
      });
      socket.on('error', (err) => this.clientLog.warn({ err: errorMessage(err) }, 'execution-stream-error'));
      socket.on('close', () => {
        socket = null;
        if (closed) return;
        this.clientLog.warn({ retryInMs: reconnectDelayMs }, 'execution-stream-closed');
        retryTimer = setTimeout(connect, reconnectDelayMs);
        retryTimer.unref();
      });
    };
    connect();

    return {
      close: () => {
        closed = true;
        if (retryTimer) clearTimeout(retryTimer);
        socket?.close();
      },
    };
  }

  private async request<T>(
    method: 'GET' | 'POST',
    endpoint: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      counter.clientRequests.inc({ endpoint, status: 'transport-error' });
      throw new TransportError(`${method} ${endpoint} failed: ${errorMessage(err)}`, { endpoint });
    }
    counter.clientRequests.inc({ endpoint, status: String(res.status) });
    if (res.status >= 400 && res.status < 500) {
      const text = await res.text().catch(() => '');
      throw new ValidationError(`${method} ${endpoint} rejected with ${res.status}: ${text}`.trim(), {
        endpoint,
        status: res.status,
      });
    }
    if (!res.ok) {
      throw new TransportError(`${method} ${endpoint} answered ${res.status}`, { endpoint, status: res.status });
    }
    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new TransportError(`${method} ${endpoint} returned invalid JSON: ${errorMessage(err)}`, { endpoint });
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(`${method} ${endpoint} returned an unexpected body`, {
        endpoint,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }
}

export type ClientCounters = {
  sent: number;
  succeeded: number;
  failed: number;
  retried: number;
};

export type SubmitOutcome =
  | { ok: true; response: ExecuteResponse; attempts: number }
  | { ok: false; permanent: boolean; error: string; attempts: number };

export type Sleeper = (ms: number) => Promise<unknown>;

/** Owns the client, reconciles modes with the service and retries submissions. */
export class ExecutionManager {
  private readonly managerLog = log.child({ module: 'executor.manager' });
  private readonly counters: ClientCounters = { sent: 0, succeeded: 0, failed: 0, retried: 0 };
  private currentMode: ExecutionModeName;
  private ready = false;

  constructor(
    readonly client: ExecutionClient,
    private readonly settings: Pick<ExecutionServiceSettings, 'maxRetries' | 'retryDelayMs'>,
    localMode: ExecutionModeName,
    private readonly pause: Sleeper = sleep,
  ) {
    this.currentMode = localMode;
  }

  get mode(): ExecutionModeName {
    return this.currentMode;
  }

  get isReady(): boolean {
    return this.ready;
  }

  async initialize(): Promise<boolean> {
    try {
      const health = await this.client.healthCheck();
      if (health.status !== 'healthy') {
        this.managerLog.error({ status: health.status }, 'execution-service-unhealthy');
        this.ready = false;
        return false;
      }
      const serverMode = health.mode.toLowerCase();
      if (serverMode !== this.currentMode) {
        if (serverMode === 'paper' || serverMode === 'live' || serverMode === 'hybrid') {
          this.managerLog.warn({ local: this.currentMode, server: serverMode }, 'execution-mode-mismatch-server-wins');
          this.currentMode = serverMode;
        } else {
          this.managerLog.warn({ server: health.mode }, 'execution-service-mode-unrecognized');
        }
      }
      this.ready = true;
      this.managerLog.info({ mode: this.currentMode, chains: health.chains }, 'execution-service-ready');
      return true;
    } catch (err) {
      this.managerLog.error({ err: errorMessage(err) }, 'execution-service-health-failed');
      this.ready = false;
      return false;
    }
  }

  async submitSignal(signal: TradeSignal, tradeId?: string): Promise<SubmitOutcome> {
    this.counters.sent += 1;
    const maxAttempts = Math.max(1, this.settings.maxRetries);
    let lastError = 'no attempt made';
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const response = await this.client.executeSignal(signal, tradeId);
        if (response.success) {
          this.counters.succeeded += 1;
          return { ok: true, response, attempts: attempt };
        }
        lastError = response.error ?? 'execution service reported failure';
      } catch (err) {
        lastError = errorMessage(err);
        if (!isRetryable(err)) {
          this.counters.failed += 1;
          this.managerLog.warn({ tradeId, chainId: signal.chainId, err: lastError }, 'execution-submit-rejected');
          return { ok: false, permanent: true, error: lastError, attempts: attempt };
        }
      }
      if (attempt < maxAttempts) {
        this.counters.retried += 1;
        counter.clientRetries.inc();
        this.managerLog.warn({ tradeId, attempt, err: lastError }, 'execution-submit-retry');
        await this.pause(this.settings.retryDelayMs);
      }
    }
    this.counters.failed += 1;
    this.managerLog.error({ tradeId, chainId: signal.chainId, attempts: maxAttempts, err: lastError }, 'execution-submit-failed');
    return { ok: false, permanent: false, error: lastError, attempts: maxAttempts };
  }

  async submitBatch(signals: readonly TradeSignal[]): Promise<BatchResponse | null> {
    this.counters.sent += signals.length;
    try {
      const batch = await this.client.executeBatch(signals);
      this.counters.succeeded += batch.succeeded;
      this.counters.failed += batch.failed;
      return batch;
    } catch (err) {
      this.counters.failed += signals.length;
      this.managerLog.error({ count: signals.length, err: errorMessage(err) }, 'execution-batch-failed');
      return null;
    }
  }

  async statistics(): Promise<{ client: ClientCounters; server: StatsResponse | null }> {
    let server: StatsResponse | null = null;
    try {
      server = await this.client.getStats();
    } catch (err) {
      this.managerLog.debug({ err: errorMessage(err) }, 'execution-stats-unavailable');
    }
    return { client: { ...this.counters }, server };
  }
}

/** Feeds terminal stream events into the executor's result recording. */
export function routeStreamResults(client: ExecutionClient, executor: Pick<Executor, 'recordExecutionResult'>): StreamHandle {
  const routeLog = log.child({ module: 'executor.stream' });
  return client.streamUpdates((event) => {
    if (event.type === 'error') {
      routeLog.warn({ message: event.message }, 'execution-stream-server-error');
      return;
    }
    const delivered = reportFromStream(event);
    if (!delivered) return;
    executor.recordExecutionResult(delivered.tradeId, delivered.report).catch((err) => {
      routeLog.warn({ tradeId: delivered.tradeId, err: errorMessage(err) }, 'execution-result-record-failed');
    });
  });
}
