import type Redis from 'ioredis';
import { TransportError, errorMessage } from '../infra/errors';
import type { TradeSignal } from '../pipeline/types';
import type { ExecutionManager } from './execution_client';
import { serializeSignal } from './wire';

/**
 * Shared set of live trades awaiting a result. `reserve` must be atomic:
 * it admits the trade only while fewer than `limit` are pending.
 */
export interface InFlightStore {
  count(): Promise<number>;
  reserve(tradeId: string, limit: number): Promise<boolean>;
  release(tradeId: string): Promise<boolean>;
}

const RESERVE_SCRIPT = `
if redis.call('SISMEMBER', KEYS[1], ARGV[1]) == 1 then return 1 end
if redis.call('SCARD', KEYS[1]) >= tonumber(ARGV[2]) then return 0 end
redis.call('SADD', KEYS[1], ARGV[1])
return 1
`;

export class RedisInFlightStore implements InFlightStore {
  constructor(
    private readonly redis: Redis,
    private readonly key = 'pending_txs',
  ) {}

  count(): Promise<number> {
    return this.redis.scard(this.key);
  }

  async reserve(tradeId: string, limit: number): Promise<boolean> {
    const admitted = await this.redis.eval(RESERVE_SCRIPT, 1, this.key, tradeId, String(limit));
    return admitted === 1;
  }

  async release(tradeId: string): Promise<boolean> {
    return (await this.redis.srem(this.key, tradeId)) > 0;
  }
}

/** Single-process stand-in; JavaScript's run-to-completion keeps reserve atomic. */
export class MemoryInFlightStore implements InFlightStore {
  private readonly pending = new Set<string>();

  async count(): Promise<number> {
    return this.pending.size;
  }

  async reserve(tradeId: string, limit: number): Promise<boolean> {
    if (this.pending.has(tradeId)) return true;
    if (this.pending.size >= limit) return false;
    this.pending.add(tradeId);
    return true;
  }

  async release(tradeId: string): Promise<boolean> {
    return this.pending.delete(tradeId);
  }
}

/** Hands a validated live trade to the external executor. Throws when the hand-off failed. */
export interface SignalChannel {
  readonly name: string;
  forward(tradeId: string, signal: TradeSignal): Promise<void>;
}

export class RedisSignalChannel implements SignalChannel {
  readonly name = 'redis';

  constructor(
    private readonly redis: Redis,
    private readonly channel = 'trade_signals',
  ) {}

  async forward(tradeId: string, signal: TradeSignal): Promise<void> {
    const payload = {
      ...serializeSignal(signal, tradeId),
      timestamp: Date.now() / 1000,
      mode: 'LIVE',
    };
    try {
      await this.redis.publish(this.channel, JSON.stringify(payload));
    } catch (err) {
      throw new TransportError(`publish to ${this.channel} failed: ${errorMessage(err)}`);
    }
  }
}

export class ExecutionServiceChannel implements SignalChannel {
  readonly name = 'http';

  constructor(private readonly manager: ExecutionManager) {}

  async forward(tradeId: string, signal: TradeSignal): Promise<void> {
    const outcome = await this.manager.submitSignal(signal, tradeId);
    if (!outcome.ok) {
      throw new TransportError(`execution service did not accept ${tradeId}: ${outcome.error}`, {
        permanent: outcome.permanent,
        attempts: outcome.attempts,
      });
    }
  }
}

export type PaperTradeRecord = {
  tradeId: string;
  chainId: number;
  token: string;
  amount: string;
  expectedProfitUsd: string;
  realizedProfitUsd: string;
  capitalUsd: string;
  profitable: boolean;
  timestamp: number;
};

/** Best-effort record of simulated trades. */
export interface TradeJournal {
  record(entry: PaperTradeRecord): Promise<void>;
}

export class RedisTradeJournal implements TradeJournal {
  constructor(
    private readonly redis: Redis,
    private readonly listKey = 'paper_trades',
    private readonly capitalKey = 'paper_capital',
  ) {}

  async record(entry: PaperTradeRecord): Promise<void> {
    await this.redis.multi().lpush(this.listKey, JSON.stringify(entry)).set(this.capitalKey, entry.capitalUsd).exec();
  }
}
