import { counter, histogram } from './metrics';
import { withTimeout } from './errors';

export function metricTargetFromRpc(rpc: string, fallback = 'public'): string {
  try {
    return new URL(rpc).host;
  } catch {
    return fallback;
  }
}

type InstrumentOptions = {
  target?: string;
  timeoutMs?: number;
};

/**
 * Times an RPC call into `rpc_call_duration_seconds`. With `timeoutMs` the call
 * is raced against a TransportError.
 */
export async function instrumentRpc<T>(
  name: string,
  operation: () => Promise<T>,
  options: InstrumentOptions = {},
): Promise<T> {
  const end = histogram.rpcCallDuration.startTimer();
  const labels = { operation: name, target: options.target ?? 'public' };
  try {
    const pending = operation();
    const result = options.timeoutMs ? await withTimeout(pending, options.timeoutMs, name) : await pending;
    end({ ...labels, status: 'success' });
    return result;
  } catch (error) {
    end({ ...labels, status: 'error' });
    counter.rpcErrors.inc(labels);
    throw error;
  }
}
