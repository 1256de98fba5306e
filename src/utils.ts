import { Queue } from '@datastructures-js/queue';

class AsyncQueue<T> {
  private readonly _queue: Queue<T> = new Queue();
  private readonly _waitingResolvers: Queue<(value: T) => void> = new Queue();

  put(item: T) {
    if (this._waitingResolvers.size() > 0) {
      const resolver = this._waitingResolvers.dequeue();
      if (resolver) {
        resolver(item);
      }
    } else {
      this._queue.push(item);
    }
  }

  async get(): Promise<T> {
    if (this._queue.size() > 0) {
      return this._queue.dequeue();
    }

    return new Promise<T>((resolve) => {
      this._waitingResolvers.push(resolve);
    });
  }

  length(): number {
    return this._queue.size();
  }

  clear() {
    this._queue.clear();
  }
}

class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(operation, timeoutMs)),
      timeoutMs,
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function toDecimalString(origNumberStr: string, decimalPlaces: number): string {
  if (decimalPlaces === 0) return origNumberStr;
  const negative = origNumberStr.startsWith('-');
  const digits = negative ? origNumberStr.slice(1) : origNumberStr;
  const sign = negative ? '-' : '';
  // If the string is of length equal to or less than decimalPlaces, add '0.' before it
  if (digits.length <= decimalPlaces) {
    return sign + '0.' + digits.padStart(decimalPlaces, '0');
  }
  const integerPart = digits.slice(0, -decimalPlaces);
  const decimalPart = digits.slice(-decimalPlaces);
  return sign + integerPart + '.' + decimalPart;
}

function shortenAddress(address: string, visible = 4): string {
  if (address.length <= visible * 2 + 3) return address;
  return `${address.slice(0, visible)}...${address.slice(-visible)}`;
}

export {
  AsyncQueue,
  TimeoutError,
  sleep,
  withTimeout,
  toDecimalString,
  shortenAddress,
};
