import WebSocket from 'ws';
import { z } from 'zod';
import type { Commitment } from '@solana/web3.js';
import { SubscriptionError, TransportError } from '../errors.js';

export type LogStreamHandlers = {
  onNotification: (message: unknown) => void;
  // not called for closes the owner asked for
  onClose: (error: Error) => void;
};

/** Pub/sub connection that delivers program log notifications. */
export interface LogStream {
  connect(handlers: LogStreamHandlers): Promise<void>;
  /** Resolves with the subscription id once the server acknowledges it. */
  subscribe(address: string): Promise<number>;
  close(): void;
}

export type LogStreamFactory = () => LogStream;

const AckSchema = z.object({
  id: z.number(),
  result: z.number(),
});

const RpcErrorSchema = z.object({
  id: z.number(),
  error: z.object({
    code: z.number(),
    message: z.string(),
  }),
});

type PendingAck = {
  resolve: (subscriptionId: number) => void;
  reject: (error: Error) => void;
};

class WebSocketLogStream implements LogStream {
  private ws: WebSocket | null = null;
  private handlers: LogStreamHandlers | null = null;
  private readonly pendingAcks: Map<number, PendingAck> = new Map();
  private nextRequestId = 1;
  private closing = false;

  constructor(
    private readonly url: string,
    private readonly commitment: Commitment = 'processed',
  ) {}

  connect(handlers: LogStreamHandlers): Promise<void> {
    this.handlers = handlers;
    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;
      let opened = false;
      let lastError: Error | null = null;

      ws.on('open', () => {
        opened = true;
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleMessage(data.toString());
      });

      ws.on('error', (error) => {
        lastError = error;
        if (!opened) {
          reject(
            new TransportError(`cannot connect to ${this.url}: ${error.message}`, {
              cause: error,
            }),
          );
        }
      });

      ws.on('close', (code, reason) => {
        const error = new TransportError(
          `log stream closed (${code}${reason.length > 0 ? ` ${reason.toString()}` : ''})`,
          { cause: lastError ?? undefined },
        );
        this.rejectPending(error);
        if (!opened) {
          reject(error);
        } else if (!this.closing) {
          handlers.onClose(error);
        }
      });
    });
  }

  subscribe(address: string): Promise<number> {
    const ws = this.ws;
    if (ws === null || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(
        new SubscriptionError(`cannot subscribe to ${address}: stream not open`),
      );
    }

    const id = this.nextRequestId++;
    return new Promise<number>((resolve, reject) => {
      this.pendingAcks.set(id, { resolve, reject });
      ws.send(
        JSON.stringify({
          jsonrpc: '2.0',
          id,
          method: 'logsSubscribe',
          params: [{ mentions: [address] }, { commitment: this.commitment }],
        }),
        (error) => {
          if (error) {
            this.pendingAcks.delete(id);
            reject(
              new SubscriptionError(`logsSubscribe for ${address} not sent`, {
                cause: error,
              }),
            );
          }
        },
      );
    });
  }

  close() {
    this.closing = true;
    this.rejectPending(new SubscriptionError('log stream closed'));
    const ws = this.ws;
    this.ws = null;
    if (ws === null) return;
    if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000, 'client closed');
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }
  }

  private handleMessage(text: string) {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch {
      // the decoder reports it as malformed
      message = text;
    }

    const ack = AckSchema.safeParse(message);
    if (ack.success) {
      const pending = this.pendingAcks.get(ack.data.id);
      if (pending) {
        this.pendingAcks.delete(ack.data.id);
        pending.resolve(ack.data.result);
      }
      return;
    }

    const refusal = RpcErrorSchema.safeParse(message);
    if (refusal.success) {
      const pending = this.pendingAcks.get(refusal.data.id);
      if (pending) {
        this.pendingAcks.delete(refusal.data.id);
        pending.reject(
          new SubscriptionError(
            `logsSubscribe refused: ${refusal.data.error.message} (${refusal.data.error.code})`,
          ),
        );
      }
      return;
    }

    this.handlers?.onNotification(message);
  }

  private rejectPending(error: Error) {
    for (const pending of this.pendingAcks.values()) {
      pending.reject(error);
    }
    this.pendingAcks.clear();
  }
}

export { WebSocketLogStream };
