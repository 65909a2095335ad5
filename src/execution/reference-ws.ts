/**
 * Chainlink reference prices from the Polymarket RTDS socket
 *
 * One connection for the whole process; ticks for every configured symbol
 * are handed to the caller, which decides what to capture.
 */

import WebSocket from 'ws';
import type { ReferencePriceStream, ReferenceTick } from '../types/venue';
import { errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';
import { RTDS_PING_MS, RTDS_RECONNECT_MS, RTDS_TOPIC } from '../config/constants';

function toNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value.trim()) : typeof value === 'number' ? value : NaN;
  return Number.isFinite(n) ? n : undefined;
}

/**
 * "btc/usd" -> "btc"
 */
export function symbolKey(feedSymbol: string): string {
  const s = feedSymbol.trim().toLowerCase();
  const slash = s.indexOf('/');
  return slash >= 0 ? s.slice(0, slash) : s;
}

/**
 * The tick carried by one RTDS frame, or null when the frame is not a
 * Chainlink price for one of `symbols`. Invalid JSON throws.
 */
export function parseChainlinkMessage(raw: string, symbols: ReadonlySet<string>): ReferenceTick | null {
  const message: unknown = JSON.parse(raw);
  if (typeof message !== 'object' || message === null || !('topic' in message) || message.topic !== RTDS_TOPIC) {
    return null;
  }
  if (!('payload' in message)) return null;

  const payload: unknown = message.payload;
  if (typeof payload !== 'object' || payload === null) return null;
  if (!('symbol' in payload) || typeof payload.symbol !== 'string') return null;

  const symbol = symbolKey(payload.symbol);
  if (!symbols.has(symbol)) return null;

  const timestamp = 'timestamp' in payload ? toNumber(payload.timestamp) : undefined;
  const value = 'value' in payload ? toNumber(payload.value) : undefined;
  if (timestamp === undefined || value === undefined) return null;

  // Feed timestamps are usually milliseconds
  const timestampSec = timestamp > 1e12 ? Math.floor(timestamp / 1000) : Math.floor(timestamp);
  return { symbol, timestamp_sec: timestampSec, value };
}

export interface ChainlinkReferenceStreamOptions {
  url: string;
  symbols: string[];
  log?: Logger;
  reconnectMs?: number;
}

export class ChainlinkReferenceStream implements ReferencePriceStream {
  private readonly url: string;
  private readonly symbols: Set<string>;
  private readonly log: Logger;
  private readonly reconnectMs: number;

  private ws: WebSocket | null = null;
  private onTick: ((tick: ReferenceTick) => void) | null = null;
  private running = false;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private pingInterval: NodeJS.Timeout | null = null;

  constructor(options: ChainlinkReferenceStreamOptions) {
    this.url = options.url.replace(/\/$/, '');
    this.symbols = new Set(options.symbols.map(s => s.toLowerCase()));
    this.log = options.log ?? rootLogger.child('rtds');
    this.reconnectMs = options.reconnectMs ?? RTDS_RECONNECT_MS;
  }

  start(onTick: (tick: ReferenceTick) => void): void {
    if (this.running) return;
    this.running = true;
    this.onTick = onTick;
    this.connect();
  }

  private connect(): void {
    if (!this.running) return;
    this.log.info(`RTDS connecting: ${this.url} (topic: ${RTDS_TOPIC}, symbols: ${[...this.symbols].join(', ')})`);

    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      ws.send(JSON.stringify({
        action: 'subscribe',
        subscriptions: [{ topic: RTDS_TOPIC, type: '*', filters: '' }],
      }));
      this.log.info(`📡 RTDS subscribed to ${RTDS_TOPIC}`);
      this.pingInterval = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.ping();
      }, RTDS_PING_MS);
    });

    ws.on('message', (data: WebSocket.RawData) => {
      const text = data.toString();
      let tick: ReferenceTick | null;
      try {
        tick = parseChainlinkMessage(text, this.symbols);
      } catch (error) {
        this.log.debug(`Unparseable RTDS message: ${errorMessage(error)}`, { message: text.slice(0, 200) });
        return;
      }
      if (tick && this.onTick) this.onTick(tick);
    });

    ws.on('close', () => {
      this.clearPing();
      this.ws = null;
      if (!this.running) return;
      this.log.warn(`RTDS connection closed, reconnecting in ${this.reconnectMs / 1000}s`);
      this.reconnectTimeout = setTimeout(() => {
        this.reconnectTimeout = null;
        this.connect();
      }, this.reconnectMs);
    });

    ws.on('error', (error: Error) => {
      this.log.warn(`⚠️ RTDS error: ${error.message}`);
    });
  }

  private clearPing(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  stop(): void {
    this.running = false;
    this.onTick = null;
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    this.clearPing();
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.on('error', (error: Error) => this.log.debug(`RTDS error after stop: ${error.message}`));
      this.ws.close();
      this.ws = null;
    }
  }
}
