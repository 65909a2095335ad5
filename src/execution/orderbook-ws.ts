/**
 * REAL-TIME ORDER BOOK via WebSocket
 *
 * Streams best bid/ask for a set of tokens from the CLOB market channel.
 * Each subscription owns its socket and reconnects until closed.
 */

import WebSocket from 'ws';
import type { BookUpdate, OrderBookStream, StreamSubscription } from '../types/venue';
import { errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';
import { MARKET_WS_PING_MS, MARKET_WS_RECONNECT_MS } from '../config/constants';

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPrice(value: unknown): number | undefined {
  const n = typeof value === 'string' ? parseFloat(value) : typeof value === 'number' ? value : NaN;
  return Number.isFinite(n) ? n : undefined;
}

function levelPrices(levels: unknown): number[] {
  if (!Array.isArray(levels)) return [];
  const prices: number[] = [];
  for (const level of levels) {
    const price = isJson(level) ? toPrice(level.price) : undefined;
    if (price !== undefined) prices.push(price);
  }
  return prices;
}

function parseEvent(event: Json): BookUpdate[] {
  if (event.event_type === 'book' && typeof event.asset_id === 'string') {
    // Older payloads name the sides buys/sells
    const bids = levelPrices(event.bids ?? event.buys);
    const asks = levelPrices(event.asks ?? event.sells);
    return [{
      token_id: event.asset_id,
      best_bid: bids.length > 0 ? Math.max(...bids) : undefined,
      best_ask: asks.length > 0 ? Math.min(...asks) : undefined,
    }];
  }

  if (event.event_type === 'price_change' && Array.isArray(event.price_changes)) {
    const changes: unknown[] = event.price_changes;
    const updates: BookUpdate[] = [];
    for (const change of changes) {
      if (!isJson(change) || typeof change.asset_id !== 'string') continue;
      updates.push({
        token_id: change.asset_id,
        best_bid: toPrice(change.best_bid),
        best_ask: toPrice(change.best_ask),
      });
    }
    return updates;
  }

  return [];
}

/**
 * Book updates carried by one market-channel frame. Heartbeats and unknown
 * events yield nothing; invalid JSON throws.
 */
export function parseMarketMessage(raw: string): BookUpdate[] {
  const text = raw.trim();
  if (text === '' || text.toUpperCase() === 'PONG') return [];

  const message: unknown = JSON.parse(text);
  const events: unknown[] = Array.isArray(message) ? message : [message];
  return events.filter(isJson).flatMap(parseEvent);
}

class MarketChannelSubscription implements StreamSubscription {
  private ws: WebSocket | null = null;
  private closed = false;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private pingInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly url: string,
    private readonly tokenIds: string[],
    private readonly onUpdate: (update: BookUpdate) => void,
    private readonly log: Logger,
    private readonly reconnectMs: number,
  ) {
    this.connect();
  }

  private connect(): void {
    if (this.closed) return;

    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      ws.send(JSON.stringify({ assets_ids: this.tokenIds, type: 'market' }));
      this.log.debug(`📡 Subscribed to ${this.tokenIds.length} order books`);
      this.pingInterval = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.send('PING');
      }, MARKET_WS_PING_MS);
    });

    ws.on('message', (data: WebSocket.RawData) => {
      const text = data.toString();
      let updates: BookUpdate[];
      try {
        updates = parseMarketMessage(text);
      } catch (error) {
        this.log.debug(`Unparseable market message: ${errorMessage(error)}`, { message: text.slice(0, 200) });
        return;
      }
      for (const update of updates) {
        this.onUpdate(update);
      }
    });

    ws.on('close', () => {
      this.clearPing();
      this.ws = null;
      if (this.closed) return;
      this.log.info(`📡 Order book WebSocket disconnected, reconnecting in ${this.reconnectMs / 1000}s`);
      this.reconnectTimeout = setTimeout(() => {
        this.reconnectTimeout = null;
        this.connect();
      }, this.reconnectMs);
    });

    ws.on('error', (error: Error) => {
      // 'close' follows and handles the reconnect
      this.log.warn(`⚠️ Order book WebSocket error: ${error.message}`);
    });
  }

  private clearPing(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  close(): void {
    this.closed = true;
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    this.clearPing();
    if (this.ws) {
      this.ws.removeAllListeners();
      // Closing a socket that is still connecting emits an error
      this.ws.on('error', (error: Error) => this.log.debug(`Socket error after close: ${error.message}`));
      this.ws.close();
      this.ws = null;
    }
  }
}

export class OrderBookWebSocket implements OrderBookStream {
  private readonly url: string;

  constructor(
    wsBaseUrl: string,
    private readonly log: Logger = rootLogger.child('book-ws'),
    private readonly reconnectMs: number = MARKET_WS_RECONNECT_MS,
  ) {
    this.url = `${wsBaseUrl.replace(/\/$/, '')}/ws/market`;
  }

  subscribe(tokenIds: string[], onUpdate: (update: BookUpdate) => void): StreamSubscription {
    return new MarketChannelSubscription(this.url, tokenIds, onUpdate, this.log, this.reconnectMs);
  }
}
