/**
 * Order placement through the CLOB SDK
 */

import { ClobClient, OrderType, Side } from '@polymarket/clob-client';
import type { OrderGateway, OrderResult, OrderSide } from '../types/venue';
import { FatalError, errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';

/**
 * SDK errors arrive as thrown Errors, axios-style `{ data: { error } }`,
 * or as an `error`/`errorMsg` field on a resolved response
 */
function sdkErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'data' in error) {
    const data: unknown = error.data;
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
  }
  return errorMessage(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function responseField(response: unknown, key: string): unknown {
  return isRecord(response) ? response[key] : undefined;
}

export class ClobOrderGateway implements OrderGateway {
  private client: ClobClient | null = null;
  private connecting: Promise<ClobClient> | null = null;

  /**
   * @param connect builds the signing client; called once, on first order
   */
  constructor(
    private readonly connect: () => Promise<ClobClient>,
    private readonly log: Logger = rootLogger.child('orders'),
  ) {}

  private async ensureClient(): Promise<ClobClient> {
    if (this.client) return this.client;
    if (!this.connecting) {
      this.connecting = this.connect().then(
        client => {
          this.client = client;
          return client;
        },
        (error: unknown) => {
          this.connecting = null;
          if (error instanceof FatalError) throw error;
          throw new Error(`CLOB client init failed: ${errorMessage(error)}`);
        },
      );
    }
    return this.connecting;
  }

  /**
   * Post a GTC limit order. Venue rejections resolve with success=false;
   * only an unusable signer (FatalError) is thrown.
   */
  async placeOrder(tokenId: string, side: OrderSide, size: number, price: number): Promise<OrderResult> {
    const client = await this.ensureClient();

    try {
      const order = await client.createOrder({
        tokenID: tokenId,
        price,
        size,
        side: side === 'BUY' ? Side.BUY : Side.SELL,
      });
      const response: unknown = await client.postOrder(order, OrderType.GTC);

      const orderId = responseField(response, 'orderID');
      if (typeof orderId === 'string' && orderId !== '' && responseField(response, 'success') !== false) {
        return { order_id: orderId, success: true };
      }

      const reason = responseField(response, 'errorMsg') ?? responseField(response, 'error');
      return {
        order_id: null,
        success: false,
        error_message: typeof reason === 'string' && reason !== '' ? reason : 'Order rejected',
      };
    } catch (error) {
      const message = sdkErrorMessage(error);
      this.log.debug(`${side} ${size} @ ${price} on ${tokenId.slice(0, 10)}... threw`, { error: message });
      return { order_id: null, success: false, error_message: message };
    }
  }
}
