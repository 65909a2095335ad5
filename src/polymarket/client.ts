/**
 * Polymarket CLOB client construction
 *
 * Supports EOA and Polymarket.com proxy wallet accounts
 */

import { type ApiKeyCreds, Chain, ClobClient } from '@polymarket/clob-client';
import { ethers } from 'ethers';
import type { Secrets } from '../config/config';
import { FatalError } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';

/**
 * Unauthenticated client for market and order book reads
 */
export function createPublicClobClient(host: string): ClobClient {
  return new ClobClient(host, Chain.POLYGON);
}

/**
 * Signing client for order placement. Uses API credentials from the
 * environment when all three are set, otherwise derives them from the key.
 */
export async function createTradingClobClient(
  host: string,
  secrets: Secrets,
  log: Logger = rootLogger.child('clob'),
): Promise<ClobClient> {
  if (!secrets.privateKey) {
    throw new FatalError('POLYMARKET_PRIVATE_KEY not set; cannot place live orders');
  }

  let wallet: ethers.Wallet;
  try {
    wallet = new ethers.Wallet(secrets.privateKey);
  } catch {
    throw new FatalError('POLYMARKET_PRIVATE_KEY is not a valid private key');
  }

  const funder = secrets.proxyWallet || '';
  log.info(`Signer: ${wallet.address}`);
  log.info(`Funder: ${funder || 'not set'}`);

  let creds: ApiKeyCreds;
  if (secrets.apiKey && secrets.apiSecret && secrets.apiPassphrase) {
    creds = { key: secrets.apiKey, secret: secrets.apiSecret, passphrase: secrets.apiPassphrase };
  } else {
    const basicClient = new ClobClient(host, Chain.POLYGON, wallet);
    creds = await basicClient.createOrDeriveApiKey();
  }
  log.info(`API Key: ${creds.key.slice(0, 8)}...`);

  // SignatureType is a numeric enum in the order-utils package
  const signatureType: number = secrets.signatureType;
  return new ClobClient(host, Chain.POLYGON, wallet, creds, signatureType, funder || undefined);
}
