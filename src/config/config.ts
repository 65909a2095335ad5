/**
 * Runtime configuration
 *
 * Strategy settings come from a JSON file (written with defaults on first run).
 * Secrets only ever come from the environment (.env via dotenv).
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../types/errors';
import {
  CLOB_API_URL,
  GAMMA_API_URL,
  MARKET_WS_URL,
  POLYGON_RPC_URL,
  RTDS_WS_URL,
} from './constants';

export interface PolymarketSettings {
  gammaApiUrl: string;
  clobApiUrl: string;
  wsUrl: string;
  rtdsWsUrl: string;
  rpcUrl: string;
}

export interface StrategyConfig {
  symbols: string[];
  /** Max sum of (15m one side ask + 5m opposite side ask) to trigger an arb */
  sumThreshold: number;
  /** Cooldown after a recorded trade before the next one */
  tradeIntervalSecs: number;
  simulationMode: boolean;
  /** Shares per leg */
  arbShares: number;
  /** Per-symbol max |15m reference - 5m reference| (USD) */
  priceToBeatToleranceUsd: Record<string, number>;
  resolutionPollIntervalSecs: number;
  resolutionMaxWaitSecs: number;
  resolutionSettleDelaySecs: number;
  autoRedeem: boolean;
  overlapPollSecs: number;
  referencePollSecs: number;
  tradingPollMs: number;
  cycleDelaySecs: number;
}

export interface DashboardSettings {
  enabled: boolean;
  port: number;
}

export interface AppConfig {
  polymarket: PolymarketSettings;
  strategy: StrategyConfig;
  dashboard: DashboardSettings;
}

export interface Secrets {
  privateKey?: string;
  proxyWallet?: string;
  signatureType: 0 | 1 | 2;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
}

export function defaultConfig(): AppConfig {
  return {
    polymarket: {
      gammaApiUrl: GAMMA_API_URL,
      clobApiUrl: CLOB_API_URL,
      wsUrl: MARKET_WS_URL,
      rtdsWsUrl: RTDS_WS_URL,
      rpcUrl: POLYGON_RPC_URL,
    },
    strategy: {
      symbols: ['btc', 'eth', 'sol', 'xrp'],
      sumThreshold: 0.99,
      tradeIntervalSecs: 60,
      simulationMode: false,
      arbShares: 10,
      priceToBeatToleranceUsd: {
        btc: 10,
        eth: 1,
        sol: 0.05,
        xrp: 0.0003,
      },
      resolutionPollIntervalSecs: 30,
      resolutionMaxWaitSecs: 600,
      resolutionSettleDelaySecs: 60,
      autoRedeem: true,
      overlapPollSecs: 5,
      referencePollSecs: 10,
      tradingPollMs: 10,
      cycleDelaySecs: 5,
    },
    dashboard: {
      enabled: true,
      port: 3000,
    },
  };
}

/**
 * Reference-price tolerance for a symbol. Unknown symbols get 0.
 */
export function toleranceFor(strategy: StrategyConfig, symbol: string): number {
  return strategy.priceToBeatToleranceUsd[symbol.toLowerCase()] ?? 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(src: Record<string, unknown>, key: string, fallback: string, section: string): string {
  const value = src[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError('must be a non-empty string', `${section}.${key}`);
  }
  return value;
}

function readBoolean(src: Record<string, unknown>, key: string, fallback: boolean, section: string): boolean {
  const value = src[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError('must be true or false', `${section}.${key}`);
  }
  return value;
}

function readPositive(src: Record<string, unknown>, key: string, fallback: number, section: string): number {
  const raw = src[key];
  if (raw === undefined) return fallback;
  // arb_shares was historically a string
  const value = typeof raw === 'string' ? parseFloat(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError('must be a positive number', `${section}.${key}`);
  }
  return value;
}

function readSymbols(src: Record<string, unknown>, fallback: string[]): string[] {
  const value = src.symbols;
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('must be a non-empty array', 'strategy.symbols');
  }
  return value.map((entry, i) => {
    if (typeof entry !== 'string' || entry.trim() === '') {
      throw new ConfigError('must be a symbol string', `strategy.symbols[${i}]`);
    }
    return entry.trim().toLowerCase();
  });
}

function readTolerances(src: Record<string, unknown>, fallback: Record<string, number>): Record<string, number> {
  const value = src.priceToBeatToleranceUsd;
  if (value === undefined) return { ...fallback };
  if (!isRecord(value)) {
    throw new ConfigError('must be an object of symbol -> USD', 'strategy.priceToBeatToleranceUsd');
  }
  const merged: Record<string, number> = { ...fallback };
  for (const [symbol, tolerance] of Object.entries(value)) {
    if (typeof tolerance !== 'number' || !Number.isFinite(tolerance) || tolerance < 0) {
      throw new ConfigError('must be a non-negative number', `strategy.priceToBeatToleranceUsd.${symbol}`);
    }
    merged[symbol.toLowerCase()] = tolerance;
  }
  return merged;
}

/**
 * Validate a parsed config document, filling unset fields from defaults
 */
export function parseConfig(raw: unknown): AppConfig {
  const defaults = defaultConfig();
  if (!isRecord(raw)) {
    throw new ConfigError('config root must be an object');
  }

  const pm = isRecord(raw.polymarket) ? raw.polymarket : {};
  const st = isRecord(raw.strategy) ? raw.strategy : {};
  const db = isRecord(raw.dashboard) ? raw.dashboard : {};
  const d = defaults.strategy;

  const sumThreshold = readPositive(st, 'sumThreshold', d.sumThreshold, 'strategy');
  if (sumThreshold > 2) {
    throw new ConfigError('must be in (0, 2]', 'strategy.sumThreshold');
  }

  const port = readPositive(db, 'port', defaults.dashboard.port, 'dashboard');
  if (!Number.isInteger(port) || port > 65535) {
    throw new ConfigError('must be a valid TCP port', 'dashboard.port');
  }

  return {
    polymarket: {
      gammaApiUrl: readString(pm, 'gammaApiUrl', defaults.polymarket.gammaApiUrl, 'polymarket'),
      clobApiUrl: readString(pm, 'clobApiUrl', defaults.polymarket.clobApiUrl, 'polymarket'),
      wsUrl: readString(pm, 'wsUrl', defaults.polymarket.wsUrl, 'polymarket'),
      rtdsWsUrl: readString(pm, 'rtdsWsUrl', defaults.polymarket.rtdsWsUrl, 'polymarket'),
      rpcUrl: readString(pm, 'rpcUrl', defaults.polymarket.rpcUrl, 'polymarket'),
    },
    strategy: {
      symbols: readSymbols(st, d.symbols),
      sumThreshold,
      tradeIntervalSecs: readPositive(st, 'tradeIntervalSecs', d.tradeIntervalSecs, 'strategy'),
      simulationMode: readBoolean(st, 'simulationMode', d.simulationMode, 'strategy'),
      arbShares: readPositive(st, 'arbShares', d.arbShares, 'strategy'),
      priceToBeatToleranceUsd: readTolerances(st, d.priceToBeatToleranceUsd),
      resolutionPollIntervalSecs: readPositive(st, 'resolutionPollIntervalSecs', d.resolutionPollIntervalSecs, 'strategy'),
      resolutionMaxWaitSecs: readPositive(st, 'resolutionMaxWaitSecs', d.resolutionMaxWaitSecs, 'strategy'),
      resolutionSettleDelaySecs: readPositive(st, 'resolutionSettleDelaySecs', d.resolutionSettleDelaySecs, 'strategy'),
      autoRedeem: readBoolean(st, 'autoRedeem', d.autoRedeem, 'strategy'),
      overlapPollSecs: readPositive(st, 'overlapPollSecs', d.overlapPollSecs, 'strategy'),
      referencePollSecs: readPositive(st, 'referencePollSecs', d.referencePollSecs, 'strategy'),
      tradingPollMs: readPositive(st, 'tradingPollMs', d.tradingPollMs, 'strategy'),
      cycleDelaySecs: readPositive(st, 'cycleDelaySecs', d.cycleDelaySecs, 'strategy'),
    },
    dashboard: {
      enabled: readBoolean(db, 'enabled', defaults.dashboard.enabled, 'dashboard'),
      port,
    },
  };
}

/**
 * Load config from `filePath`. A missing file is created with defaults.
 */
export function loadConfig(filePath: string): AppConfig {
  const resolved = path.resolve(filePath);

  if (!fs.existsSync(resolved)) {
    const config = defaultConfig();
    fs.writeFileSync(resolved, JSON.stringify(config, null, 2) + '\n');
    return config;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`cannot read ${resolved}: ${reason}`);
  }
  return parseConfig(raw);
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Read secrets from the environment
 */
export function loadSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
  const rawType = optionalEnv(env, 'POLYMARKET_SIGNATURE_TYPE') ?? '0';
  const signatureType = parseInt(rawType, 10);
  if (signatureType !== 0 && signatureType !== 1 && signatureType !== 2) {
    throw new ConfigError('must be 0 (EOA), 1 (POLY_PROXY) or 2 (POLY_GNOSIS_SAFE)', 'POLYMARKET_SIGNATURE_TYPE');
  }

  return {
    privateKey: optionalEnv(env, 'POLYMARKET_PRIVATE_KEY'),
    proxyWallet: optionalEnv(env, 'POLYMARKET_PROXY_WALLET'),
    signatureType,
    apiKey: optionalEnv(env, 'POLYMARKET_API_KEY'),
    apiSecret: optionalEnv(env, 'POLYMARKET_API_SECRET'),
    apiPassphrase: optionalEnv(env, 'POLYMARKET_API_PASSPHRASE'),
  };
}
