/**
 * Configuration Constants
 * 15m vs 5m Up/Down Overlap Arbitrage Bot
 */

// API Endpoints
export const CLOB_API_URL = 'https://clob.polymarket.com';
export const GAMMA_API_URL = 'https://gamma-api.polymarket.com';
export const MARKET_WS_URL = 'wss://ws-subscriptions-clob.polymarket.com';
export const RTDS_WS_URL = 'wss://ws-live-data.polymarket.com';
export const POLYGON_RPC_URL = 'https://polygon-rpc.com';

export const CHAIN_ID = 137;

// Period alignment
export const MARKET_TIME_ZONE = 'America/New_York';
export const OVERLAP_START_SECONDS = 10 * 60; // Last 5 minutes of the 15m period
export const PERIOD_15M_SECONDS = 15 * 60;

// Reference price is only taken from ticks this close to the period start
export const REFERENCE_CAPTURE_WINDOW_SECONDS = 2;
// Reference slots older than this are pruned
export const REFERENCE_RETENTION_SECONDS = 24 * 60 * 60;

// Placeholder quotes the venue shows on empty books
export const PLACEHOLDER_BID_MAX = 0.05;
export const PLACEHOLDER_ASK_MIN = 0.95;

// Streams
export const MARKET_WS_RECONNECT_MS = 3000;
export const MARKET_WS_PING_MS = 10_000;
export const RTDS_RECONNECT_MS = 5000;
export const RTDS_PING_MS = 5000;
export const RTDS_TOPIC = 'crypto_prices_chainlink';
// Give the reference feed a moment before symbol loops start
export const RTDS_WARMUP_MS = 2000;

// HTTP
export const GAMMA_TIMEOUT_MS = 10_000;

// On-chain settlement (Polygon)
export const USDC_ADDRESS = '0x2791Bca1f2de4661ED88A30C99A7a9449Aa84174';
export const CTF_ADDRESS = '0x4d97dcd97ec945f40cf65f87097ace5ea0476045';
export const PROXY_WALLET_FACTORY_ADDRESS = '0xaB45c5A4B0c941a2F231C04C3f49182e1A254052';
export const SAFE_TX_GAS = 300_000;
export const REDEEM_GAS_LIMIT = 300_000;
export const PROXY_REDEEM_GAS_LIMIT = 400_000;

// Dashboard
export const DASHBOARD_LOG_BUFFER = 200;
