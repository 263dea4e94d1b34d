/**
 * Exchange adapter configuration
 *
 * The session token is obtained outside this tool and supplied through the
 * environment.
 */

/** JSON-RPC betting endpoint */
export const DEFAULT_EXCHANGE_URL = 'https://api.betfair.com/exchange/betting/json-rpc/v1';

export interface ExchangeConfig {
  baseUrl: string;
  /** Sent as X-Application */
  appKey: string;
  /** Sent as X-Authentication */
  sessionToken: string;
  /** Route requests through this HTTP proxy */
  proxyUrl: string | null;
  timeoutMs: number;
  maxAttempts: number;
  /** First backoff delay; doubles per retry */
  retryDelayMs: number;
}

export const DEFAULT_EXCHANGE_CONFIG: ExchangeConfig = {
  baseUrl: DEFAULT_EXCHANGE_URL,
  appKey: '',
  sessionToken: '',
  proxyUrl: null,
  timeoutMs: 30000,
  maxAttempts: 3,
  retryDelayMs: 1000,
};

/**
 * Parse positive integer from env with fallback
 */
function parseIntEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Load exchange config from environment variables
 */
export function loadExchangeConfig(env: NodeJS.ProcessEnv = process.env): ExchangeConfig {
  return {
    baseUrl: env.EXCHANGE_BASE_URL || DEFAULT_EXCHANGE_CONFIG.baseUrl,
    appKey: env.EXCHANGE_APP_KEY || '',
    sessionToken: env.EXCHANGE_SESSION_TOKEN || '',
    proxyUrl: env.EXCHANGE_PROXY_URL || null,
    timeoutMs: parseIntEnv(env.EXCHANGE_TIMEOUT_MS, DEFAULT_EXCHANGE_CONFIG.timeoutMs),
    maxAttempts: parseIntEnv(env.EXCHANGE_MAX_ATTEMPTS, DEFAULT_EXCHANGE_CONFIG.maxAttempts),
    retryDelayMs: parseIntEnv(env.EXCHANGE_RETRY_DELAY_MS, DEFAULT_EXCHANGE_CONFIG.retryDelayMs),
  };
}

/**
 * Format exchange config for logging; credentials are only reported as set or missing
 */
export function formatExchangeConfig(config: ExchangeConfig): string {
  return [
    '[exchange] Configuration:',
    `  Base URL: ${config.baseUrl}`,
    `  App key: ${config.appKey ? 'set' : 'missing'}`,
    `  Session token: ${config.sessionToken ? 'set' : 'missing'}`,
    `  Proxy: ${config.proxyUrl ?? 'none'}`,
    `  Timeout: ${config.timeoutMs}ms`,
    `  Max attempts: ${config.maxAttempts} (backoff from ${config.retryDelayMs}ms)`,
  ].join('\n');
}
