export { BaseAdapter, undiciTransport, type BaseAdapterConfig } from './base.adapter.js';
export { ExchangeAdapter, ExchangeApiError } from './exchange.adapter.js';
export {
  DEFAULT_EXCHANGE_CONFIG,
  DEFAULT_EXCHANGE_URL,
  formatExchangeConfig,
  loadExchangeConfig,
  type ExchangeConfig,
} from './exchange.config.js';
export type { Transport, TransportRequest, TransportResponse } from './types.js';
