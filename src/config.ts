export const STREAM_URL = 'wss://api.traderepublic.com';
export const API_BASE_URL = 'https://api.traderepublic.com';
export const LOGIN_PATH = '/api/v1/auth/web/login';
export const SESSION_COOKIE = 'tr_session';

export const PROTOCOL_VERSION = 31;

export interface ConnectMetadata {
  readonly locale: string;
  readonly platformId: string;
  readonly platformVersion: string;
  readonly clientId: string;
  readonly clientVersion: string;
}

export const DEFAULT_CONNECT_METADATA: ConnectMetadata = {
  locale: 'fr',
  platformId: 'webtrading',
  platformVersion: 'safari - 18.3.0',
  clientId: 'app.traderepublic.com',
  clientVersion: '3.151.3',
};

export const HTTP_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const SUBSCRIPTION_TYPES = {
  transactions: 'timelineTransactions',
  transactionDetail: 'timelineDetailV2',
  availableCash: 'availableCash',
} as const;

export const DETAIL_SECTION_TITLE = 'Transaction';

export const ARTIFACT_BASENAMES = {
  transactions: 'trade_republic_transactions',
  cash: 'trade_republic_profile_cash',
} as const;

export type ArtifactKind = keyof typeof ARTIFACT_BASENAMES;

export const DATE_COLUMNS = ['timestamp'] as const;

export const AMOUNT_COLUMNS = [
  'amount.value',
  'amount.fractionDigits',
  'subAmount.value',
  'subAmount.fractionDigits',
] as const;

export const FLATTEN_SEPARATOR = '.';
export const CSV_DELIMITER = ';';
export const JSON_INDENT = 4;

export const RECEIVE_TIMEOUT_MS = 30_000;
export const CONNECT_ATTEMPTS = 3;
export const REQUEST_ATTEMPTS = 3;
export const RETRY_BASE_DELAY_MS = 500;
export const RETRY_MAX_DELAY_MS = 8_000;
export const RETRY_JITTER_MS = 250;
