import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { CompanyBundle, StatementPeriod } from '../types';
import type { CacheService } from './cacheService';
import { ConfigurationError, InvalidInputError, ProviderError } from './errors';
import { createLogger } from './logger';
import {
  BalanceRecordSchema,
  CashFlowRecordSchema,
  IncomeRecordSchema,
  ProfileRecordSchema,
  merge_statements,
  to_market_quote,
} from './statements';

const log = createLogger('provider');

const TICKER_PATTERN = /^[A-Z0-9.-]{1,10}$/;

export interface DataProvider {
  fetchCompanyBundle(ticker: string, period?: StatementPeriod): Promise<CompanyBundle>;
}

export interface FmpProviderOptions {
  apiKey: string | undefined;
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Years of statements to request; quarterly requests ask for four times as many periods. */
  statementLimit?: number;
  cache?: CacheService | null;
  /** Swaps the HTTP transport; tests use an in-process adapter. */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

export const normalize_ticker = (ticker: string): string => {
  const t = ticker.trim().toUpperCase();
  if (!TICKER_PATTERN.test(t)) {
    throw new InvalidInputError(`Invalid ticker symbol: "${ticker}"`);
  }
  return t;
};

const FmpErrorSchema = z.object({ 'Error Message': z.string() });

interface Resource<T extends z.ZodTypeAny> {
  path: string;
  label: string;
  schema: T;
}

const INCOME = { path: 'income-statement', label: 'income statement', schema: IncomeRecordSchema };
const BALANCE = { path: 'balance-sheet-statement', label: 'balance sheet', schema: BalanceRecordSchema };
const CASH_FLOW = { path: 'cash-flow-statement', label: 'cash-flow statement', schema: CashFlowRecordSchema };
const PROFILE = { path: 'profile', label: 'profile', schema: ProfileRecordSchema };

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const isRetryable = (error: AxiosError): boolean => {
  if (!error.response) return true; // timeout, reset, DNS
  return error.response.status >= 500;
};

const messageFrom = (data: unknown): string | null => {
  const parsed = FmpErrorSchema.safeParse(data);
  return parsed.success ? parsed.data['Error Message'] : null;
};

const failureFromMessage = (message: string, context: string): ProviderError => {
  if (/limit reach/i.test(message)) {
    return new ProviderError('rate_limited', `FMP rate limit reached while fetching ${context}: ${message}`);
  }
  if (/api ?key/i.test(message)) {
    return new ProviderError('unauthorized', `FMP rejected the API key while fetching ${context}: ${message}`);
  }
  return new ProviderError('bad_response', `FMP error for ${context}: ${message}`);
};

const failureFromStatus = (error: AxiosError, context: string): ProviderError => {
  const status = error.response?.status;
  const message = messageFrom(error.response?.data);
  if (message && /limit reach/i.test(message)) return failureFromMessage(message, context);

  switch (status) {
    case 404:
      return new ProviderError('not_found', `No data found for ${context}`, { cause: error });
    case 429:
      return new ProviderError('rate_limited', `FMP rate limit reached while fetching ${context}`, { cause: error });
    case 401:
    case 403:
      return new ProviderError('unauthorized', `FMP rejected the request for ${context} (HTTP ${status})`, {
        cause: error,
      });
    default:
      return new ProviderError('bad_response', `FMP request for ${context} failed with HTTP ${status}`, {
        cause: error,
      });
  }
};

/** Financial Modeling Prep (v3) statements and profile. */
export class FmpDataProvider implements DataProvider {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly statementLimit: number;
  private readonly cache: CacheService | null;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: FmpProviderOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('FMP API key is required. Set FMP_API_KEY (or APIKEY) or pass --api-key');
    }
    this.apiKey = options.apiKey;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 15000,
      headers: { Accept: 'application/json' },
      adapter: options.adapter,
    });
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.statementLimit = options.statementLimit ?? 10;
    this.cache = options.cache ?? null;
    this.sleep = options.sleep ?? defaultSleep;
  }

  private async request(url: string, params: Record<string, string | number>, context: string): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.http.get<unknown>(url, { params: { ...params, apikey: this.apiKey } });
        return response.data;
      } catch (error) {
        if (!(error instanceof AxiosError)) throw error;
        if (!isRetryable(error)) throw failureFromStatus(error, context);
        if (attempt >= this.maxRetries) {
          throw new ProviderError(
            'network',
            `Could not reach FMP for ${context} after ${attempt + 1} attempt(s): ${error.message}`,
            { cause: error },
          );
        }
        const delay = this.retryDelayMs * (attempt + 1);
        log.warn(`Transient failure fetching ${context} (${error.code ?? error.response?.status}); retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }
  }

  /**
   * Parsed rows for the resource, from cache when fresh. Only payloads that
   * pass the schema are written to the cache; a cached entry that no longer
   * parses is refetched.
   */
  private async fetchResource<T extends z.ZodTypeAny>(
    resource: Resource<T>,
    ticker: string,
    period: StatementPeriod | undefined,
  ): Promise<{ rows: z.output<T>[]; cached: boolean }> {
    const context = `${resource.label} of ${ticker}`;

    if (this.cache) {
      const hit = await this.cache.load(ticker, resource.path, period);
      if (Array.isArray(hit) && hit.length > 0) {
        const parsed = z.array(resource.schema).safeParse(hit);
        if (parsed.success) {
          log.info(`Using cached ${context}`);
          return { rows: parsed.data, cached: true };
        }
        log.warn(`Cached ${context} no longer matches the expected shape; refetching`);
      }
    }

    const params: Record<string, string | number> = period
      ? { period, limit: period === 'quarter' ? this.statementLimit * 4 : this.statementLimit }
      : {};
    const data = await this.request(`/${resource.path}/${encodeURIComponent(ticker)}`, params, context);

    const message = messageFrom(data);
    if (message) throw failureFromMessage(message, context);
    if (!Array.isArray(data)) {
      throw new ProviderError('bad_response', `Unexpected payload for ${context}: expected a list`);
    }
    if (data.length === 0) {
      throw new ProviderError('not_found', `No data found for ${context}`);
    }
    const rows = this.parse(resource.schema, data, context);

    if (this.cache) {
      try {
        await this.cache.save(ticker, resource.path, data, period);
      } catch (error) {
        log.warn(`Failed to cache ${context}`, error instanceof Error ? error.message : error);
      }
    }
    return { rows, cached: false };
  }

  private parse<T extends z.ZodTypeAny>(schema: T, rows: unknown[], context: string): z.output<T>[] {
    const parsed = z.array(schema).safeParse(rows);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProviderError(
        'bad_response',
        `Malformed ${context}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'schema mismatch'}`,
      );
    }
    return parsed.data;
  }

  async fetchCompanyBundle(rawTicker: string, period: StatementPeriod = 'annual'): Promise<CompanyBundle> {
    const ticker = normalize_ticker(rawTicker);
    log.info(`Fetching ${period} statements and profile for ${ticker}`);

    const [income, balance, cashflow, profile] = await Promise.all([
      this.fetchResource(INCOME, ticker, period),
      this.fetchResource(BALANCE, ticker, period),
      this.fetchResource(CASH_FLOW, ticker, period),
      this.fetchResource(PROFILE, ticker, undefined),
    ]);

    const statements = merge_statements(income.rows, balance.rows, cashflow.rows);
    if (statements.length === 0) {
      throw new ProviderError('not_found', `No period of ${ticker} has both an income and a cash-flow statement`);
    }

    return {
      ticker,
      statements,
      period,
      quote: to_market_quote(profile.rows[0]),
      cache_used: [income, balance, cashflow, profile].every((r) => r.cached),
    };
  }
}
