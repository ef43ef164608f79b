import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import type { IExchange } from './interfaces/IExchange';
import type { Candle, CandleInterval, ExchangeConfig, FundingEvent } from '../types/common';
import { SourceUnavailable, SymbolNotFound } from '../utils/errors';
import { logger } from '../utils/logger';
import { RateLimiter, retryWithBackoff, sleep } from '../utils/helpers';

export type HttpOptions = Pick<AxiosRequestConfig, 'adapter'>;

export abstract class BaseExchange implements IExchange {
  protected config: ExchangeConfig;
  protected httpClient: AxiosInstance;
  protected rateLimiter: RateLimiter;
  protected isInitialized = false;

  constructor(config: ExchangeConfig, httpOptions: HttpOptions = {}) {
    this.config = config;
    this.rateLimiter = new RateLimiter(config.rateLimits.requests, config.rateLimits.interval);
    this.httpClient = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'FundingCapture/1.0',
      },
      ...httpOptions,
    });

    this.setupInterceptors();
  }

  public getName(): string {
    return this.config.name;
  }

  public async initialize(): Promise<void> {
    try {
      logger.info(`Initializing ${this.config.name} exchange`);

      // Test connection
      await this.testConnection();

      this.isInitialized = true;
      logger.info(`${this.config.name} exchange initialized successfully`);
    } catch (error) {
      logger.error(`Failed to initialize ${this.config.name} exchange:`, error);
      throw error;
    }
  }

  protected abstract testConnection(): Promise<void>;

  protected setupInterceptors(): void {
    // Request interceptor for rate limiting
    this.httpClient.interceptors.request.use(async (requestConfig) => {
      await this.checkRateLimit();
      return requestConfig;
    });

    // Response interceptor for error handling
    this.httpClient.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        this.handleApiError(error);
        return Promise.reject(error);
      }
    );
  }

  protected async checkRateLimit(): Promise<void> {
    while (!(await this.rateLimiter.tryAcquire())) {
      const waitTime = this.rateLimiter.waitTime();
      logger.warn(`Rate limit reached for ${this.config.name}, waiting ${waitTime}ms`);
      await sleep(Math.max(waitTime, 10));
    }
  }

  protected handleApiError(error: unknown): void {
    if (!axios.isAxiosError(error)) {
      logger.error(`Unknown error for ${this.config.name}:`, { error: String(error) });
      return;
    }

    if (error.response) {
      const { status } = error.response;
      logger.debug(`API error for ${this.config.name}:`, {
        status,
        url: error.config?.url,
      });

      // Handle specific error codes
      switch (status) {
        case 429:
          logger.warn(`Rate limit exceeded for ${this.config.name}`);
          break;
        case 500:
        case 502:
        case 503:
        case 504:
          logger.error(`Server error for ${this.config.name}`, { status, url: error.config?.url });
          break;
      }
    } else if (error.request) {
      logger.error(`Network error for ${this.config.name}: ${error.message}`);
    } else {
      logger.error(`Unknown error for ${this.config.name}: ${error.message}`);
    }
  }

  /**
   * Maps a transport error onto the collector taxonomy. Anything that is not a
   * 4xx other than 429 is treated as transient.
   */
  protected toSourceError(error: unknown, endpoint: string): Error {
    if (error instanceof SourceUnavailable || error instanceof SymbolNotFound) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      return new SourceUnavailable(
        `${this.config.name} request to ${endpoint} failed: ${error.message}`,
        { status, code: error.code, endpoint }
      );
    }

    return new SourceUnavailable(
      `${this.config.name} request to ${endpoint} failed: ${String(error)}`,
      { endpoint }
    );
  }

  protected isClientError(error: unknown): boolean {
    if (error instanceof SymbolNotFound) return true;
    if (!(error instanceof SourceUnavailable)) return false;

    const status = error.context?.status;
    return typeof status === 'number' && status >= 400 && status < 500 && status !== 429;
  }

  protected async makeRequest<T>(
    endpoint: string,
    params?: Record<string, string | number>
  ): Promise<T> {
    if (!this.isInitialized) {
      throw new Error(`${this.config.name} exchange not initialized`);
    }

    return retryWithBackoff(
      async () => {
        try {
          const response = await this.httpClient.request<T>({
            method: 'GET',
            url: endpoint,
            params,
          });
          return response.data;
        } catch (error) {
          throw this.toSourceError(error, endpoint);
        }
      },
      this.config.retryAttempts,
      this.config.retryDelayMs,
      2,
      (error) => !this.isClientError(error)
    );
  }

  public async disconnect(): Promise<void> {
    this.isInitialized = false;
    this.rateLimiter.clear();
    logger.info(`${this.config.name} exchange disconnected`);
  }

  public abstract listFundingEvents(): Promise<FundingEvent[]>;
  public abstract getCandles(
    symbol: string,
    interval: CandleInterval,
    start: Date,
    end: Date
  ): Promise<Candle[]>;
}
