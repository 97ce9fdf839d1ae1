import axios, { type AxiosInstance, isAxiosError } from 'axios';
import type { z } from 'zod';
import { VenueRequestError, describeError } from '@migrator/errors';
import { createServiceLogger, type Logger } from '@migrator/logger';
import type {
  L2Book,
  SpotClearinghouseState,
  SpotMeta,
  SpotMetaAndAssetCtxs,
} from '@migrator/types';
import {
  l2BookSchema,
  spotClearinghouseStateSchema,
  spotMetaAndAssetCtxsSchema,
  spotMetaSchema,
} from './schemas.js';

export const INFO_PATH = '/info';

export type InfoRequest =
  | { type: 'spotMeta' }
  | { type: 'spotMetaAndAssetCtxs' }
  | { type: 'spotClearinghouseState'; user: string }
  | { type: 'l2Book'; coin: string };

/** Read-only queries against the venue's public info endpoint. No signing involved. */
export interface InfoApi {
  spotMeta(): Promise<SpotMeta>;
  spotMetaAndAssetCtxs(): Promise<SpotMetaAndAssetCtxs>;
  spotClearinghouseState(user: string): Promise<SpotClearinghouseState>;
  l2Book(coin: string): Promise<L2Book>;
}

export interface InfoClientOptions {
  apiUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
}

export class InfoClient implements InfoApi {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: InfoClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.apiUrl.replace(/\/+$/, ''),
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
    this.logger = options.logger ?? createServiceLogger('info-client');
  }

  spotMeta(): Promise<SpotMeta> {
    return this.post({ type: 'spotMeta' }, spotMetaSchema);
  }

  spotMetaAndAssetCtxs(): Promise<SpotMetaAndAssetCtxs> {
    return this.post({ type: 'spotMetaAndAssetCtxs' }, spotMetaAndAssetCtxsSchema);
  }

  spotClearinghouseState(user: string): Promise<SpotClearinghouseState> {
    return this.post({ type: 'spotClearinghouseState', user }, spotClearinghouseStateSchema);
  }

  // spot pairs are addressed by pair name, e.g. "PURR/USDC"
  l2Book(coin: string): Promise<L2Book> {
    return this.post({ type: 'l2Book', coin }, l2BookSchema);
  }

  private async post<T>(payload: InfoRequest, schema: z.ZodType<T>): Promise<T> {
    this.logger.debug({ request: payload }, 'Info request');

    let body: unknown;
    try {
      const response = await this.http.post<unknown>(INFO_PATH, payload);
      body = response.data;
    } catch (error) {
      throw toVenueRequestError(payload.type, error);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new VenueRequestError(payload.type, 'unexpected response shape', {
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }
}

function toVenueRequestError(operation: string, error: unknown): VenueRequestError {
  if (isAxiosError(error)) {
    if (error.response) {
      return new VenueRequestError(operation, `HTTP ${error.response.status}`, {
        status: error.response.status,
        body: error.response.data,
      });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new VenueRequestError(operation, 'request timed out', { code: error.code });
    }
    return new VenueRequestError(operation, error.message, { code: error.code });
  }
  return new VenueRequestError(operation, describeError(error));
}
