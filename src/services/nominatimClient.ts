import axios from 'axios';
import type { AxiosRequestConfig } from 'axios';
import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import { createLogger } from '../utils/logger';

const logger = createLogger('Nominatim');

const placeSchema = z.object({
  display_name: z.string().optional(),
  lat: z.union([z.string(), z.number()]).optional(),
  lon: z.union([z.string(), z.number()]).optional(),
});

const searchResponseSchema = z.array(placeSchema);

export type NominatimPlace = z.infer<typeof placeSchema>;

export interface HttpResponse {
  status: number;
  data: unknown;
}

export type HttpGet = (url: string, config: AxiosRequestConfig) => Promise<HttpResponse>;

export interface NominatimOptions {
  baseUrl: string;
  contactEmail: string;
  userAgent: string;
  timeoutMs: number;
  pauseMs: number;
}

export type SearchParams = Record<string, string | number>;

const axiosGet: HttpGet = (url, config) => axios.get(url, config);

/**
 * Thin wrapper around the Nominatim `/search` endpoint. Every call pauses
 * first to stay inside the public instance's rate limit, and every failure
 * (non-200, transport error, timeout, unexpected body) comes back as `null`.
 */
export class NominatimClient {
  constructor(
    private readonly options: NominatimOptions,
    private readonly httpGet: HttpGet = axiosGet,
  ) {}

  async search(query: string, params: SearchParams = {}): Promise<NominatimPlace[] | null> {
    if (this.options.pauseMs > 0) {
      await delay(this.options.pauseMs);
    }

    try {
      const response = await this.httpGet(`${this.options.baseUrl}/search`, {
        params: {
          format: 'json',
          q: query,
          addressdetails: 1,
          ...params,
          email: this.options.contactEmail,
        },
        headers: {
          'User-Agent': `${this.options.userAgent} (contact: ${this.options.contactEmail})`,
        },
        timeout: this.options.timeoutMs,
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        logger.warn('Search returned non-success status', { query, status: response.status });
        return null;
      }

      const parsed = searchResponseSchema.safeParse(response.data ?? []);
      if (!parsed.success) {
        logger.warn('Search returned an unexpected body', { query });
        return null;
      }

      return parsed.data;
    } catch (err) {
      logger.warn('Search request failed', { query, error: String(err) });
      return null;
    }
  }
}
