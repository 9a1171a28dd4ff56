/**
 * CdnClient speaking the CDN's HTTP management API with fetch.
 *
 *   POST {apiEndpoint}/services/{serviceId}/purges   { purge_type, paths }
 *   GET  {apiEndpoint}/services/{serviceId}/purges/{purgeId}
 *
 * Both answer { purge_id, status } with status in_progress, completed or
 * failed. Edge checks are plain GETs of the public URL.
 */

import { z } from 'zod';
import { CdnConfig } from '../config';
import {
  PermanentStageError,
  StageError,
  TransientStageError,
  classifyFailure,
  classifyHttpStatus,
  failureMessage,
} from '../engine/failure';
import { CdnClient, EdgeResponse, PurgeRequest } from '../stages/ports';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const purgeResponseSchema = z.object({
  purge_id: z.string().min(1),
  status: z.enum(['in_progress', 'completed', 'failed']),
});

export interface HttpCdnClientOptions {
  /** Replaces the global fetch (tests). */
  fetchImpl?: FetchLike;
}

export class HttpCdnClient implements CdnClient {
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(
    private config: Pick<CdnConfig, 'apiEndpoint' | 'serviceId' | 'apiKey'>,
    options: HttpCdnClientOptions = {},
  ) {
    this.baseUrl = `${config.apiEndpoint.replace(/\/+$/, '')}/services/${encodeURIComponent(config.serviceId)}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async purge(paths: string[], signal: AbortSignal): Promise<PurgeRequest> {
    const res = await this.request(`${this.baseUrl}/purges`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ purge_type: 'path', paths }),
      signal,
    });
    return this.readPurge(res);
  }

  async purgeStatus(purgeId: string, signal: AbortSignal): Promise<PurgeRequest> {
    const res = await this.request(`${this.baseUrl}/purges/${encodeURIComponent(purgeId)}`, {
      method: 'GET',
      headers: this.headers(),
      signal,
    });
    return this.readPurge(res);
  }

  async fetchEdge(url: string, signal: AbortSignal): Promise<EdgeResponse> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, { method: 'GET', signal });
    } catch (err) {
      throw new StageError(`CDN edge request to ${url} failed: ${failureMessage(err)}`, classifyFailure(err), { cause: err });
    }
    // Body is not needed; release the connection
    await res.body?.cancel();

    const age = Number.parseInt(res.headers.get('age') ?? '0', 10);
    return {
      statusCode: res.status,
      cacheStatus: res.headers.get('x-cache') ?? 'UNKNOWN',
      ageSeconds: Number.isNaN(age) ? 0 : age,
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json', Accept: 'application/json' };
    if (this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`;
    return headers;
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, init);
    } catch (err) {
      throw new StageError(`CDN API request to ${url} failed: ${failureMessage(err)}`, classifyFailure(err), { cause: err });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new StageError(`CDN API returned HTTP ${res.status}: ${text.slice(0, 200)}`, classifyHttpStatus(res.status), {
        statusCode: res.status,
      });
    }
    return res;
  }

  private async readPurge(res: Response): Promise<PurgeRequest> {
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new TransientStageError(`CDN API returned a non-JSON response (HTTP ${res.status})`, {
        statusCode: res.status,
        cause: err,
      });
    }

    const parsed = purgeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentStageError(
        `CDN API returned an unexpected purge response: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        { statusCode: res.status },
      );
    }
    return { purgeId: parsed.data.purge_id, state: parsed.data.status };
  }
}
