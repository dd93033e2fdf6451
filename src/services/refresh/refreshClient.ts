import { DEFAULT_PAGE_SIZE, REFRESH_ROUTES, TGF_DATASETS, isTgfDatasetName } from "../../config/defaults.js";
import { ConfigInvalidPageError, ConfigMissingDatasetError } from "../../errors/config.errors.js";
import {
  RefreshRequestFailedError,
  RefreshResponseError,
  RefreshUnauthorizedError,
  UnknownDatasetError
} from "../../errors/refresh.errors.js";
import { noopLogger, type Logger } from "../../logging/logger.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RefreshClientOptions {
  baseUrl: string;
  token: string;
  timeoutSeconds: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface DatasetPageOptions {
  /** 1-based. */
  page?: number;
  pageSize?: number;
}

export interface RefreshResponse {
  url: string;
  status: number;
  /** Parsed JSON body, or the raw text when the body is not JSON. */
  body: unknown;
  durationMs: number;
}

const MAX_ERROR_BODY_CHARS = 500;

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function assertPageNumber(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigInvalidPageError(field, value);
  }
}

function datasetPath(route: string, name: string): string {
  const trimmed = name.trim();
  if (!trimmed) throw new ConfigMissingDatasetError();
  return `${route}/${encodeURIComponent(trimmed)}`;
}

export function refreshUrl(baseUrl: string): string {
  return `${baseUrl}${REFRESH_ROUTES.updateDatasets}`;
}

/**
 * Calls the Data Explorer backend routes with the raw `Authorization` header
 * value, the same request the installed cron entry issues through curl.
 */
export class RefreshClient {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly options: RefreshClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? noopLogger;
  }

  async updateDatasets(): Promise<RefreshResponse> {
    return await this.get(REFRESH_ROUTES.updateDatasets);
  }

  async forceUpdateDataset(name: string): Promise<RefreshResponse> {
    if (!isTgfDatasetName(name)) {
      throw new UnknownDatasetError(name, TGF_DATASETS);
    }
    return await this.get(`${REFRESH_ROUTES.forceUpdateDataset}/${encodeURIComponent(name)}`);
  }

  async healthCheck(): Promise<RefreshResponse> {
    return await this.get(REFRESH_ROUTES.healthCheck);
  }

  /** One page of a parsed dataset, to confirm what a refresh loaded. */
  async getDataset(name: string, options: DatasetPageOptions = {}): Promise<RefreshResponse> {
    const page = options.page ?? 1;
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    assertPageNumber("page", page);
    assertPageNumber("page size", pageSize);
    const query = new URLSearchParams({ page: String(page), page_size: String(pageSize) });
    return await this.get(`${datasetPath(REFRESH_ROUTES.dataset, name)}?${query.toString()}`);
  }

  async sampleDataset(name: string): Promise<RefreshResponse> {
    return await this.get(datasetPath(REFRESH_ROUTES.sampleData, name));
  }

  private async get(route: string): Promise<RefreshResponse> {
    const url = `${this.options.baseUrl}${route}`;
    const start = Date.now();
    this.logger.debug("Sending request", { url });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Authorization: this.options.token },
        signal: AbortSignal.timeout(this.options.timeoutSeconds * 1000)
      });
    } catch (err) {
      const message = isTimeoutError(err)
        ? `timed out after ${this.options.timeoutSeconds}s`
        : err instanceof Error
          ? err.message
          : String(err);
      this.logger.error("Request failed", { url, message });
      throw new RefreshRequestFailedError(url, message);
    }

    const text = await response.text();
    const durationMs = Date.now() - start;
    this.logger.info("Received response", { url, status: response.status, durationMs });

    if (response.status === 401) {
      throw new RefreshUnauthorizedError(url);
    }
    if (!response.ok) {
      throw new RefreshResponseError(url, response.status, text.slice(0, MAX_ERROR_BODY_CHARS));
    }

    return { url, status: response.status, body: parseBody(text), durationMs };
  }
}
