import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import { setTimeout as sleep } from "timers/promises";
import type {
  AssetSearchOptions,
  AssignedListOptions,
  BackendClient,
} from "../../core/assets/contracts.js";
import type { AssetFieldMap, AssetRecord, AssetRef } from "../../core/assets/types.js";
import { metadataText } from "../../core/assets/types.js";
import {
  AssetNotFoundError,
  BackendUnavailableError,
  WriteConflictError,
} from "../../core/errors/gatewayErrors.js";
import { writeLog, type GatewayLogger } from "../../core/logging/createLogger.js";
import {
  isFotowareAsset,
  isRecord,
  originalRendition,
  toAssetRecord,
  type FotowareAsset,
} from "./fotowareAssets.js";

const QUERY_PLACEHOLDER = "{?q}";
const ASSET_MEDIA_TYPE = "application/vnd.fotoware.asset+json";
const ASSET_UPDATE_MEDIA_TYPE = "application/vnd.fotoware.assetupdate+json";
const TOKEN_REFRESH_MARGIN_MS = 60_000;
const DEFAULT_SEARCH_LIMIT = 100;
const ASSET_PATH_PREFIX = "/fotoweb/archives/";

type FotowareRequest = Omit<AxiosRequestConfig, "headers"> & {
  headers?: Record<string, string>;
};

export interface FotowareClientOptions {
  host: string;
  clientId: string;
  clientSecret: string;
  archives: readonly string[];
  fields: AssetFieldMap;
  searchExpressionSuffix?: string;
  publicFilter?: { field: string; value: string };
  timeoutMs?: number;
  renditionPollIntervalMs?: number;
  renditionPollAttempts?: number;
  /** Replaces the HTTP transport; used by tests. */
  adapter?: AxiosAdapter;
  logger?: GatewayLogger;
  now?: () => number;
}

/**
 * BackendClient over the FotoWare REST API, authenticated with OAuth2 client
 * credentials.
 */
export class FotowareBackendClient implements BackendClient {
  private http: AxiosInstance;
  private origin: string;
  private now: () => number;
  private accessToken?: { value: string; expiresAt: number };
  private tokenRequest?: Promise<string>;
  private searchUrls = new Map<string, string>();
  private renditionServiceUrl?: string;

  constructor(private options: FotowareClientOptions) {
    this.now = options.now ?? Date.now;
    this.origin = new URL(options.host).origin;
    this.http = axios.create({
      baseURL: options.host,
      timeout: options.timeoutMs ?? 30_000,
      headers: { Accept: "application/json" },
      maxRedirects: 5,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  private log(
    level: "error" | "warn" | "info" | "debug",
    msg: string,
    fields?: Record<string, unknown>
  ) {
    writeLog(this.options.logger, level, msg, fields);
  }

  // ===== BackendClient =====

  async search(field: string, value: string, options: AssetSearchOptions = {}): Promise<AssetRecord[]> {
    const term = /\s/.test(value) ? `"${value.replace(/"/g, "")}"` : value;
    return this.searchArchives(`${field}:${term}`, options);
  }

  async findMissing(fields: readonly string[], options: AssetSearchOptions): Promise<AssetRecord[]> {
    if (fields.length === 0) return [];
    const expression = fields.map((f) => `(NOT ${f}:*)`).join(" OR ");

    // the query only narrows the candidates; emptiness is re-checked here
    return this.searchArchives(expression, options, (asset) =>
      fields.some((f) => metadataText(asset.metadata[f]) === undefined)
    );
  }

  async listAssigned(field: string, options: AssignedListOptions): Promise<AssetRecord[]> {
    const after = options.modifiedAfter?.getTime();
    const accept = (asset: AssetRecord) =>
      metadataText(asset.metadata[field]) !== undefined &&
      (after === undefined || asset.modifiedAt.getTime() > after);

    // each archive is read up to the limit so the merged page stays oldest first
    const merged = new Map<AssetRef, AssetRecord>();
    for (const archive of this.archivesFor(options)) {
      const found = await this.searchArchives(`${field}:*`, { ...options, archives: [archive] }, accept);
      for (const asset of found) merged.set(asset.backendId, asset);
    }
    return [...merged.values()]
      .sort((a, b) => a.modifiedAt.getTime() - b.modifiedAt.getTime())
      .slice(0, options.limit ?? DEFAULT_SEARCH_LIMIT);
  }

  toAssetRef(href: string): AssetRef | undefined {
    const url = this.resolve(href.trim());
    if (!url || url.origin !== this.origin || !url.pathname.startsWith(ASSET_PATH_PREFIX)) {
      return undefined;
    }
    return url.pathname + url.search;
  }

  async getAsset(ref: AssetRef): Promise<AssetRecord | null> {
    const raw = await this.getRawAsset(ref);
    return raw ? this.toRecord(raw) : null;
  }

  async updateMetadata(ref: AssetRef, fields: Readonly<Record<string, string>>): Promise<AssetRecord> {
    const current = await this.getRawAsset(ref);
    if (!current) throw new AssetNotFoundError(ref);

    const taken = Object.keys(fields).filter(
      (f) => metadataText(current.metadata?.[f]?.value) !== undefined
    );
    if (taken.length > 0) throw new WriteConflictError(ref, taken);

    const metadata: Record<string, { value: string }> = {};
    for (const [field, value] of Object.entries(fields)) {
      metadata[field] = { value };
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.request({
        method: "PATCH",
        url: ref,
        data: { metadata },
        headers: { "Content-Type": ASSET_UPDATE_MEDIA_TYPE, Accept: ASSET_MEDIA_TYPE },
      });
    } catch (err) {
      if (err instanceof BackendUnavailableError && (err.status === 409 || err.status === 412)) {
        throw new WriteConflictError(ref, Object.keys(fields));
      }
      throw err;
    }

    this.log("debug", "FotoWare metadata updated", { href: ref, fields: Object.keys(fields) });

    if (isFotowareAsset(response.data)) return this.toRecord(response.data);

    const reread = await this.getAsset(ref);
    if (!reread) throw new AssetNotFoundError(ref);
    return reread;
  }

  async fetchOriginal(ref: AssetRef): Promise<Buffer> {
    const asset = await this.getRawAsset(ref);
    if (!asset) throw new AssetNotFoundError(ref);

    const rendition = originalRendition(asset);
    if (!rendition) {
      throw new BackendUnavailableError(`Asset ${ref} has no original rendition`);
    }

    const service = await this.renditionService();
    const started = await this.request({
      method: "POST",
      url: service,
      data: { href: rendition.href },
      headers: {
        "Content-Type": "application/vnd.fotoware.rendition-request+json",
        Accept: "application/vnd.fotoware.rendition-response+json",
      },
    });

    const location = started.headers["location"];
    if (typeof location !== "string" || location === "") {
      throw new BackendUnavailableError(`Rendition request for ${rendition.href} returned no location`);
    }

    const attempts = this.options.renditionPollAttempts ?? 10;
    const interval = this.options.renditionPollIntervalMs ?? 500;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const response = await this.request({
        method: "GET",
        url: location,
        responseType: "arraybuffer",
        headers: { Accept: "*/*" },
      });
      // 202: the rendition is still being produced
      if (response.status !== 202) {
        return toBuffer(response.data);
      }
      if (attempt < attempts) await sleep(interval);
    }

    throw new BackendUnavailableError(`Rendition ${rendition.href} not ready after ${attempts} attempts`);
  }

  // ===== FotoWare specifics =====

  private toRecord(asset: FotowareAsset): AssetRecord {
    return toAssetRecord(asset, {
      fields: this.options.fields,
      publicFilter: this.options.publicFilter,
    });
  }

  private async getRawAsset(ref: AssetRef): Promise<FotowareAsset | null> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.request({ method: "GET", url: ref, headers: { Accept: ASSET_MEDIA_TYPE } });
    } catch (err) {
      if (err instanceof BackendUnavailableError && err.status === 404) return null;
      throw err;
    }

    if (!isFotowareAsset(response.data)) {
      throw new BackendUnavailableError(`Unexpected asset representation for ${ref}`);
    }
    return response.data;
  }

  private archivesFor(options: AssetSearchOptions): readonly string[] {
    return options.archives && options.archives.length > 0
      ? options.archives
      : this.options.archives;
  }

  private async searchArchives(
    expression: string,
    options: AssetSearchOptions,
    accept: (asset: AssetRecord) => boolean = () => true
  ): Promise<AssetRecord[]> {
    const archives = this.archivesFor(options);
    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    const suffix = this.options.searchExpressionSuffix?.trim();
    const query = suffix ? `${expression} ${suffix}` : expression;

    const seen = new Set<string>();
    const results: AssetRecord[] = [];

    for (const archive of archives) {
      if (results.length >= limit) break;
      const found = await this.searchArchive(archive, query, limit - results.length, accept);
      for (const asset of found) {
        if (seen.has(asset.backendId)) continue;
        seen.add(asset.backendId);
        results.push(asset);
      }
    }

    return results;
  }

  private async searchArchive(
    archive: string,
    query: string,
    limit: number,
    accept: (asset: AssetRecord) => boolean
  ): Promise<AssetRecord[]> {
    const searchUrl = await this.searchUrl(archive);
    // oldest first
    let next: string | undefined = searchUrl.replace(
      QUERY_PLACEHOLDER,
      ";o=+?q=" + encodeURIComponent(query)
    );
    const visited = new Set<string>();
    const assets: AssetRecord[] = [];

    while (next && assets.length < limit) {
      visited.add(next);
      const response = await this.request({ method: "GET", url: next });
      const page = readSearchPage(response.data);
      if (page.data.length === 0) break;

      for (const item of page.data) {
        if (!isFotowareAsset(item)) {
          this.log("warn", "Skipping unreadable FotoWare asset", { archive });
          continue;
        }
        const record = this.toRecord(item);
        if (accept(record)) assets.push(record);
        if (assets.length >= limit) break;
      }

      if (page.next && visited.has(page.next)) {
        this.log("warn", "FotoWare paging repeats itself, stopping", { archive, next: page.next });
        break;
      }
      next = page.next;
    }

    this.log("debug", "FotoWare search", { archive, query, results: assets.length });
    return assets;
  }

  private async searchUrl(archive: string): Promise<string> {
    const cached = this.searchUrls.get(archive);
    if (cached) return cached;

    const response = await this.request({ method: "GET", url: `/fotoweb/archives/${encodeURIComponent(archive)}/` });
    const searchUrl = isRecord(response.data) ? response.data.searchURL : undefined;
    if (typeof searchUrl !== "string" || !searchUrl.includes(QUERY_PLACEHOLDER)) {
      this.log("error", "Archive cannot be searched", { archive });
      throw new BackendUnavailableError(`Archive '${archive}' cannot be searched`);
    }

    this.searchUrls.set(archive, searchUrl);
    return searchUrl;
  }

  private async renditionService(): Promise<string> {
    if (this.renditionServiceUrl) return this.renditionServiceUrl;

    const response = await this.request({ method: "GET", url: "/fotoweb/me/" });
    const services = isRecord(response.data) ? response.data.services : undefined;
    const url = isRecord(services) ? services.rendition_request : undefined;
    if (typeof url !== "string") {
      this.log("error", "FotoWare API descriptor has no rendition service");
      throw new BackendUnavailableError("No rendition request service");
    }

    this.renditionServiceUrl = url;
    return url;
  }

  private async token(): Promise<string> {
    if (this.accessToken && this.accessToken.expiresAt - TOKEN_REFRESH_MARGIN_MS > this.now()) {
      return this.accessToken.value;
    }
    if (!this.tokenRequest) {
      this.tokenRequest = this.requestToken().finally(() => {
        this.tokenRequest = undefined;
      });
    }
    return this.tokenRequest;
  }

  private async requestToken(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    let data: unknown;
    try {
      const response = await this.http.post("/fotoweb/oauth2/token", body.toString(), {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      });
      data = response.data;
    } catch (err) {
      throw toBackendError(err, "FotoWare token request failed");
    }

    const value = isRecord(data) ? data.access_token : undefined;
    const expiresIn = isRecord(data) ? data.expires_in : undefined;
    if (typeof value !== "string" || typeof expiresIn !== "number") {
      throw new BackendUnavailableError("FotoWare token response is malformed");
    }

    this.accessToken = { value, expiresAt: this.now() + expiresIn * 1000 };
    this.log("info", "FotoWare access token renewed", {
      expiresAt: new Date(this.accessToken.expiresAt).toISOString(),
    });
    return value;
  }

  private resolve(href: string): URL | undefined {
    try {
      return new URL(href, this.origin);
    } catch {
      return undefined;
    }
  }

  private async request(config: FotowareRequest): Promise<AxiosResponse<unknown>> {
    // the bearer token is only ever sent to the configured host
    const target = this.resolve(config.url ?? "");
    if (!target || target.origin !== this.origin) {
      this.log("warn", "Refusing FotoWare request to a foreign origin", { url: config.url });
      throw new BackendUnavailableError(`Refusing request outside ${this.origin}`);
    }

    const token = await this.token();
    try {
      return await this.http.request<unknown>({
        ...config,
        headers: { ...config.headers, Authorization: `Bearer ${token}` },
      });
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 401) {
        // token revoked before its advertised expiry
        this.accessToken = undefined;
      }
      throw toBackendError(err, `FotoWare ${config.method ?? "GET"} ${config.url ?? ""} failed`);
    }
  }
}

function readSearchPage(data: unknown): { data: unknown[]; next?: string } {
  const assets = isRecord(data) ? data.assets : undefined;
  if (!isRecord(assets)) return { data: [] };

  const items = Array.isArray(assets.data) ? assets.data : [];
  const next = isRecord(assets.paging) ? assets.paging.next : undefined;
  return { data: items, next: typeof next === "string" && next !== "" ? next : undefined };
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data);
  throw new BackendUnavailableError("Unexpected rendition payload");
}

function toBackendError(err: unknown, message: string): BackendUnavailableError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    return new BackendUnavailableError(
      status ? `${message} (HTTP ${status})` : `${message} (${err.code ?? err.message})`,
      { cause: err, status }
    );
  }
  return new BackendUnavailableError(message, { cause: err });
}
