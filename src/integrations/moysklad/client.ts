/**
 * MoySklad Integration
 *
 * Read side: product folders and the product assortment, flattened into a
 * Snapshot for the checkers. Write side: counterparty registration for the
 * phone lookup bot.
 *
 * Usage:
 *   const client = new MoySkladClient({ token: process.env.MS_TOKEN, logger });
 *   const snapshot = await client.fetchSnapshot(AbortSignal.timeout(300_000));
 */

import { z } from 'zod';
import { FetchError } from '../../types/errors.js';
import { parseDate } from '../../utils/date-parser.js';
import { formatDateTime } from '../../utils/format.js';
import type { Logger } from '../../utils/logger.js';
import { sleep, withRetry } from '../../utils/retry.js';
import type { Product, Snapshot, SnapshotSource } from '../../monitor/types.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export const MOYSKLAD_BASE_URL = 'https://api.moysklad.ru/api/remap/1.2';
export const NO_GROUP = 'No group';

export type CreateCounterpartyResult = 'created' | 'exists' | 'rejected';

export interface MoySkladClientOptions {
  token: string;
  logger: Logger;
  baseUrl?: string;
  /** Rows per page (API maximum is 1000) */
  pageSize?: number;
  requestTimeoutMs?: number;
  /** Pause between pages */
  pageDelayMs?: number;
  /** Snapshot attempts before giving up */
  maxAttempts?: number;
  retryDelayMs?: number;
  expirationAttribute?: string;
  counterpartyTags?: readonly string[];
  clock?: () => Date;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  params?: Record<string, string | number>;
  body?: unknown;
  signal?: AbortSignal;
}

const MetaRefSchema = z.object({
  meta: z.object({ href: z.string() }),
});

const PageSchema = z.object({
  rows: z.array(z.unknown()).default([]),
});

const FolderRowSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  productFolder: MetaRefSchema.optional(),
});

const AttributeSchema = z.object({
  name: z.string(),
  value: z.unknown().optional(),
});

const ProductRowSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  stock: z.number().default(0),
  minimumBalance: z.number().nullable().optional(),
  productFolder: MetaRefSchema.optional(),
  attributes: z.array(AttributeSchema).default([]),
});

const CounterpartyRowSchema = z.object({
  name: z.string(),
  companyType: z.string().default('legal'),
});

const CreatedSchema = z.object({ id: z.string().min(1) });

type ProductRow = z.infer<typeof ProductRowSchema>;

interface FolderEntry {
  name: string;
  parentId: string | null;
}

function idFromHref(href: string | undefined): string | null {
  if (!href) return null;
  const id = href.split('?')[0].split('/').pop();
  return id ? id : null;
}

/**
 * Walk a folder's ancestors and join their names root first.
 */
export function resolveGroupPath(folderId: string | null, folders: ReadonlyMap<string, FolderEntry>): string {
  const path: string[] = [];
  const seen = new Set<string>();
  let current = folderId;

  while (current !== null && !seen.has(current)) {
    const folder = folders.get(current);
    if (!folder) break;
    seen.add(current);
    path.push(folder.name);
    current = folder.parentId;
  }

  return path.length > 0 ? path.reverse().join(' > ') : NO_GROUP;
}

// ─── MoySklad Client ────────────────────────────────────────────────────────

export class MoySkladClient implements SnapshotSource {
  private readonly token: string;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly requestTimeoutMs: number;
  private readonly pageDelayMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly expirationAttribute: string;
  private readonly counterpartyTags: readonly string[];
  private readonly clock: () => Date;

  constructor(options: MoySkladClientOptions) {
    if (!options.token) {
      throw new Error('MoySklad token is required');
    }
    this.token = options.token;
    this.logger = options.logger.child({ component: 'moysklad' });
    this.baseUrl = (options.baseUrl ?? MOYSKLAD_BASE_URL).replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 500;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.pageDelayMs = options.pageDelayMs ?? 1000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.expirationAttribute = options.expirationAttribute ?? 'Expiration date';
    this.counterpartyTags = options.counterpartyTags ?? [];
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Load every product with its group path and expiration date.
   */
  async fetchSnapshot(signal: AbortSignal): Promise<Snapshot> {
    return withRetry(
      async () => {
        const folders = await this.loadFolders(signal);
        const { rows, skipped } = await this.paginate(
          'entity/assortment',
          ProductRowSchema,
          { filter: 'type=product' },
          signal,
        );

        if (skipped > 0) {
          this.logger.warn({ skipped }, 'Skipped malformed assortment rows');
        }

        const products = rows.map((row) => this.toProduct(row, folders));
        this.logger.info({ products: products.length, folders: folders.size }, 'Snapshot loaded');
        return { fetchedAt: this.clock(), products };
      },
      {
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.retryDelayMs,
        backoffFactor: 2,
        signal,
        retryIf: (error) => !(error instanceof FetchError) || error.retryable,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ err: error, attempt, delayMs }, 'Snapshot fetch failed, retrying');
        },
      },
    );
  }

  /**
   * Map of counterparty name to company type, archived ones excluded.
   */
  async loadCounterparties(signal?: AbortSignal): Promise<Map<string, string>> {
    const { rows, skipped } = await this.paginate(
      'entity/counterparty',
      CounterpartyRowSchema,
      { filter: 'archived=false' },
      signal,
      1000,
    );

    const counterparties = new Map<string, string>();
    for (const row of rows) {
      const name = row.name.trim();
      if (name) counterparties.set(name, row.companyType);
    }

    this.logger.info({ counterparties: counterparties.size, skipped }, 'Counterparties loaded');
    return counterparties;
  }

  /**
   * Register a phone number as an individual counterparty.
   * Client errors are answers, not failures; network and server errors throw.
   */
  async createCounterparty(phone: string, signal?: AbortSignal): Promise<CreateCounterpartyResult> {
    const payload = {
      name: phone,
      phone,
      companyType: 'individual',
      tags: [...this.counterpartyTags],
      description: `Created automatically by the bot\nDate: ${formatDateTime(this.clock())}\nType: individual`,
    };

    let response: unknown;
    try {
      response = await this.request('entity/counterparty', { method: 'POST', body: payload, signal });
    } catch (error) {
      if (error instanceof FetchError && error.status === 409) {
        this.logger.info({ phone }, 'Counterparty already exists');
        return 'exists';
      }
      if (error instanceof FetchError && error.status !== undefined && error.status >= 400 && error.status < 500 && error.status !== 429) {
        this.logger.warn({ phone, status: error.status }, 'Counterparty rejected by the API');
        return 'rejected';
      }
      throw error;
    }

    if (!CreatedSchema.safeParse(response).success) {
      this.logger.warn({ phone }, 'Unexpected response creating counterparty');
      return 'rejected';
    }

    this.logger.info({ phone }, 'Counterparty created');
    return 'created';
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.request('entity/counterparty', { params: { limit: 1 } });
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'MoySklad connection check failed');
      return false;
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private async loadFolders(signal: AbortSignal): Promise<Map<string, FolderEntry>> {
    const { rows } = await this.paginate('entity/productfolder', FolderRowSchema, {}, signal);
    const folders = new Map<string, FolderEntry>();
    for (const row of rows) {
      folders.set(row.id, {
        name: row.name || 'Unnamed',
        parentId: idFromHref(row.productFolder?.meta.href),
      });
    }
    return folders;
  }

  private toProduct(row: ProductRow, folders: ReadonlyMap<string, FolderEntry>): Product {
    const attribute = row.attributes.find((attr) => attr.name === this.expirationAttribute);

    return {
      id: row.id,
      name: row.name,
      stock: row.stock,
      minBalance: row.minimumBalance ?? null,
      groupPath: resolveGroupPath(idFromHref(row.productFolder?.meta.href), folders),
      expirationDate: attribute ? parseDate(attribute.value) : null,
    };
  }

  private async paginate<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: Record<string, string | number>,
    signal?: AbortSignal,
    limit = this.pageSize,
  ): Promise<{ rows: T[]; skipped: number }> {
    const rows: T[] = [];
    let skipped = 0;
    let offset = 0;

    for (;;) {
      const body = await this.request(path, { params: { ...params, limit, offset }, signal });
      const page = PageSchema.safeParse(body);
      if (!page.success) {
        throw new FetchError(`Unexpected response from ${path}`);
      }

      for (const raw of page.data.rows) {
        const parsed = schema.safeParse(raw);
        if (parsed.success) {
          rows.push(parsed.data);
        } else {
          skipped++;
        }
      }

      if (page.data.rows.length < limit) break;
      offset += page.data.rows.length;

      await sleep(this.pageDelayMs, signal);
      if (signal?.aborted) {
        throw new FetchError(`Paging ${path} aborted`, { cause: signal.reason });
      }
    }

    this.logger.debug({ path, rows: rows.length, skipped }, 'Pages loaded');
    return { rows, skipped };
  }

  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.token}`,
      'Accept-Encoding': 'gzip',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? 'GET',
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(`MoySklad request to ${path} failed: ${message}`, { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(`MoySklad API error: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new FetchError(`MoySklad returned invalid JSON for ${path}`, { cause: error });
    }
  }
}
