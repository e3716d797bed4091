import { MalformedDocumentError, UnexpectedStatusError } from "../errors.js";
import type { Logger } from "../log.js";
import { parseNextPage } from "./link.js";
import { isRecord, type ApiRecord, type ApiResponse, type ApiTransport, type HttpMethod, type Query } from "./types.js";

export const MAX_PAGE_SIZE = 100;

export type PageQuery = Query & { per_page?: number; page?: number };

export type Page = {
  body: unknown;
  next: number | null;
};

export type SendOptions = {
  query?: Query;
  body?: unknown;
  /** Statuses accepted as success; anything else is fatal. */
  expect?: readonly number[];
};

const WRITE_METHODS: readonly HttpMethod[] = ["POST", "PUT", "PATCH"];

export function encodePath(...segments: string[]): string {
  return segments.map((segment) => `/${encodeURIComponent(segment)}`).join("");
}

export class GitHubClient {
  constructor(
    private readonly transport: ApiTransport,
    private readonly log: Logger,
    private readonly pageSize: number = MAX_PAGE_SIZE
  ) {}

  async send(method: HttpMethod, path: string, opts: SendOptions = {}): Promise<ApiResponse> {
    const query = opts.query ?? {};
    const search = new URLSearchParams(Object.entries(query).map(([k, v]): [string, string] => [k, String(v)])).toString();
    this.log.info(`${method} ${path}${search ? `?${search}` : ""}`);
    if (WRITE_METHODS.includes(method) && opts.body !== undefined) {
      this.log.info(`body: ${JSON.stringify(opts.body)}`);
    }

    const response = await this.transport({ method, path, query, body: opts.body });
    this.log.info(`${method} ${response.url} -> ${response.status}`);

    const expect = opts.expect ?? [200];
    if (!expect.includes(response.status)) {
      throw new UnexpectedStatusError(response.url, response.status);
    }
    return response;
  }

  async get(path: string, query?: Query): Promise<unknown> {
    return (await this.send("GET", path, { query })).data;
  }

  async create(path: string, body: unknown): Promise<unknown> {
    return (await this.send("POST", path, { body, expect: [201] })).data;
  }

  async update(path: string, body: unknown): Promise<unknown> {
    return (await this.send("PUT", path, { body, expect: [200] })).data;
  }

  async fetchPage(path: string, query: PageQuery = {}): Promise<Page> {
    const response = await this.send("GET", path, {
      query: { ...query, per_page: query.per_page ?? this.pageSize, page: query.page ?? 1 }
    });
    return { body: response.data, next: parseNextPage(response.headers.link) };
  }

  /**
   * Reduces every record of a paged collection, in server order, into an accumulator.
   * A page body may be a single record or an array of records.
   */
  async fold<A>(
    path: string,
    combine: (acc: A, record: ApiRecord) => A,
    initial: A,
    query: PageQuery = {}
  ): Promise<A> {
    let acc = initial;
    let page: number | null = query.page ?? 1;
    while (page !== null) {
      const { body, next } = await this.fetchPage(path, { ...query, page });
      const records: unknown[] = Array.isArray(body) ? body : [body];
      for (const record of records) {
        if (!isRecord(record)) {
          throw new MalformedDocumentError(`Unexpected record in page ${page} of ${path}: ${JSON.stringify(record)}`);
        }
        acc = combine(acc, record);
      }
      page = next;
    }
    return acc;
  }

  async foldNames(path: string, query: PageQuery = {}): Promise<string[]> {
    return this.fold<string[]>(
      path,
      (names, record) => {
        names.push(recordName(record, path));
        return names;
      },
      [],
      query
    );
  }

  async foldNameIds(path: string, query: PageQuery = {}): Promise<Map<string, number>> {
    return this.fold(
      path,
      (ids, record) => ids.set(recordName(record, path), recordId(record, path)),
      new Map<string, number>(),
      query
    );
  }
}

export function recordName(record: ApiRecord, source: string): string {
  if (typeof record.name !== "string") {
    throw new MalformedDocumentError(`Record without a name in ${source}`);
  }
  return record.name;
}

export function recordId(record: ApiRecord, source: string): number {
  if (typeof record.id !== "number" || !Number.isInteger(record.id)) {
    throw new MalformedDocumentError(`Record without an integer id in ${source}`);
  }
  return record.id;
}
