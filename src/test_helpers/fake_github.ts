import { isRecord, type ApiRecord, type ApiRequest, type ApiResponse, type ApiTransport } from "../github/types.js";

export const FAKE_API_URL = "https://api.test";

type Seed = {
  repos?: string[];
  teams?: Array<[string, number]>;
  branches?: Record<string, string[]>;
  rulesets?: Record<string, ApiRecord[]>;
};

/** In-process stand-in for the REST endpoints the tool uses, with link-header paging. */
export class FakeGitHub {
  readonly requests: ApiRequest[] = [];
  /** Status returned by ruleset creation; the real API answers 201. */
  createStatus = 201;
  nextId = 1000;

  private readonly repos: string[];
  private readonly teams: Array<[string, number]>;
  private readonly branches: Map<string, string[]>;
  private readonly rulesets = new Map<string, ApiRecord[]>();

  constructor(
    readonly org: string,
    seed: Seed = {}
  ) {
    this.repos = seed.repos ?? [];
    this.teams = seed.teams ?? [];
    this.branches = new Map(Object.entries(seed.branches ?? {}));
    for (const [repo, records] of Object.entries(seed.rulesets ?? {})) {
      this.rulesets.set(
        repo,
        records.map((record) => ({ source: `${org}/${repo}`, source_type: "Repository", ...record }))
      );
    }
  }

  readonly transport: ApiTransport = async (request) => {
    this.requests.push(request);
    return this.handle(request);
  };

  rulesetsOf(repo: string): ApiRecord[] {
    return structuredClone(this.rulesets.get(repo) ?? []);
  }

  requestsTo(method: ApiRequest["method"], path: string): ApiRequest[] {
    return this.requests.filter((request) => request.method === method && request.path === path);
  }

  private url(request: ApiRequest): string {
    const search = new URLSearchParams(
      Object.entries(request.query ?? {}).map(([k, v]): [string, string] => [k, String(v)])
    ).toString();
    return `${FAKE_API_URL}${request.path}${search ? `?${search}` : ""}`;
  }

  private reply(request: ApiRequest, status: number, data: unknown): ApiResponse {
    return { url: this.url(request), status, headers: {}, data: structuredClone(data) };
  }

  private notFound(request: ApiRequest): ApiResponse {
    return this.reply(request, 404, { message: "Not Found" });
  }

  private paged(request: ApiRequest, items: readonly ApiRecord[]): ApiResponse {
    const perPage = Number(request.query?.per_page ?? 30);
    const page = Number(request.query?.page ?? 1);
    const start = (page - 1) * perPage;
    const response = this.reply(request, 200, items.slice(start, start + perPage));
    if (start + perPage < items.length) {
      const last = Math.ceil(items.length / perPage);
      const base = `${FAKE_API_URL}${request.path}?per_page=${perPage}`;
      response.headers.link = `<${base}&page=${page + 1}>; rel="next", <${base}&page=${last}>; rel="last"`;
    }
    return response;
  }

  private handle(request: ApiRequest): ApiResponse {
    const [scope, owner, name, collection, rest] = request.path.split("/").slice(1).map(decodeURIComponent);
    if (owner !== this.org) {
      return this.notFound(request);
    }

    if (scope === "orgs" && request.method === "GET" && collection === undefined) {
      if (name === "repos") {
        return this.paged(
          request,
          this.repos.map((repo, i) => ({ id: i + 1, name: repo, full_name: `${this.org}/${repo}` }))
        );
      }
      if (name === "teams") {
        return this.paged(
          request,
          this.teams.map(([team, id]) => ({ id, name: team, slug: team.toLowerCase() }))
        );
      }
    }

    if (scope !== "repos" || name === undefined) {
      return this.notFound(request);
    }

    if (collection === "branches" && request.method === "GET") {
      return this.paged(
        request,
        (this.branches.get(name) ?? []).map((branch) => ({ name: branch, protected: false }))
      );
    }

    if (collection === "rulesets") {
      return this.rulesetRoute(request, name, rest);
    }
    return this.notFound(request);
  }

  private rulesetRoute(request: ApiRequest, repo: string, idSegment: string | undefined): ApiResponse {
    const records = this.rulesets.get(repo) ?? [];
    const source = `${this.org}/${repo}`;

    if (idSegment === undefined) {
      if (request.method === "GET") {
        return this.paged(
          request,
          records.map((record) => ({
            id: record.id,
            name: record.name,
            source: record.source,
            source_type: record.source_type,
            enforcement: record.enforcement
          }))
        );
      }
      if (request.method === "POST") {
        const created: ApiRecord = {
          ...(isRecord(request.body) ? request.body : {}),
          id: this.nextId,
          source,
          source_type: "Repository"
        };
        this.nextId += 1;
        this.rulesets.set(repo, [...records, created]);
        return this.reply(request, this.createStatus, created);
      }
      return this.notFound(request);
    }

    const id = Number(idSegment);
    const index = records.findIndex((record) => record.id === id);
    if (index < 0) {
      return this.notFound(request);
    }

    if (request.method === "GET") {
      return this.reply(request, 200, {
        ...records[index],
        created_at: "2024-01-02T03:04:05Z",
        updated_at: "2024-01-02T03:04:05Z",
        _links: { html: { href: `https://github.test/${source}/rules/${id}` } }
      });
    }
    // Inherited organization rulesets are only writable through the organization.
    if (request.method === "PUT" && records[index]?.source_type === "Repository") {
      const updated: ApiRecord = {
        ...(isRecord(request.body) ? request.body : {}),
        id,
        source,
        source_type: "Repository"
      };
      this.rulesets.set(
        repo,
        records.map((record, i) => (i === index ? updated : record))
      );
      return this.reply(request, 200, updated);
    }
    return this.notFound(request);
  }
}
