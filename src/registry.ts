import { z } from "zod";
import { AuthTokenMissing, MissingCredential, RegistryRequestFailed, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ImageRef } from "./util/parseImage.js";

export type Credentials = {
  githubToken: string | null;
};

export type TagLister = {
  listTags: (image: ImageRef, credentials: Credentials) => Promise<string[]>;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type AuthKind = "none" | "dockerhub" | "ecr" | "ghcr";

type AuthHeaders = Record<string, string>;

type HttpOptions = {
  fetch: FetchLike;
  timeoutMs: number;
};

type AuthContext = {
  image: ImageRef;
  credentials: Credentials;
  http: HttpOptions;
};

export type AuthStrategy = {
  kind: AuthKind;
  headers: (ctx: AuthContext) => Promise<AuthHeaders>;
};

export const DOCKER_HUB_AUTH_URL = "https://auth.docker.io/token";
export const ECR_PUBLIC_AUTH_URL = "https://public.ecr.aws/token/";

const tokenResponseSchema = z.object({ token: z.string().nullish() }).passthrough();

const tagsPageSchema = z
  .object({
    tags: z.array(z.string()).nullish(),
    results: z.array(z.object({ name: z.string().optional() }).passthrough()).nullish(),
    next: z.string().nullish()
  })
  .passthrough();

type TagsPage = z.infer<typeof tagsPageSchema>;

const getJson = async (url: string, http: HttpOptions, headers: AuthHeaders = {}) => {
  let res: Response;
  try {
    res = await http.fetch(url, {
      headers: { Accept: "application/json", ...headers },
      signal: AbortSignal.timeout(http.timeoutMs)
    });
  } catch (err) {
    throw new RegistryRequestFailed(url, null, errorMessage(err), { cause: err });
  }
  if (!res.ok) {
    throw new RegistryRequestFailed(url, res.status, res.statusText || "unexpected status");
  }
  let data: unknown;
  try {
    data = await res.json();
  } catch (err) {
    throw new RegistryRequestFailed(url, res.status, "response body is not JSON", { cause: err });
  }
  return { data, res };
};

const fetchBearerToken = async (url: string, http: HttpOptions): Promise<AuthHeaders> => {
  const { data } = await getJson(url, http);
  const parsed = tokenResponseSchema.safeParse(data);
  const token = parsed.success ? parsed.data.token : null;
  if (!token) {
    throw new AuthTokenMissing(url);
  }
  return { Authorization: `Bearer ${token}` };
};

export const AUTH_STRATEGIES: Record<AuthKind, AuthStrategy> = {
  none: {
    kind: "none",
    headers: async () => ({})
  },
  dockerhub: {
    kind: "dockerhub",
    headers: async ({ image, http }) => {
      const url = new URL(DOCKER_HUB_AUTH_URL);
      url.searchParams.set("service", "registry.docker.io");
      url.searchParams.set("scope", `repository:${image.repository}:pull`);
      return fetchBearerToken(url.toString(), http);
    }
  },
  ecr: {
    kind: "ecr",
    headers: async ({ http }) => fetchBearerToken(ECR_PUBLIC_AUTH_URL, http)
  },
  ghcr: {
    kind: "ghcr",
    headers: async ({ image, credentials }) => {
      if (!credentials.githubToken) {
        throw new MissingCredential(image.registry, "pass --github-token or set GITHUB_TOKEN");
      }
      // ghcr.io takes a personal access token as a base64 bearer
      const encoded = Buffer.from(credentials.githubToken, "utf8").toString("base64");
      return { Authorization: `Bearer ${encoded}` };
    }
  }
};

export const classifyRegistry = (registry: string): AuthKind => {
  const host = registry.toLowerCase();
  if (host.includes("public.ecr.aws")) return "ecr";
  if (host.includes("docker")) return "dockerhub";
  if (host.includes("ghcr")) return "ghcr";
  return "none";
};

export const buildTagsUrl = (image: ImageRef) => {
  return `https://${image.registry}/v2/${image.repository}/tags/list`;
};

const LINK_NEXT = /<([^>]+)>\s*;[^,]*\brel="?next"?/;

export const parseLinkNext = (header: string | null) => {
  if (!header) return null;
  const match = LINK_NEXT.exec(header);
  return match ? match[1] : null;
};

export const tagsFromPage = (page: TagsPage) => {
  const names = (page.results ?? []).flatMap((result) => (result.name === undefined ? [] : [result.name]));
  if (names.length > 0) return names;
  return page.tags ?? [];
};

export type RegistryTagListerOptions = {
  fetch?: FetchLike;
  maxPages: number;
  pageSize: number;
  timeoutMs: number;
  logger: Logger;
};

export const createRegistryTagLister = (options: RegistryTagListerOptions): TagLister => {
  const http: HttpOptions = {
    fetch: options.fetch ?? ((input, init) => fetch(input, init)),
    timeoutMs: options.timeoutMs
  };

  const listTags = async (image: ImageRef, credentials: Credentials) => {
    const log = options.logger.child({ registry: image.registry, repository: image.repository });
    const strategy = AUTH_STRATEGIES[classifyRegistry(image.registry)];
    log.debug({ auth: strategy.kind }, "Resolving registry auth");
    const headers = await strategy.headers({ image, credentials, http });

    const first = new URL(buildTagsUrl(image));
    first.searchParams.set("n", String(options.pageSize));

    const tags: string[] = [];
    let url: string | null = first.toString();
    let page = 0;
    while (url && page < options.maxPages) {
      page += 1;
      log.debug({ url, page }, "Fetching tags page");
      const { data, res } = await getJson(url, http, headers);
      const parsed = tagsPageSchema.safeParse(data);
      if (!parsed.success) {
        throw new RegistryRequestFailed(url, res.status, `unexpected tags response: ${parsed.error.message}`);
      }
      tags.push(...tagsFromPage(parsed.data));

      const next = parsed.data.next || parseLinkNext(res.headers.get("link"));
      const nextUrl: URL | null = next ? new URL(next, url) : null;
      if (nextUrl && nextUrl.origin !== first.origin) {
        // registry credentials stay with the registry
        log.warn({ next: nextUrl.toString() }, "Next tags page is on another host; stopping");
        url = null;
        break;
      }
      url = nextUrl ? nextUrl.toString() : null;
    }

    if (url) {
      log.warn({ pages: page }, `Stopped after ${page} pages; more tags may exist`);
    }
    log.debug({ count: tags.length }, "Fetched tags");
    return tags;
  };

  return { listTags };
};
