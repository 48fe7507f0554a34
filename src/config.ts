import type { Level } from "pino";
import { parseLogLevel } from "./logger.js";

export type Config = {
  githubToken: string | null;
  logLevel: Level;
  maxPages: number;
  pageSize: number;
  requestTimeoutMs: number;
  dockerSocketPath: string;
};

export const MAX_PAGES_LIMIT = 100;
export const MAX_TIMEOUT_MS = 600_000;

export const parseNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback;
  const num = Number(value);
  return Number.isInteger(num) && num > 0 ? num : fallback;
};

export const clampPages = (pages: number) => Math.min(Math.max(pages, 1), MAX_PAGES_LIMIT);

export const clampTimeout = (ms: number) => Math.min(Math.max(ms, 1), MAX_TIMEOUT_MS);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  return {
    githubToken: env.GITHUB_TOKEN || null,
    logLevel: parseLogLevel(env.LOG_LEVEL ?? "") ?? "info",
    maxPages: clampPages(parseNumber(env.MAX_PAGES, 3)),
    pageSize: parseNumber(env.PAGE_SIZE, 100),
    requestTimeoutMs: clampTimeout(parseNumber(env.REQUEST_TIMEOUT_MS, 30_000)),
    dockerSocketPath: env.DOCKER_SOCKET ?? "/var/run/docker.sock"
  };
};
