import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";

export type ComposeImage = {
  composeFile: string;
  service: string;
  image: string;
};

const COMPOSE_FILENAMES = new Set([
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml"
]);

const SCAN_DEPTH = 6;

const shouldSkipDir = (name: string) => {
  return name === "node_modules" || name.startsWith(".");
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const scanDir = async (root: string, results: string[], depth: number) => {
  if (depth < 0) return;
  const entries = await fs.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      if (!shouldSkipDir(entry.name)) {
        await scanDir(fullPath, results, depth - 1);
      }
    } else if (entry.isFile() && COMPOSE_FILENAMES.has(entry.name)) {
      results.push(fullPath);
    }
  }
};

export const findComposeFiles = async (dirs: string[]) => {
  const results: string[] = [];
  for (const dir of dirs) {
    await scanDir(dir, results, SCAN_DEPTH);
  }
  return results;
};

export const parseComposeImages = (raw: string, composeFile: string): ComposeImage[] => {
  const doc: unknown = YAML.parse(raw);
  const services = isRecord(doc) && isRecord(doc.services) ? doc.services : {};
  return Object.entries(services).flatMap(([service, value]) => {
    const image = isRecord(value) ? value.image : undefined;
    if (typeof image !== "string" || !image.trim()) return [];
    return [{ composeFile, service, image: image.trim() }];
  });
};

export const loadComposeImages = async (composeFile: string) => {
  const raw = await fs.readFile(composeFile, "utf8");
  return parseComposeImages(raw, composeFile);
};
