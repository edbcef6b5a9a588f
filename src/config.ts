/**
 * Configuration for the ingestion job
 */

import fs from 'fs/promises';
import { dirname, isAbsolute, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { loadIgnorePatterns } from './ignore-list.js';
import type { ServerLocation } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Project root (one level up from src/ or dist/)
export const PROJECT_ROOT = join(__dirname, '..');

const serverSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  directory: z.string().min(1),
});

export const serversSchema = z
  .array(serverSchema)
  .min(1, 'At least one server must be configured')
  .superRefine((servers, ctx) => {
    const ids = new Set<number>();
    const names = new Set<string>();
    for (const server of servers) {
      if (ids.has(server.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate server id ${server.id}` });
      }
      if (names.has(server.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate server name '${server.name}'` });
      }
      ids.add(server.id);
      names.add(server.name);
    }
  });

const envSchema = z.object({
  /**
   * SQLite database file
   * Default: data/awstats.db
   */
  DATABASE_PATH: z.string().min(1).default('data/awstats.db'),

  /**
   * JSON list of servers and the directory holding their AWStats files
   * Default: config/servers.json
   */
  SERVERS_FILE: z.string().min(1).default('config/servers.json'),

  /**
   * URL prefixes that are never stored, one per line
   * Default: config/ignore_urls.txt
   */
  IGNORE_URLS_FILE: z.string().min(1).default('config/ignore_urls.txt'),

  /**
   * Path prefix removed from every URL (after the leading slash)
   * Default: wiki/
   */
  URL_PATH_PREFIX: z.string().default('wiki/'),
});

export interface IngestConfig {
  servers: readonly ServerLocation[];
  ignorePatterns: readonly string[];
  pathPrefix: string;
}

export interface AppConfig extends IngestConfig {
  databasePath: string;
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : join(PROJECT_ROOT, path);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a parsed servers file
 * @throws ConfigError when entries are missing fields or repeat an id or name
 */
export function parseServers(data: unknown): ServerLocation[] {
  const result = serversSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid servers configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadServers(path: string): Promise<ServerLocation[]> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read servers file ${path}: ${errorMessage(error)}`);
  }
  return parseServers(data);
}

/**
 * Load and validate configuration from environment variables.
 * Relative paths are resolved against the project root.
 * @throws ConfigError if any setting is invalid
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  const settings = result.data;

  const servers = await loadServers(resolvePath(settings.SERVERS_FILE));
  const ignorePatterns = await loadIgnorePatterns(resolvePath(settings.IGNORE_URLS_FILE));

  return {
    databasePath: resolvePath(settings.DATABASE_PATH),
    servers,
    ignorePatterns,
    pathPrefix: settings.URL_PATH_PREFIX,
  };
}
