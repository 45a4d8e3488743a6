import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isRecord } from './utils.js';

/** Name of the project configuration file at the project root. */
export const CONFIG_FILE = 'inkwell.yaml';

const configSchema = z
  .object({
    output_dir: z.string().min(1).default('output'),
    port: z.number().int().min(1).max(65535).default(4000),
    ws_port: z.number().int().min(1).max(65535).optional(),
    root_url: z.string().default('')
  })
  .passthrough();

/**
 * Runtime configuration for a site project.
 */
export interface AppConfig {
  /** Absolute project root (the directory holding `site/`). */
  projectRoot: string;
  /** Absolute output directory (`output_dir`, default `<root>/output`). */
  outputDir: string;
  /** HTTP port for the dev server. */
  port: number;
  /** WebSocket port for live reload, defaults to `port + 1`. */
  wsPort: number;
  /** Base URL used to absolutize links; empty disables it. */
  rootUrl: string;
  /** Keys of `inkwell.yaml` not covered above. */
  extra: Record<string, unknown>;
}

/**
 * Parse an integer from an environment variable with fallback handling.
 */
function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = env[name];
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Read `inkwell.yaml`; a missing file or a non-mapping document yields `{}`.
 */
function readConfigFile(projectRoot: string): Record<string, unknown> {
  const configPath = path.join(projectRoot, CONFIG_FILE);
  if (!fs.existsSync(configPath)) return {};
  let loaded: unknown;
  try {
    loaded = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse ${configPath}: ${reason}`);
  }
  return isRecord(loaded) ? loaded : {};
}

/**
 * Build the project configuration from `inkwell.yaml` and environment
 * overrides (`INKWELL_OUTPUT_DIR`, `INKWELL_PORT`, `INKWELL_WS_PORT`,
 * `INKWELL_ROOT_URL`).
 */
export function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const root = path.resolve(projectRoot);
  const parsed = configSchema.safeParse(readConfigFile(root));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join('.') || '(root)';
    throw new ConfigError(`Invalid ${CONFIG_FILE} value for "${key}": ${issue.message}`);
  }

  const { output_dir, port, ws_port, root_url, ...extra } = parsed.data;
  const resolvedPort = intFromEnv(env, 'INKWELL_PORT', port);

  return {
    projectRoot: root,
    outputDir: path.resolve(root, env.INKWELL_OUTPUT_DIR ?? output_dir),
    port: resolvedPort,
    wsPort: intFromEnv(env, 'INKWELL_WS_PORT', ws_port ?? resolvedPort + 1),
    rootUrl: env.INKWELL_ROOT_URL ?? root_url,
    extra
  };
}
