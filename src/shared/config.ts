import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const positiveInt = () => z.number().int().positive();

export const ConfigSchema = z.object({
  fetch: z
    .object({
      max_concurrent: positiveInt().default(5),
      timeout_ms: positiveInt().default(15000),
      max_redirects: z.number().int().min(0).default(3),
      user_agent: z.string().default('feedsmith/1.0'),
    })
    .default({}),

  cache: z
    .object({
      path: z.string().default('cache/feeds.sqlite'),
      feed_ttl_ms: positiveInt().default(30 * 60 * 1000),
      content_ttl_ms: positiveInt().default(30 * 60 * 1000),
      retention_days: positiveInt().default(7),
      fail_alert_threshold: positiveInt().default(30),
    })
    .default({}),

  pipeline: z
    .object({
      lookback_days: positiveInt().default(7),
      substantial_html_chars: z.number().int().min(0).default(200),
      substantial_text_chars: z.number().int().min(0).default(200),
      short_title_chars: z.number().int().min(0).default(20),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('outputs'),
      base_url: z.string().url().default('https://example.com/feedsmith/releases'),
    })
    .default({}),

  recipes_path: z.string().default('recipes.yaml'),

  schedule: z
    .object({
      cron: z.string().default('45 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Apply FEEDSMITH_* environment overrides on top of the raw file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const out = { ...rawConfig };

  const cachePath = env['FEEDSMITH_CACHE_PATH'];
  if (cachePath) {
    out['cache'] = { ...asRecord(out['cache']), path: cachePath };
  }

  const outputDir = env['FEEDSMITH_OUTPUT_DIR'];
  if (outputDir) {
    out['output'] = { ...asRecord(out['output']), dir: outputDir };
  }

  return out;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedsmith', {
    searchPlaces: [
      'feedsmith.config.yaml',
      'feedsmith.config.yml',
      '.feedsmithrc.yaml',
      '.feedsmithrc.yml',
    ],
  });

  const envConfigPath = process.env['FEEDSMITH_CONFIG'];
  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const result = await explorer.search();
    if (result) {
      logger.debug({ path: result.filepath }, 'Config file loaded');
      rawConfig = asRecord(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
