/**
 * Data loader. Reads the data directory:
 *
 *   data/
 *     config.yaml     ← server, admin token, engine tunables
 *     patterns.yaml   ← seed patterns, copied into the store on first start
 *
 * Both files are validated here; a broken file stops startup
 * rather than running with half a configuration.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { PatternFileSchema, TactConfigSchema } from '../types/index.js';
import type { Pattern, TactConfig } from '../types/index.js';
import { validatePattern } from './registry.js';
import { ValidationError } from './errors.js';

export interface LoadedData {
  config: TactConfig;
  seedPatterns: Pattern[];
}

export function loadData(dataDir: string): LoadedData {
  const configPath = join(dataDir, 'config.yaml');
  const patternsPath = join(dataDir, 'patterns.yaml');

  if (!existsSync(configPath)) {
    throw new Error(
      `Config not found at ${configPath}. ` +
      `Point TACT_DATA_DIR at a directory with config.yaml.`
    );
  }

  const config = parseConfig(readFileSync(configPath, 'utf-8'));
  const seedPatterns = existsSync(patternsPath)
    ? parsePatterns(readFileSync(patternsPath, 'utf-8'))
    : [];

  return { config, seedPatterns };
}

export function parseConfig(source: string): TactConfig {
  const parsed = TactConfigSchema.safeParse(YAML.parse(source) ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, 'Invalid config.yaml');
  }
  return parsed.data;
}

/** Every seed pattern must be valid; ids must be unique */
export function parsePatterns(source: string): Pattern[] {
  const file = PatternFileSchema.safeParse(YAML.parse(source) ?? {});
  if (!file.success) {
    throw ValidationError.fromZod(file.error, 'Invalid patterns.yaml');
  }

  const seen = new Set<string>();
  return file.data.patterns.map((input, index) => {
    const result = validatePattern(input);
    if (!result.ok) {
      throw new ValidationError(`patterns.yaml entry #${index}: ${result.error.message}`, result.error.details);
    }
    if (seen.has(result.value.id)) {
      throw new ValidationError(`patterns.yaml: duplicate pattern id "${result.value.id}"`);
    }
    seen.add(result.value.id);
    return result.value;
  });
}

/** Environment overrides (.env is read by the entry point) */
export function applyEnv(config: TactConfig, env: NodeJS.ProcessEnv = process.env): TactConfig {
  const token = env.TACT_ADMIN_TOKEN;
  const port = env.PORT ? Number(env.PORT) : undefined;

  return {
    ...config,
    server: {
      ...config.server,
      port: port !== undefined && Number.isInteger(port) && port > 0 ? port : config.server.port,
    },
    admin: { ...config.admin, token: token ?? config.admin.token },
  };
}
