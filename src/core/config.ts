import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { BagcheckConfigSchema, type BagcheckConfig, type BagcheckConfigInput } from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.bagcheck.yaml';

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(name: string, value: string): boolean {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

export class ConfigManager {
  private config: BagcheckConfig | null = null;
  private projectDir: string;

  constructor(projectDir?: string, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project config <- env vars <- overrides
   */
  load(overrides?: BagcheckConfigInput): BagcheckConfig {
    let raw: Raw = {};

    // 1. Load project config
    const projectConfigPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(projectConfigPath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(projectConfigPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(
          `Failed to parse project config at ${projectConfigPath}`,
          err instanceof Error ? err : undefined,
        );
      }
      if (isRecord(parsed)) raw = this.deepMerge(raw, parsed);
    }

    // 2. Apply environment variables
    raw = this.applyEnvVars(raw);

    // 3. Apply overrides
    if (overrides && isRecord(overrides)) {
      raw = this.deepMerge(raw, overrides);
    }

    // 4. Validate with Zod
    const result = BagcheckConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }
    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): BagcheckConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private applyEnvVars(raw: Raw): Raw {
    const logging: Raw = isRecord(raw.logging) ? { ...raw.logging } : {};
    const executor: Raw = isRecord(raw.executor) ? { ...raw.executor } : {};

    const level = this.env.BAGCHECK_LOG_LEVEL;
    if (level) {
      logging.level = level;
    }
    const runtimeCheck = this.env.BAGCHECK_RUNTIME_CHECK;
    if (runtimeCheck) {
      executor.runtimeCheck = runtimeCheck;
    }
    const block = this.env.BAGCHECK_BLOCK_DISPROVEN;
    if (block) {
      executor.blockDisproven = parseBoolean('BAGCHECK_BLOCK_DISPROVEN', block);
    }

    return { ...raw, logging, executor };
  }

  private deepMerge(target: Raw, source: Raw): Raw {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const from = source[key];
      const into = target[key];
      if (from === undefined) continue;
      result[key] = isRecord(from) && isRecord(into) ? this.deepMerge(into, from) : from;
    }
    return result;
  }
}
