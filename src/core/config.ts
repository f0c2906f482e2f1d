import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { RuleLoopConfigSchema, type RuleLoopConfig, type RuleLoopConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Environment variable → [section, key, parser] */
const ENV_BINDINGS: Array<[string, string, string, (raw: string) => unknown]> = [
  ['RULELOOP_LOG_LEVEL', 'logging', 'level', raw => raw],
  ['RULELOOP_LOG_VERBOSE', 'logging', 'verbose', raw => raw === 'true' || raw === '1'],
  ['RULELOOP_LOG_FILE', 'logging', 'file', raw => raw],
  ['RULELOOP_NODE_TIMEOUT_MS', 'engine', 'nodeTimeoutMs', Number],
  ['RULELOOP_MAX_CONCURRENCY', 'engine', 'maxConcurrency', Number],
  ['RULELOOP_ADVISOR_TIMEOUT_MS', 'advisor', 'timeoutMs', Number],
  ['RULELOOP_MAX_PATCHES_PER_WINDOW', 'budget', 'maxPatchesPerWindow', Number],
  ['RULELOOP_MAX_RULE_INCREASE', 'budget', 'maxRuleCountIncrease', Number],
];

export class ConfigManager {
  private config: RuleLoopConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: { projectDir?: string; globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.ruleloop');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RuleLoopConfigInput): RuleLoopConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.ruleloop.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = RuleLoopConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration, loading it on first access
   */
  get(): RuleLoopConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Create a commented default global config if none exists
   */
  createDefaultConfig(): string {
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# ruleloop global configuration
budget:
  maxPatchesPerWindow: 10
  maxRuleCountIncrease: 20

lifecycle:
  decayRate: 0.05
  cooldownThreshold: 0.3
  deprecateAfterCycles: 3

logging:
  level: info
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    let result = raw;
    for (const [name, section, key, parse] of ENV_BINDINGS) {
      const value = this.env[name];
      if (value === undefined || value === '') continue;
      result = this.deepMerge(result, { [section]: { [key]: parse(value) } });
    }
    return result;
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result: RawConfig = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else if (incoming !== undefined) {
        result[key] = incoming;
      }
    }
    return result;
  }
}
