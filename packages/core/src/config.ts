/**
 * Configuration loader for store-router
 * Loads config from: defaults -> store-router.config.json -> SR_* environment variables
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import {
  CONFIG_FILE_NAME,
  CORPORA_DIR_NAME,
  DEFAULT_CONCURRENCY,
  DEFAULT_CONSISTENCY_RUNS,
  DEFAULT_CORPUS_FILE,
  DEFAULT_EXTRACTOR,
  DEFAULT_LLM,
  DEFAULT_MATCH_MODE,
  DEFAULT_RULE_SET_NAME,
  DEFAULT_RULE_SET_VERSION,
  DEFAULT_STRICT_SHADOWING,
  DEFAULT_THRESHOLD,
  RULES_DIR_NAME,
  VALID_EXTRACTORS,
  VALID_LLM_PROVIDERS,
  VALID_MATCH_MODES,
} from './constants.js';
import type {
  ExtractorKind,
  ILlmConfig,
  IStoreRouterConfig,
  LlmProvider,
  MatchMode,
} from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('config');

type PartialConfig = Partial<Omit<IStoreRouterConfig, 'llm'>> & { llm?: Partial<ILlmConfig> };

/**
 * Locate a directory shipped with the core package (rules/, corpora/, data/)
 */
export function getBundledPath(...segments: string[]): string {
  const baseDir = path.dirname(fileURLToPath(import.meta.url));

  const candidates = [
    // Source (src/config.ts) and built (dist/config.js) both sit one level below the package root
    path.resolve(baseDir, '..', ...segments),
    // Built with nested output (dist/src/config.js)
    path.resolve(baseDir, '..', '..', ...segments),
    // Fallback for unusual launch contexts
    path.resolve(process.cwd(), ...segments),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  return candidates[0];
}

/**
 * Get the default configuration values
 */
export function getDefaultConfig(): IStoreRouterConfig {
  return {
    rulesDir: getBundledPath(RULES_DIR_NAME),
    overrideRulesDir: '',
    ruleSetName: DEFAULT_RULE_SET_NAME,
    ruleSetVersion: DEFAULT_RULE_SET_VERSION,
    corpusPath: getBundledPath(CORPORA_DIR_NAME, DEFAULT_CORPUS_FILE),
    threshold: DEFAULT_THRESHOLD,
    strictShadowing: DEFAULT_STRICT_SHADOWING,
    consistencyRuns: DEFAULT_CONSISTENCY_RUNS,
    concurrency: DEFAULT_CONCURRENCY,
    matchMode: DEFAULT_MATCH_MODE,
    extractor: DEFAULT_EXTRACTOR,
    llm: { ...DEFAULT_LLM },
  };
}

function validateMatchMode(value: string): MatchMode | undefined {
  return VALID_MATCH_MODES.find((mode) => mode === value);
}

function validateExtractor(value: string): ExtractorKind | undefined {
  return VALID_EXTRACTORS.find((kind) => kind === value);
}

function validateProvider(value: string): LlmProvider | undefined {
  return VALID_LLM_PROVIDERS.find((provider) => provider === value);
}

function sanitizeThreshold(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  return value >= 0 && value <= 1 ? value : undefined;
}

/**
 * Normalize a positive integer setting; anything else is ignored
 */
function sanitizePositiveInt(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  const normalized = Math.floor(value);
  return normalized >= 1 ? normalized : undefined;
}

/**
 * Parse a boolean string value
 */
function parseBoolean(value: string): boolean | undefined {
  const normalized = value.toLowerCase().trim();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return undefined;
}

function parseNumber(value: string): number | undefined {
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function resolvePath(projectDir: string, value: string | undefined): string | undefined {
  if (value === undefined || value === '') return value;
  return path.resolve(projectDir, value);
}

/**
 * Keep well-typed fields of a raw config object; invalid values are dropped one by one
 */
function normalizeConfig(rawConfig: Record<string, unknown>, projectDir: string): PartialConfig {
  const readString = (value: unknown): string | undefined =>
    typeof value === 'string' ? value : undefined;
  const readNumber = (value: unknown): number | undefined =>
    typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
  const readBoolean = (value: unknown): boolean | undefined =>
    typeof value === 'boolean' ? value : undefined;
  const readObject = (value: unknown): Record<string, unknown> | undefined =>
    value !== null && typeof value === 'object' && !Array.isArray(value)
      ? Object.fromEntries(Object.entries(value))
      : undefined;

  const normalized: PartialConfig = {
    rulesDir: resolvePath(projectDir, readString(rawConfig.rulesDir)),
    overrideRulesDir: resolvePath(projectDir, readString(rawConfig.overrideRulesDir)),
    ruleSetName: readString(rawConfig.ruleSetName),
    ruleSetVersion: readString(rawConfig.ruleSetVersion),
    corpusPath: resolvePath(projectDir, readString(rawConfig.corpusPath)),
    threshold: sanitizeThreshold(readNumber(rawConfig.threshold)),
    strictShadowing: readBoolean(rawConfig.strictShadowing),
    consistencyRuns: sanitizePositiveInt(readNumber(rawConfig.consistencyRuns)),
    concurrency: sanitizePositiveInt(readNumber(rawConfig.concurrency)),
    matchMode: validateMatchMode(readString(rawConfig.matchMode) ?? ''),
    extractor: validateExtractor(readString(rawConfig.extractor) ?? ''),
  };

  const rawLlm = readObject(rawConfig.llm);
  if (rawLlm) {
    normalized.llm = {
      provider: validateProvider(readString(rawLlm.provider) ?? ''),
      model: readString(rawLlm.model),
      baseUrl: readString(rawLlm.baseUrl),
      maxTokens: sanitizePositiveInt(readNumber(rawLlm.maxTokens)),
      temperature: readNumber(rawLlm.temperature),
    };
  }

  return normalized;
}

/**
 * Load configuration from a JSON file
 */
function loadConfigFile(configPath: string, projectDir: string): PartialConfig | null {
  try {
    if (!fs.existsSync(configPath)) {
      return null;
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);
    if (rawConfig === null || typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
      log.warn('Config file is not a JSON object; using defaults', { path: configPath });
      return null;
    }

    return normalizeConfig(Object.fromEntries(Object.entries(rawConfig)), projectDir);
  } catch (error) {
    // If file exists but can't be parsed, warn but don't fail
    log.warn('Could not parse config file; using defaults', {
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function loadEnvConfig(projectDir: string): PartialConfig {
  const env = process.env;
  const envConfig: PartialConfig = {};

  if (env.SR_RULES_DIR) envConfig.rulesDir = resolvePath(projectDir, env.SR_RULES_DIR);
  if (env.SR_OVERRIDE_RULES_DIR) {
    envConfig.overrideRulesDir = resolvePath(projectDir, env.SR_OVERRIDE_RULES_DIR);
  }
  if (env.SR_RULE_SET_NAME) envConfig.ruleSetName = env.SR_RULE_SET_NAME;
  if (env.SR_RULE_SET_VERSION) envConfig.ruleSetVersion = env.SR_RULE_SET_VERSION;
  if (env.SR_CORPUS) envConfig.corpusPath = resolvePath(projectDir, env.SR_CORPUS);

  if (env.SR_THRESHOLD) {
    envConfig.threshold = sanitizeThreshold(parseNumber(env.SR_THRESHOLD));
  }
  if (env.SR_STRICT_SHADOWING) {
    envConfig.strictShadowing = parseBoolean(env.SR_STRICT_SHADOWING);
  }
  if (env.SR_CONSISTENCY_RUNS) {
    envConfig.consistencyRuns = sanitizePositiveInt(parseNumber(env.SR_CONSISTENCY_RUNS));
  }
  if (env.SR_CONCURRENCY) {
    envConfig.concurrency = sanitizePositiveInt(parseNumber(env.SR_CONCURRENCY));
  }
  if (env.SR_MATCH_MODE) envConfig.matchMode = validateMatchMode(env.SR_MATCH_MODE);
  if (env.SR_EXTRACTOR) envConfig.extractor = validateExtractor(env.SR_EXTRACTOR);

  const llm: Partial<ILlmConfig> = {};
  if (env.SR_LLM_PROVIDER) llm.provider = validateProvider(env.SR_LLM_PROVIDER);
  if (env.SR_LLM_MODEL) llm.model = env.SR_LLM_MODEL;
  if (env.SR_LLM_BASE_URL) llm.baseUrl = env.SR_LLM_BASE_URL;
  if (env.SR_LLM_MAX_TOKENS) llm.maxTokens = sanitizePositiveInt(parseNumber(env.SR_LLM_MAX_TOKENS));
  if (env.SR_LLM_TEMPERATURE) llm.temperature = parseNumber(env.SR_LLM_TEMPERATURE);
  if (Object.keys(llm).length > 0) envConfig.llm = llm;

  return envConfig;
}

/**
 * Last defined value wins
 */
function pick<T>(base: T, ...layers: Array<T | undefined>): T {
  let value = base;
  for (const layer of layers) {
    if (layer !== undefined) value = layer;
  }
  return value;
}

/**
 * Merge configuration layers. Environment values take precedence over file values.
 */
function mergeConfigs(
  base: IStoreRouterConfig,
  fileConfig: PartialConfig | null,
  envConfig: PartialConfig,
): IStoreRouterConfig {
  const file = fileConfig ?? {};
  const env = envConfig;

  return {
    rulesDir: pick(base.rulesDir, file.rulesDir, env.rulesDir),
    overrideRulesDir: pick(base.overrideRulesDir, file.overrideRulesDir, env.overrideRulesDir),
    ruleSetName: pick(base.ruleSetName, file.ruleSetName, env.ruleSetName),
    ruleSetVersion: pick(base.ruleSetVersion, file.ruleSetVersion, env.ruleSetVersion),
    corpusPath: pick(base.corpusPath, file.corpusPath, env.corpusPath),
    threshold: pick(base.threshold, file.threshold, env.threshold),
    strictShadowing: pick(base.strictShadowing, file.strictShadowing, env.strictShadowing),
    consistencyRuns: pick(base.consistencyRuns, file.consistencyRuns, env.consistencyRuns),
    concurrency: pick(base.concurrency, file.concurrency, env.concurrency),
    matchMode: pick(base.matchMode, file.matchMode, env.matchMode),
    extractor: pick(base.extractor, file.extractor, env.extractor),
    llm: {
      provider: pick(base.llm.provider, file.llm?.provider, env.llm?.provider),
      model: pick(base.llm.model, file.llm?.model, env.llm?.model),
      baseUrl: pick(base.llm.baseUrl, file.llm?.baseUrl, env.llm?.baseUrl),
      maxTokens: pick(base.llm.maxTokens, file.llm?.maxTokens, env.llm?.maxTokens),
      temperature: pick(base.llm.temperature, file.llm?.temperature, env.llm?.temperature),
    },
  };
}

/**
 * Load store-router configuration for a project directory
 */
export function loadConfig(projectDir: string): IStoreRouterConfig {
  const defaults = getDefaultConfig();
  const fileConfig = loadConfigFile(path.join(projectDir, CONFIG_FILE_NAME), projectDir);
  const envConfig = loadEnvConfig(projectDir);
  return mergeConfigs(defaults, fileConfig, envConfig);
}
