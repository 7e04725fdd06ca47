import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import type { Config, ConfigFile } from "./types.js";
import { DEFAULT_CONFIG, DEFAULT_NAMING_RULES } from "./defaults.js";
import { SOURCE_KINDS } from "../evidence/types.js";
import { ConfigError, errorCode, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const configFileSchema = z.object({
  paths: z
    .object({
      root: z.string(),
      categoryRoots: z.record(z.string()),
      referenceDb: z.string(),
      cacheDir: z.string(),
      quarantine: z.string(),
    })
    .partial(),
  behavior: z
    .object({
      minAutoScore: z.number(),
      alternateProximity: z.number(),
      memoizeNormalization: z.boolean(),
      concurrency: z.number().int(),
    })
    .partial(),
  naming: z
    .object({
      rulesFile: z.string(),
      templates: z.record(z.string()),
    })
    .partial(),
  fields: z
    .object({
      keepCustomTags: z.array(z.string()),
      preferDatesFrom: z.array(z.enum(SOURCE_KINDS)),
    })
    .partial(),
  evidence: z
    .object({
      maxMetadataLookups: z.number().int(),
      similarityThreshold: z.number(),
      fingerprintLength: z.number().int(),
    })
    .partial(),
  fusion: z
    .object({
      durationToleranceSeconds: z.number(),
      durationPenalty: z.number(),
    })
    .partial(),
  api: z
    .object({
      acoustidKey: z.string(),
      musicbrainzUserAgent: z.string(),
      acoustidUrl: z.string(),
      musicbrainzUrl: z.string(),
    })
    .partial(),
  network: z.object({ timeoutMs: z.number() }).partial(),
  llm: z
    .object({
      enabled: z.boolean(),
      provider: z.enum(["ollama", "openai", "openrouter"]),
      model: z.string(),
      apiEndpoint: z.string(),
      apiKey: z.string(),
      maxTokens: z.number().int(),
      temperature: z.number(),
      timeoutMs: z.number(),
    })
    .partial(),
}).partial();

/** Default search locations, after an explicit --config path */
export function defaultConfigPaths(): string[] {
  return [
    path.join(os.homedir(), ".config", "tapetag", "config.json"),
    path.resolve("tapetag.json"),
  ];
}

/**
 * Load config from the first available source:
 * 1. Explicit path (--config flag)
 * 2. ~/.config/tapetag/config.json
 * 3. ./tapetag.json
 *
 * Falls back to defaults if no config found. An explicit path that does not
 * exist, unparseable JSON, or invalid values raise ConfigError.
 */
export async function loadConfig(
  explicitPath?: string,
  searchPaths: string[] = defaultConfigPaths()
): Promise<Readonly<Config>> {
  const candidates = explicitPath ? [expandHome(explicitPath)] : searchPaths;

  for (const candidate of candidates) {
    let content: string;
    try {
      content = await fs.readFile(candidate, "utf-8");
    } catch (e) {
      if (errorCode(e) === "ENOENT" && !explicitPath) continue;
      throw new ConfigError(`Cannot read config ${candidate}: ${errorMessage(e)}`, { cause: e });
    }

    const parsed = parseConfigFile(content, candidate);
    logger.info(`Found config at ${candidate}`);
    return finalizeConfig(mergeConfig(DEFAULT_CONFIG, parsed));
  }

  logger.warn("No config file found; using built-in defaults");
  return finalizeConfig(mergeConfig(DEFAULT_CONFIG, {}));
}

/** Parse and shape-check a config file's text. */
export function parseConfigFile(content: string, source = "config"): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in ${source}: ${errorMessage(e)}`, { cause: e });
  }

  const result = configFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config in ${source}: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Merge a partial config over defaults. Sections merge field by field;
 * categoryRoots and templates merge by key.
 */
export function mergeConfig(defaults: Config, override: ConfigFile): Config {
  return {
    paths: {
      ...defaults.paths,
      ...override.paths,
      categoryRoots: {
        ...defaults.paths.categoryRoots,
        ...override.paths?.categoryRoots,
      },
    },
    behavior: { ...defaults.behavior, ...override.behavior },
    naming: {
      ...defaults.naming,
      ...override.naming,
      templates: {
        ...defaults.naming.templates,
        ...override.naming?.templates,
      },
    },
    fields: { ...defaults.fields, ...override.fields },
    evidence: { ...defaults.evidence, ...override.evidence },
    fusion: { ...defaults.fusion, ...override.fusion },
    api: { ...defaults.api, ...override.api },
    network: { ...defaults.network, ...override.network },
    llm: { ...defaults.llm, ...override.llm },
  };
}

/**
 * Validates the merged configuration
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: Config): void {
  const unit: Array<[string, number]> = [
    ["behavior.minAutoScore", config.behavior.minAutoScore],
    ["behavior.alternateProximity", config.behavior.alternateProximity],
    ["evidence.similarityThreshold", config.evidence.similarityThreshold],
    ["fusion.durationPenalty", config.fusion.durationPenalty],
  ];
  for (const [name, value] of unit) {
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigError(`${name} must be between 0 and 1 (got ${value})`);
    }
  }

  if (config.behavior.concurrency < 1) {
    throw new ConfigError("behavior.concurrency must be at least 1");
  }
  if (config.evidence.maxMetadataLookups < 0) {
    throw new ConfigError("evidence.maxMetadataLookups must not be negative");
  }
  if (config.evidence.fingerprintLength < 1) {
    throw new ConfigError("evidence.fingerprintLength must be at least 1");
  }
  if (config.fusion.durationToleranceSeconds < 0) {
    throw new ConfigError("fusion.durationToleranceSeconds must not be negative");
  }
  if (config.network.timeoutMs <= 0 || config.llm.timeoutMs <= 0) {
    throw new ConfigError("timeouts must be positive");
  }

  const categories = Object.keys(config.paths.categoryRoots);
  if (categories.length === 0) {
    throw new ConfigError("paths.categoryRoots must name at least one category");
  }
  for (const [category, root] of Object.entries(config.paths.categoryRoots)) {
    if (!root.trim() || root.includes("..") || path.isAbsolute(root)) {
      throw new ConfigError(`paths.categoryRoots.${category} must be a relative directory name`);
    }
    if (!config.naming.templates[category]) {
      throw new ConfigError(`naming.templates has no template for category "${category}"`);
    }
  }
  for (const category of Object.keys(config.naming.templates)) {
    if (!categories.includes(category)) {
      throw new ConfigError(
        `naming.templates.${category}: unknown category (expected one of ${categories.join(", ")})`
      );
    }
  }

  for (const pattern of config.fields.keepCustomTags) {
    try {
      new RegExp(pattern, "i");
    } catch (e) {
      throw new ConfigError(`fields.keepCustomTags: invalid pattern "${pattern}": ${errorMessage(e)}`);
    }
  }
  if (config.fields.preferDatesFrom.length === 0) {
    throw new ConfigError("fields.preferDatesFrom must list at least one source");
  }
}

/** Expand a leading ~ to the home directory. */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Resolve an "env:NAME" reference from the environment. Plain values are
 * returned unchanged; an unset variable yields undefined.
 */
export function resolveEnvValue(
  value: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (value === undefined || !value.startsWith("env:")) return value;
  const name = value.slice("env:".length);
  const resolved = env[name];
  if (!resolved) {
    logger.debug(`Environment variable ${name} is not set`);
    return undefined;
  }
  return resolved;
}

function expandOptional(p: string | undefined): string | undefined {
  return p === undefined ? undefined : expandHome(p);
}

/** Validate, resolve env references and ~, then freeze. */
export function finalizeConfig(
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): Readonly<Config> {
  validateConfig(config);
  const resolved: Config = {
    ...config,
    paths: {
      ...config.paths,
      root: expandHome(config.paths.root),
      referenceDb: expandOptional(config.paths.referenceDb),
      cacheDir: expandOptional(config.paths.cacheDir),
      quarantine: expandOptional(config.paths.quarantine),
    },
    naming: {
      ...config.naming,
      rulesFile: expandOptional(config.naming.rulesFile),
    },
    api: {
      ...config.api,
      acoustidKey: resolveEnvValue(config.api.acoustidKey, env),
    },
    llm: {
      ...config.llm,
      apiKey: resolveEnvValue(config.llm.apiKey, env),
    },
  };
  return deepFreeze(resolved);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Load the free-text naming rules. A missing file falls back to the
 * built-in rules; an empty one is a configuration error.
 */
export async function loadNamingRules(config: Readonly<Config>): Promise<string> {
  const rulesFile = config.naming.rulesFile;
  if (!rulesFile) return DEFAULT_NAMING_RULES;

  let text: string;
  try {
    text = await fs.readFile(rulesFile, "utf-8");
  } catch (e) {
    if (errorCode(e) === "ENOENT") {
      logger.warn(`Naming rules file not found at ${rulesFile}; using built-in rules`);
      return DEFAULT_NAMING_RULES;
    }
    throw new ConfigError(`Cannot read naming rules ${rulesFile}: ${errorMessage(e)}`, { cause: e });
  }

  if (!text.trim()) {
    throw new ConfigError(`Naming rules file ${rulesFile} is empty`);
  }
  return text;
}
