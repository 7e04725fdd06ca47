import type { SourceKind } from "../evidence/types.js";

/** Destination roots and local data stores */
export interface PathsConfig {
  /** Library root; destinations are built beneath it */
  root: string;
  /** Category name -> directory under root (e.g. "live" -> "Live") */
  categoryRoots: Record<string, string>;
  /** SQLite reference database (read-only). Source disabled when unset. */
  referenceDb?: string;
  /** On-disk response cache directory. Caching disabled when unset. */
  cacheDir?: string;
  /** Holding directory for files that could not be resolved */
  quarantine?: string;
}

export interface BehaviorConfig {
  /** Top fused score below which a proposal is Unresolved (0-1) */
  minAutoScore: number;
  /** Alternates must score within this distance of the top candidate */
  alternateProximity: number;
  /** Reuse normalizer output for identical inputs within one run */
  memoizeNormalization: boolean;
  /** Files proposed in parallel during batch runs */
  concurrency: number;
}

export interface NamingConfig {
  /** Free-text naming rules passed to the normalizer */
  rulesFile?: string;
  /** Per-category destination template; the last segment is the filename */
  templates: Record<string, string>;
}

export interface FieldsConfig {
  /** Tags kept from the original file on rewrite (regex, case-insensitive) */
  keepCustomTags: string[];
  /** Source order used when picking date and place fields */
  preferDatesFrom: SourceKind[];
}

export interface EvidenceConfig {
  /** Upper bound on metadata-service lookups per file */
  maxMetadataLookups: number;
  /** Minimum fuzzy similarity for a reference-database hit (0-1) */
  similarityThreshold: number;
  /** Seconds of audio fed to fpcalc */
  fingerprintLength: number;
}

export interface FusionConfig {
  durationToleranceSeconds: number;
  /** Multiplier (<1) applied on duration mismatch */
  durationPenalty: number;
}

export interface ApiConfig {
  /** AcoustID client key; "env:NAME" is read from the environment */
  acoustidKey?: string;
  musicbrainzUserAgent: string;
  acoustidUrl?: string;
  musicbrainzUrl?: string;
}

export interface NetworkConfig {
  /** Per-call timeout for fingerprint and metadata requests */
  timeoutMs: number;
}

/** LLM provider configuration */
export interface LLMConfig {
  /** When disabled the rule-based normalizer is used */
  enabled: boolean;
  provider: "ollama" | "openai" | "openrouter";
  /** Model name (e.g. "qwen2.5:7b", "google/gemini-2.5-flash") */
  model: string;
  /** API endpoint URL (ollama and self-hosted providers) */
  apiEndpoint?: string;
  /** API key; "env:NAME" is read from the environment */
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs: number;
}

/** Top-level config file schema */
export interface Config {
  paths: PathsConfig;
  behavior: BehaviorConfig;
  naming: NamingConfig;
  fields: FieldsConfig;
  evidence: EvidenceConfig;
  fusion: FusionConfig;
  api: ApiConfig;
  network: NetworkConfig;
  llm: LLMConfig;
}

/** Partial config as read from disk: every section optional, each field optional */
export type ConfigFile = {
  [K in keyof Config]?: Partial<Config[K]>;
};

/** Tag container family, decides the key mapping used on write */
export type TagModel = "vorbis" | "id3v2" | "mp4" | "none";

/**
 * Immutable description of one input file, created once at pipeline entry.
 * Tag keys are upper-cased so lookups are case-insensitive.
 */
export interface AudioFileDescriptor {
  readonly path: string;
  readonly rawFilename: string;
  /** Lower-cased extension including the dot */
  readonly container: string;
  readonly tagModel: TagModel;
  readonly durationSeconds: number | undefined;
  readonly bitrate: number | undefined;
  readonly sampleRate: number | undefined;
  readonly channelCount: number | undefined;
  readonly existingTags: Readonly<Record<string, string>>;
}

/** CLI flags */
export interface CliFlags {
  config?: string;
  "copy-place": boolean;
  quarantine?: string;
  "dry-run": boolean;
  debug: boolean;
}
