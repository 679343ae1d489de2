/**
 * rson - Configuration and option types
 */

// ── Encoder options ─────────────────────────────────────

export interface EncodeOptions {
  /** Indentation unit for multi-line containers (default: two spaces) */
  indent: string;
  /** Containers with more elements than this are laid out one element per line */
  multilineThreshold: number;
  /** Emit a comma after the last element of a multi-line container */
  trailingCommas: boolean;
}

/**
 * What happens to comments between lexing and encoding:
 *   - "strip":    comments are dropped by the lexer (default)
 *   - "preserve": comments are kept and re-emitted before the element they precede
 */
export type CommentPolicy = 'strip' | 'preserve';

export interface EngineOptions {
  encode?: Partial<EncodeOptions>;
  comments?: CommentPolicy;
}

// ── Repository-level configuration ──────────────────────

/**
 * Repository-level configuration file (rson.json at project root).
 */
export interface RepoConfig {
  /** Glob patterns used when `rson fmt` is called without arguments */
  include?: string[];
  /** Encoder settings */
  encode?: Partial<EncodeOptions>;
  /** Comment policy (default: "strip") */
  comments?: CommentPolicy;
  /** Inputs larger than this many bytes are rejected before crossing the bridge */
  maxInputBytes?: number;
}

/**
 * Repo config after merging with defaults.
 */
export interface ResolvedConfig {
  include: string[];
  encode: EncodeOptions;
  comments: CommentPolicy;
  maxInputBytes: number;
}

// ── Results ─────────────────────────────────────────────

export interface FileReport {
  /** Path relative to the engine root (forward slashes) */
  path: string;
  /** True when the formatted output differs from the file contents */
  changed: boolean;
  /** Formatted text, absent when the file failed to parse */
  output?: string;
  /** Positioned error, present when the file failed to parse */
  error?: string;
}

export interface FormatSummary {
  files: FileReport[];
  changed: number;
  failed: number;
  written: number;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_ENCODE_OPTIONS: EncodeOptions = {
  indent: '  ',
  multilineThreshold: 4,
  trailingCommas: true,
};

/** 16 MiB */
export const DEFAULT_MAX_INPUT_BYTES = 16 * 1024 * 1024;

export const DEFAULT_INCLUDE = ['**/*.rson'];

export const CONFIG_FILE_NAME = 'rson.json';
