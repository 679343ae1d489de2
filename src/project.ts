/**
 * rson - Project
 *
 * File-level front end used by the CLI. Loads rson.json, resolves glob
 * patterns, and pushes every file through the memory bridge.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import fg from 'fast-glob';
import { HostBridge, createBridge } from './bridge';
import { RunResult } from './engine';
import { BridgeError, errorMessage } from './errors';
import {
  CommentPolicy,
  EncodeOptions,
  FileReport,
  FormatSummary,
  RepoConfig,
  ResolvedConfig,
  CONFIG_FILE_NAME,
  DEFAULT_ENCODE_OPTIONS,
  DEFAULT_INCLUDE,
  DEFAULT_MAX_INPUT_BYTES,
} from './types';

// ── Config validation ────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCommentPolicy(value: unknown): value is CommentPolicy {
  return value === 'strip' || value === 'preserve';
}

/**
 * Validate parsed rson.json contents. Unknown keys are ignored; known keys
 * with the wrong type are an error.
 */
export function parseRepoConfig(raw: unknown): RepoConfig {
  if (!isRecord(raw)) {
    throw new Error(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }

  const config: RepoConfig = {};

  if (raw.include !== undefined) {
    if (!Array.isArray(raw.include) || !raw.include.every((p): p is string => typeof p === 'string')) {
      throw new Error('"include" must be an array of glob patterns');
    }
    config.include = raw.include;
  }

  if (raw.comments !== undefined) {
    if (!isCommentPolicy(raw.comments)) {
      throw new Error('"comments" must be "strip" or "preserve"');
    }
    config.comments = raw.comments;
  }

  if (raw.maxInputBytes !== undefined) {
    if (typeof raw.maxInputBytes !== 'number' || !Number.isInteger(raw.maxInputBytes) || raw.maxInputBytes <= 0) {
      throw new Error('"maxInputBytes" must be a positive integer');
    }
    config.maxInputBytes = raw.maxInputBytes;
  }

  if (raw.encode !== undefined) {
    if (!isRecord(raw.encode)) {
      throw new Error('"encode" must be an object');
    }
    const encode: Partial<EncodeOptions> = {};
    const { indent, multilineThreshold, trailingCommas } = raw.encode;
    if (indent !== undefined) {
      if (typeof indent !== 'string' || !/^[ \t]*$/.test(indent)) {
        throw new Error('"encode.indent" must be a string of spaces or tabs');
      }
      encode.indent = indent;
    }
    if (multilineThreshold !== undefined) {
      if (typeof multilineThreshold !== 'number' || !Number.isInteger(multilineThreshold) || multilineThreshold < 0) {
        throw new Error('"encode.multilineThreshold" must be a non-negative integer');
      }
      encode.multilineThreshold = multilineThreshold;
    }
    if (trailingCommas !== undefined) {
      if (typeof trailingCommas !== 'boolean') {
        throw new Error('"encode.trailingCommas" must be a boolean');
      }
      encode.trailingCommas = trailingCommas;
    }
    config.encode = encode;
  }

  return config;
}

// ── Project ──────────────────────────────────────────────

export class RsonProject {
  private rootDir: string;
  private repoConfig: RepoConfig | null = null;
  private bridge: HostBridge | null = null;

  constructor(rootDir?: string) {
    this.rootDir = rootDir ?? process.cwd();
  }

  /**
   * Load repository-level configuration from rson.json at the root.
   * Cached after the first load; a missing or invalid file yields {}.
   */
  async loadRepoConfig(): Promise<RepoConfig> {
    if (this.repoConfig !== null) {
      return this.repoConfig;
    }

    const configPath = path.join(this.rootDir, CONFIG_FILE_NAME);

    if (!(await fs.pathExists(configPath))) {
      this.repoConfig = {};
      return this.repoConfig;
    }

    try {
      const raw = await fs.readFile(configPath, 'utf-8');
      this.repoConfig = parseRepoConfig(JSON.parse(raw));
    } catch (err) {
      console.warn(`⚠  Warning: Failed to load ${CONFIG_FILE_NAME}: ${errorMessage(err)}`);
      this.repoConfig = {};
    }
    return this.repoConfig;
  }

  /**
   * Repo config merged over the defaults.
   */
  async resolveConfig(): Promise<ResolvedConfig> {
    const repoConfig = await this.loadRepoConfig();
    return {
      include: repoConfig.include ?? DEFAULT_INCLUDE,
      encode: { ...DEFAULT_ENCODE_OPTIONS, ...(repoConfig.encode ?? {}) },
      comments: repoConfig.comments ?? 'strip',
      maxInputBytes: repoConfig.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES,
    };
  }

  // ── Discovery ────────────────────────────────────────────

  /**
   * Resolve glob patterns relative to the root. Falls back to the
   * configured `include` patterns when none are given.
   */
  async listFiles(patterns: string[] = []): Promise<string[]> {
    const config = await this.resolveConfig();
    const matched = await fg(patterns.length > 0 ? patterns : config.include, {
      cwd: this.rootDir,
      onlyFiles: true,
      dot: false,
      ignore: ['**/node_modules/**'],
    });
    return matched.map(p => p.replace(/\\/g, '/')).sort();
  }

  // ── Formatting ───────────────────────────────────────────

  /**
   * Format one text through the memory bridge.
   */
  async formatText(text: string): Promise<RunResult> {
    const bridge = await this.getBridge();
    return bridge.run(text);
  }

  /**
   * Format every matched file. With `write`, changed files are rewritten
   * in place; files that fail to parse or cross the bridge are reported and
   * never touched.
   */
  async formatFiles(patterns: string[] = [], opts: { write?: boolean } = {}): Promise<FormatSummary> {
    const files = await this.listFiles(patterns);
    const reports: FileReport[] = [];
    let written = 0;

    for (const relPath of files) {
      const absPath = path.join(this.rootDir, relPath);
      const original = await fs.readFile(absPath, 'utf-8');
      let result: RunResult;
      try {
        result = await this.formatText(original);
      } catch (err) {
        if (!(err instanceof BridgeError)) throw err;
        reports.push({ path: relPath, changed: false, error: `${relPath}: ${err.message}` });
        continue;
      }

      if (!result.ok) {
        reports.push({ path: relPath, changed: false, error: `${relPath}:${result.error.offset}: ${result.error.message}` });
        continue;
      }

      const changed = result.output !== original;
      if (changed && opts.write) {
        await fs.writeFile(absPath, result.output, 'utf-8');
        written++;
      }
      reports.push({ path: relPath, changed, output: result.output });
    }

    return {
      files: reports,
      changed: reports.filter(r => r.changed).length,
      failed: reports.filter(r => r.error !== undefined).length,
      written,
    };
  }

  private async getBridge(): Promise<HostBridge> {
    if (this.bridge === null) {
      const config = await this.resolveConfig();
      this.bridge = createBridge({
        encode: config.encode,
        comments: config.comments,
        maxInputBytes: config.maxInputBytes,
      });
    }
    return this.bridge;
  }
}
