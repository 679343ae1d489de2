/**
 * Unit tests for RsonProject
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { RsonProject, parseRepoConfig } from './project';
import { RepoConfig } from './types';

describe('RsonProject', () => {
  let testDir: string;
  let project: RsonProject;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rson-test-'));
    project = new RsonProject(testDir);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.remove(testDir);
  });

  async function writeConfig(config: RepoConfig | Record<string, unknown>): Promise<void> {
    await fs.writeFile(path.join(testDir, 'rson.json'), JSON.stringify(config, null, 2));
  }

  describe('Repository Config', () => {
    it('should return an empty config when no rson.json exists', async () => {
      expect(await project.loadRepoConfig()).toEqual({});
    });

    it('should load repo config when it exists', async () => {
      const repoConfig: RepoConfig = {
        include: ['config/**/*.rson'],
        encode: { indent: '    ' },
        comments: 'preserve',
        maxInputBytes: 1024,
      };
      await writeConfig(repoConfig);

      expect(await project.loadRepoConfig()).toEqual(repoConfig);
    });

    it('should warn and fall back to defaults on an invalid file', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await writeConfig({ comments: 'keep' });

      expect(await project.loadRepoConfig()).toEqual({});
      expect(warn).toHaveBeenCalledWith('⚠  Warning: Failed to load rson.json: "comments" must be "strip" or "preserve"');
    });

    it('should warn on malformed JSON', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await fs.writeFile(path.join(testDir, 'rson.json'), 'invalid json {');

      expect(await project.loadRepoConfig()).toEqual({});
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should merge the repo config over the defaults', async () => {
      await writeConfig({ encode: { trailingCommas: false } });

      expect(await project.resolveConfig()).toEqual({
        include: ['**/*.rson'],
        encode: { indent: '  ', multilineThreshold: 4, trailingCommas: false },
        comments: 'strip',
        maxInputBytes: 16 * 1024 * 1024,
      });
    });
  });

  describe('parseRepoConfig', () => {
    it('should ignore unknown keys', () => {
      expect(parseRepoConfig({ comments: 'strip', extra: true })).toEqual({ comments: 'strip' });
    });

    it('should reject values of the wrong type', () => {
      expect(() => parseRepoConfig([])).toThrow('rson.json must contain a JSON object');
      expect(() => parseRepoConfig({ include: 'a.rson' })).toThrow('"include" must be an array of glob patterns');
      expect(() => parseRepoConfig({ maxInputBytes: 0 })).toThrow('"maxInputBytes" must be a positive integer');
      expect(() => parseRepoConfig({ encode: { indent: 'xx' } })).toThrow('"encode.indent" must be a string of spaces or tabs');
      expect(() => parseRepoConfig({ encode: { multilineThreshold: -1 } })).toThrow(
        '"encode.multilineThreshold" must be a non-negative integer'
      );
      expect(() => parseRepoConfig({ encode: { trailingCommas: 'yes' } })).toThrow('"encode.trailingCommas" must be a boolean');
    });
  });

  describe('File discovery', () => {
    it('should match the default include patterns, skipping node_modules', async () => {
      await fs.outputFile(path.join(testDir, 'nested', 'b.rson'), '[]');
      await fs.outputFile(path.join(testDir, 'a.rson'), '[]');
      await fs.outputFile(path.join(testDir, 'node_modules', 'dep', 'c.rson'), '[]');
      await fs.outputFile(path.join(testDir, 'notes.txt'), '[]');

      expect(await project.listFiles()).toEqual(['a.rson', 'nested/b.rson']);
    });

    it('should prefer explicit patterns', async () => {
      await fs.outputFile(path.join(testDir, 'a.rson'), '[]');
      await fs.outputFile(path.join(testDir, 'data.ron'), '[]');

      expect(await project.listFiles(['*.ron'])).toEqual(['data.ron']);
    });
  });

  describe('Formatting', () => {
    beforeEach(async () => {
      await fs.writeFile(path.join(testDir, 'good.rson'), '{b: 1, a: 2}');
      await fs.writeFile(path.join(testDir, 'clean.rson'), '[1, 2]\n');
      await fs.writeFile(path.join(testDir, 'bad.rson'), '[1,');
    });

    it('should report changed and failed files without writing', async () => {
      const summary = await project.formatFiles();

      expect(summary.files).toEqual([
        { path: 'bad.rson', changed: false, error: 'bad.rson:3: Unexpected end of input at byte 3' },
        { path: 'clean.rson', changed: false, output: '[1, 2]\n' },
        { path: 'good.rson', changed: true, output: '{b: 1, a: 2}\n' },
      ]);
      expect(summary.changed).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.written).toBe(0);
      expect(await fs.readFile(path.join(testDir, 'good.rson'), 'utf-8')).toBe('{b: 1, a: 2}');
    });

    it('should rewrite only changed files with write', async () => {
      const summary = await project.formatFiles([], { write: true });

      expect(summary.written).toBe(1);
      expect(await fs.readFile(path.join(testDir, 'good.rson'), 'utf-8')).toBe('{b: 1, a: 2}\n');
      expect(await fs.readFile(path.join(testDir, 'bad.rson'), 'utf-8')).toBe('[1,');
    });

    it('should apply encoder settings from rson.json', async () => {
      await writeConfig({ encode: { multilineThreshold: 1 } });

      expect(await project.formatText('[1, 2]')).toEqual({ ok: true, output: '[\n  1,\n  2,\n]\n' });
    });

    it('should report oversized files and keep formatting the rest', async () => {
      await writeConfig({ maxInputBytes: 16 });
      await fs.writeFile(path.join(testDir, 'big.rson'), '[1, 2, 3, 4, 5, 6]');

      const summary = await project.formatFiles([], { write: true });

      expect(summary.files).toEqual([
        { path: 'bad.rson', changed: false, error: 'bad.rson:3: Unexpected end of input at byte 3' },
        { path: 'big.rson', changed: false, error: 'big.rson: Input is 18 bytes, limit is 16' },
        { path: 'clean.rson', changed: false, output: '[1, 2]\n' },
        { path: 'good.rson', changed: true, output: '{b: 1, a: 2}\n' },
      ]);
      expect(summary.failed).toBe(2);
      expect(summary.written).toBe(1);
      expect(await fs.readFile(path.join(testDir, 'big.rson'), 'utf-8')).toBe('[1, 2, 3, 4, 5, 6]');
      expect(await fs.readFile(path.join(testDir, 'good.rson'), 'utf-8')).toBe('{b: 1, a: 2}\n');
    });

    it('should enforce the configured input limit', async () => {
      await writeConfig({ maxInputBytes: 2 });

      await expect(project.formatText('[1]')).rejects.toThrow('Input is 3 bytes, limit is 2');
    });
  });
});
