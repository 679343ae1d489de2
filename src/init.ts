/**
 * rson config:init — scaffold a repository-level rson.json.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { RepoConfig, CONFIG_FILE_NAME, DEFAULT_ENCODE_OPTIONS, DEFAULT_INCLUDE } from './types';

/**
 * Create rson.json at the project root with default settings.
 * Returns the created path relative to `rootDir`.
 */
export async function initRepoConfig(rootDir: string, include: string[] = DEFAULT_INCLUDE): Promise<string> {
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);

  if (await fs.pathExists(configPath)) {
    throw new Error(`Repository config already exists at ${path.relative(rootDir, configPath)}`);
  }

  const config: RepoConfig = {
    include: [...include],
    encode: { ...DEFAULT_ENCODE_OPTIONS },
    comments: 'strip',
  };

  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return path.relative(rootDir, configPath);
}
