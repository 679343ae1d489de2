#!/usr/bin/env node

/**
 * rson — CLI for formatting and checking rson documents.
 *
 * Commands:
 *   rson fmt [patterns...]        Print canonical text for matching files
 *   rson fmt --write              Rewrite files in place
 *   rson fmt --check              Exit 1 if any file is not canonical
 *   rson fmt --stdin              Format standard input
 *   rson check [patterns...]      Report parse errors
 *   rson config:init              Create repository-level config
 */

import { Command } from 'commander';
import * as fs from 'fs-extra';
import { RsonProject } from './project';
import { initRepoConfig } from './init';
import { errorMessage } from './errors';
import { FormatSummary } from './types';

const pkg = require('../package.json');
const program = new Command();

program
  .name('rson')
  .description('Parse and canonically re-encode rson documents')
  .version(pkg.version);

// ── fmt ────────────────────────────────────────────────────

program
  .command('fmt [patterns...]')
  .description('Format files matching the given globs (default: "include" from rson.json)')
  .option('-w, --write', 'Rewrite changed files in place')
  .option('-c, --check', 'Exit with status 1 when any file is not canonical')
  .option('--stdin', 'Read a single document from standard input')
  .action(async (patterns: string[], opts: { write?: boolean; check?: boolean; stdin?: boolean }) => {
    const project = new RsonProject();

    try {
      if (opts.stdin) {
        const input = fs.readFileSync(0, 'utf-8');
        const result = await project.formatText(input);
        if (!result.ok) {
          console.error(`❌ <stdin>:${result.error.offset}: ${result.error.message}`);
          process.exit(1);
        }
        process.stdout.write(result.output);
        return;
      }

      const summary = await project.formatFiles(patterns, { write: opts.write });
      if (summary.files.length === 0) {
        console.log('No matching files.');
        return;
      }

      printErrors(summary);

      if (opts.check) {
        const unformatted = summary.files.filter(f => f.changed);
        unformatted.forEach(f => console.log(`  ⚠  ${f.path}`));
        if (unformatted.length > 0 || summary.failed > 0) {
          console.log(`\n❌ ${unformatted.length} file(s) not canonical, ${summary.failed} failed to parse`);
          process.exit(1);
        }
        console.log(`✅ ${summary.files.length} file(s) already canonical`);
        return;
      }

      if (opts.write) {
        console.log(`✅ Formatted ${summary.files.length} file(s), rewrote ${summary.written}`);
      } else {
        for (const file of summary.files) {
          if (file.output === undefined) continue;
          if (summary.files.length > 1) console.log(`// ${file.path}`);
          process.stdout.write(file.output);
        }
      }

      if (summary.failed > 0) process.exit(1);
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exit(1);
    }
  });

// ── check ──────────────────────────────────────────────────

program
  .command('check [patterns...]')
  .description('Check that files parse, reporting the first error in each')
  .action(async (patterns: string[]) => {
    const project = new RsonProject();

    try {
      const summary = await project.formatFiles(patterns);
      printErrors(summary);

      if (summary.failed > 0) {
        console.log(`\n❌ ${summary.failed} of ${summary.files.length} file(s) failed to parse`);
        process.exit(1);
      }
      console.log(`✅ ${summary.files.length} file(s) parsed`);
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exit(1);
    }
  });

// ── config:init ────────────────────────────────────────────

program
  .command('config:init')
  .description('Create a repository-level config file (rson.json)')
  .action(async () => {
    try {
      const created = await initRepoConfig(process.cwd());

      console.log(`\n✅ Repository config created!\n`);
      console.log(`Created: ${created}\n`);
      console.log('Default settings:');
      console.log('  - include: ["**/*.rson"]');
      console.log('  - encode: { indent: "  ", multilineThreshold: 4, trailingCommas: true }');
      console.log('  - comments: "strip"\n');
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exit(1);
    }
  });

// ── helpers ────────────────────────────────────────────────

function printErrors(summary: FormatSummary): void {
  for (const file of summary.files) {
    if (file.error !== undefined) console.error(`❌ ${file.error}`);
  }
}

// ── go ─────────────────────────────────────────────────────

program.parseAsync().catch(err => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
