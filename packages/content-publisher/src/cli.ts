#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import glob from 'fast-glob';
import { applySchema, toErrorMessage, validateEnvironment, Logger, type ContentKind } from 'shared';
import { ContentPublisher } from './content-publisher.js';
import type { PublishRequest, PublishingResult } from './types.js';

const program = new Command();

function loadConfig() {
  return validateEnvironment(process.env);
}

function getPublisher(): ContentPublisher {
  return new ContentPublisher({ config: loadConfig() });
}

/**
 * Expand glob patterns into content directories; plain paths pass through
 */
async function expandDirectories(patterns: string[]): Promise<string[]> {
  const directories: string[] = [];
  for (const pattern of patterns) {
    if (pattern.includes('*') || pattern.includes('?')) {
      const matches = await glob(pattern, { onlyDirectories: true });
      directories.push(...matches.sort());
    } else {
      directories.push(pattern);
    }
  }
  return directories;
}

async function publishAll(kind: ContentKind, patterns: string[], published: boolean): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logFormat === 'json');
  const publisher = new ContentPublisher({ config, logger });
  const directories = await expandDirectories(patterns);

  if (directories.length === 0) {
    logger.error('No content directories found matching the pattern', { patterns: patterns.join(' ') });
    process.exit(1);
  }

  let failed = 0;
  for (const directory of directories) {
    try {
      const request: PublishRequest = { path: directory, status: published ? 'published' : undefined };
      const result: PublishingResult =
        kind === 'gallery' ? await publisher.publishGallery(request) : await publisher.publish(request);

      console.log(`✅ ${directory} → content ${result.contentId} (${result.status}, ${result.mediaCount} media)`);
    } catch (error) {
      failed++;
      console.error(`❌ ${directory}: ${toErrorMessage(error)}`);
    }
  }

  console.log(`\n📊 ${directories.length - failed} published, ${failed} failed`);
  if (failed > 0) {
    process.exit(1);
  }
}

program
  .name('content')
  .description('Content directory publishing tool')
  .version('0.1.0');

/**
 * Publish command
 */
program
  .command('publish')
  .description('Publish article directories')
  .argument('<dirs...>', 'Content directories or glob patterns')
  .option('-p, --published', 'Publish as published regardless of metadata status')
  .action(async (dirs: string[], options: { published?: boolean }) => {
    try {
      await publishAll('article', dirs, options.published ?? false);
    } catch (error) {
      console.error(`\n💥 Fatal error: ${toErrorMessage(error)}`);
      process.exit(1);
    }
  });

/**
 * Gallery command
 */
program
  .command('gallery')
  .description('Publish image-set directories')
  .argument('<dirs...>', 'Gallery directories or glob patterns')
  .option('-p, --published', 'Publish as published regardless of metadata status')
  .action(async (dirs: string[], options: { published?: boolean }) => {
    try {
      await publishAll('gallery', dirs, options.published ?? false);
    } catch (error) {
      console.error(`\n💥 Fatal error: ${toErrorMessage(error)}`);
      process.exit(1);
    }
  });

/**
 * Validate command
 */
program
  .command('validate')
  .description('Validate content directories without publishing')
  .argument('<dirs...>', 'Content directories or glob patterns')
  .option('--gallery', 'Validate as image-set directories')
  .option('--json', 'Output in JSON format')
  .action(async (dirs: string[], options: { gallery?: boolean; json?: boolean }) => {
    try {
      const directories = await expandDirectories(dirs);
      const validation = await getPublisher().validateDirectories(directories, options.gallery ? 'gallery' : 'article');

      if (options.json) {
        console.log(JSON.stringify(validation, null, 2));
      } else {
        console.log(`🔍 Validation Results:\n`);
        console.log(`✅ Valid: ${validation.valid}`);
        console.log(`❌ Invalid: ${validation.invalid}\n`);

        validation.results.forEach(result => {
          console.log(`${result.valid ? '✅' : '❌'} ${result.path}`);
          if (result.error) {
            console.log(`  Error: ${result.error}`);
          }
        });
      }

      if (validation.invalid > 0) {
        process.exit(1);
      }
    } catch (error) {
      console.error(`❌ Validation failed: ${toErrorMessage(error)}`);
      process.exit(1);
    }
  });

/**
 * Schema bootstrap
 */
program
  .command('init-db')
  .description('Create the content store tables if they are missing')
  .action(async () => {
    try {
      const config = loadConfig();
      await applySchema(config.dbPath);
      console.log(`✅ Schema applied to ${config.dbPath}`);
    } catch (error) {
      console.error(`❌ Schema bootstrap failed: ${toErrorMessage(error)}`);
      process.exit(1);
    }
  });

program.on('command:*', (operands: string[]) => {
  console.error(`❌ Unknown command: ${operands[0]}`);
  console.log('Available commands: publish, gallery, validate, init-db');
  process.exit(1);
});

await program.parseAsync(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
