#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { createContainer } from '../container.js';
import { manifestSchema } from '../services/ingestion/types.js';
import { indexManifest } from '../services/ingestion/ManifestIndexer.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import { formatManifestSummary } from './format.js';

const HELP = `
Index already-extracted papers into the graph and vector stores

Usage:
  npm run index-papers -- --manifest <file.json> [--format table|json]

The manifest is {"papers": [{"filename", "text", "title"?, "year"?, "doi"?, "authors"?, "concepts"?}]}.
`;

interface CliArgs {
  manifest?: string;
  format: 'table' | 'json';
  help?: boolean;
}

const parseArgs = (): CliArgs => {
  const argv = process.argv.slice(2);
  const args: CliArgs = { format: 'table' };
  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--manifest':
        args.manifest = argv[++i];
        break;
      case '--format':
        args.format = argv[++i] === 'json' ? 'json' : 'table';
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }
  return args;
};

const main = async (): Promise<void> => {
  const args = parseArgs();
  if (args.help) {
    console.log(HELP);
    return;
  }
  if (!args.manifest) {
    console.error('Error: --manifest is required');
    console.log(HELP);
    process.exitCode = 1;
    return;
  }

  const manifest = manifestSchema.parse(JSON.parse(await readFile(args.manifest, 'utf-8')));
  const reporter = new ProgressReporter(args.format !== 'json');
  const container = await createContainer(config);

  try {
    logger.info({ manifest: args.manifest, papers: manifest.papers.length }, 'Starting manifest indexing');
    const summary = await indexManifest(container.paperIndexer, manifest.papers, progress =>
      reporter.update(progress)
    );
    reporter.complete(`Indexed ${summary.indexed.length}/${summary.total} papers`);

    console.log(args.format === 'json' ? JSON.stringify(summary, null, 2) : formatManifestSummary(summary));
    if (summary.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await container.close();
  }
};

main().catch(error => {
  logger.error({ error }, 'index-papers failed');
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
