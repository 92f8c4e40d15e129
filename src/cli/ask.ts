#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { createContainer } from '../container.js';
import type { QueryService } from '../services/query/QueryService.js';
import { formatQueryResult } from './format.js';

const HELP = `
Ask questions over the indexed paper collection

Usage:
  npm run ask -- [--question "<text>"]

Options:
  --question <text>  Ask a single question and exit
  --help             Show this help message

Without --question an interactive session starts; type "exit" or "quit" to leave.
`;

const EXIT_WORDS = new Set(['exit', 'quit']);

const parseArgs = (): { question?: string; help?: boolean } => {
  const argv = process.argv.slice(2);
  const args: { question?: string; help?: boolean } = {};
  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--question':
      case '-q':
        args.question = argv[++i];
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }
  return args;
};

const interactive = async (queryService: QueryService): Promise<void> => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log('Interactive mode. Type "exit" to quit.\n');

  try {
    while (true) {
      const question = (await rl.question('Question: ')).trim();
      if (EXIT_WORDS.has(question.toLowerCase())) break;
      if (!question) continue;

      try {
        console.log(formatQueryResult(await queryService.ask({ question })));
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
      }
    }
  } finally {
    rl.close();
  }
};

const main = async (): Promise<void> => {
  const args = parseArgs();
  if (args.help) {
    console.log(HELP);
    return;
  }

  const container = await createContainer(config);
  try {
    if (args.question) {
      console.log(formatQueryResult(await container.queryService.ask({ question: args.question })));
    } else {
      await interactive(container.queryService);
    }
  } finally {
    await container.close();
  }
};

main().catch(error => {
  logger.error({ error }, 'ask failed');
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
