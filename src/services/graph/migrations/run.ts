import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import neo4j from 'neo4j-driver';
import { config } from '../../../config/index.js';
import { logger } from '../../../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const parseCypherStatements = (cypher: string): string[] =>
  cypher
    .split('\n')
    .filter(line => !line.trim().startsWith('//'))
    .join('\n')
    .split(';')
    .map(s => s.trim())
    .filter(s => s.length > 0);

async function runMigrations(): Promise<void> {
  const driver = neo4j.driver(
    config.neo4j.uri,
    neo4j.auth.basic(config.neo4j.user, config.neo4j.password)
  );

  try {
    await driver.verifyConnectivity();
    logger.info('Connected to Neo4j');

    const cypher = await readFile(join(__dirname, 'constraints.cypher'), 'utf-8');
    const statements = parseCypherStatements(cypher);
    const session = driver.session({ database: config.neo4j.database });

    try {
      for (const statement of statements) {
        logger.info({ statement: statement.substring(0, 50) + '...' }, 'Executing');
        await session.run(statement);
      }
      logger.info({ count: statements.length }, 'Migrations completed successfully');
    } finally {
      await session.close();
    }
  } catch (error) {
    logger.error({ error }, 'Migration failed');
    throw error;
  } finally {
    await driver.close();
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runMigrations().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
