import neo4j, { type Driver, type QueryResult, type Session } from 'neo4j-driver';
import type { Neo4jConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { GraphStoreError } from '../../utils/errors.js';
import type { Paper, PaperMetadata, GraphStats } from '../../domain/entities/index.js';
import type { GraphRepository } from './GraphRepository.interface.js';
import {
  FIND_PAPERS_BY_AUTHOR,
  FIND_PAPERS_BY_TOPIC,
  GET_PAPER_METADATA,
  UPSERT_PAPER,
  GRAPH_STATS,
} from './queries/paper-queries.js';
import { toJsNumber, toOptionalString, toStringList } from './utils.js';

export class Neo4jRepository implements GraphRepository {
  private driver: Driver | null = null;

  constructor(private readonly options: Neo4jConfig) {}

  async connect(): Promise<void> {
    try {
      this.driver = neo4j.driver(
        this.options.uri,
        neo4j.auth.basic(this.options.user, this.options.password),
        {
          maxConnectionLifetime: 30 * 60 * 1000,
          maxConnectionPoolSize: 50,
          connectionAcquisitionTimeout: 30 * 1000,
          connectionTimeout: 30 * 1000,
        }
      );
      await this.driver.verifyConnectivity();
      logger.info('Connected to Neo4j');
    } catch (error) {
      logger.error({ error }, 'Failed to connect to Neo4j');
      // Queries on an unverified driver would wait out the acquisition timeout.
      const driver = this.driver;
      this.driver = null;
      await driver?.close();
      throw new GraphStoreError('Neo4j connection failed', error);
    }
  }

  async disconnect(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      logger.info('Disconnected from Neo4j');
    }
  }

  async testConnection(): Promise<boolean> {
    if (!this.driver) return false;
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch {
      return false;
    }
  }

  private getSession(mode: 'READ' | 'WRITE' = 'READ'): Session {
    if (!this.driver) {
      throw new GraphStoreError('Neo4j driver not initialized');
    }
    return this.driver.session({
      database: this.options.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
    });
  }

  private async runWithTimeout(
    session: Session,
    query: string,
    params: Record<string, unknown> = {}
  ): Promise<QueryResult> {
    const timeoutMs = this.options.queryTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new GraphStoreError(`Query timeout after ${timeoutMs}ms`)), timeoutMs);
    });
    try {
      return await Promise.race([session.run(query, params), timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async collectPaperIds(query: string, params: Record<string, unknown>): Promise<string[]> {
    const session = this.getSession();
    try {
      const result = await this.runWithTimeout(session, query, params);
      const ids: string[] = [];
      for (const record of result.records) {
        const paperId: unknown = record.get('paperId');
        if (typeof paperId === 'string') {
          ids.push(paperId);
        }
      }
      return ids;
    } finally {
      await session.close();
    }
  }

  async findPaperIdsByAuthor(author: string): Promise<string[]> {
    try {
      const ids = await this.collectPaperIds(FIND_PAPERS_BY_AUTHOR, { author });
      logger.debug({ author, count: ids.length }, 'Papers by author');
      return ids;
    } catch (error) {
      logger.error({ author, error }, 'Author lookup failed');
      throw new GraphStoreError('Author lookup failed', error);
    }
  }

  async findPaperIdsByTopic(keyword: string): Promise<string[]> {
    try {
      const ids = await this.collectPaperIds(FIND_PAPERS_BY_TOPIC, { keyword });
      logger.debug({ keyword, count: ids.length }, 'Papers by topic');
      return ids;
    } catch (error) {
      logger.error({ keyword, error }, 'Topic lookup failed');
      throw new GraphStoreError('Topic lookup failed', error);
    }
  }

  async getPaperMetadata(paperId: string): Promise<PaperMetadata | null> {
    const session = this.getSession();
    try {
      const result = await this.runWithTimeout(session, GET_PAPER_METADATA, { paperId });
      const record = result.records[0];
      if (!record) {
        return null;
      }

      return {
        id: paperId,
        title: toOptionalString(record.get('title')) ?? '',
        filename: toOptionalString(record.get('filename')) ?? '',
        doi: toOptionalString(record.get('doi')),
        year: toOptionalString(record.get('year')),
        authors: toStringList(record.get('authors')),
        concepts: toStringList(record.get('concepts')),
      };
    } catch (error) {
      logger.error({ paperId, error }, 'Failed to get paper metadata');
      throw new GraphStoreError('Paper metadata retrieval failed', error);
    } finally {
      await session.close();
    }
  }

  async upsertPaper(paper: Paper): Promise<void> {
    const session = this.getSession('WRITE');
    try {
      await this.runWithTimeout(session, UPSERT_PAPER, {
        id: paper.id,
        title: paper.title,
        filename: paper.filename,
        doi: paper.doi ?? '',
        year: paper.year ?? '',
        authors: paper.authors,
        concepts: paper.concepts,
      });
      logger.debug(
        { paperId: paper.id, authors: paper.authors.length, concepts: paper.concepts.length },
        'Upserted paper node'
      );
    } catch (error) {
      logger.error({ paperId: paper.id, error }, 'Failed to upsert paper');
      throw new GraphStoreError('Paper upsert failed', error);
    } finally {
      await session.close();
    }
  }

  async getGraphStats(): Promise<GraphStats> {
    const session = this.getSession();
    try {
      const result = await this.runWithTimeout(session, GRAPH_STATS);
      const record = result.records[0];
      return {
        papers: toJsNumber(record?.get('papers')),
        authors: toJsNumber(record?.get('authors')),
        concepts: toJsNumber(record?.get('concepts')),
      };
    } catch (error) {
      logger.error({ error }, 'Failed to read graph stats');
      throw new GraphStoreError('Graph stats failed', error);
    } finally {
      await session.close();
    }
  }
}
