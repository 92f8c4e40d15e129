import { logger } from '../../utils/logger.js';
import type { EntitySet } from '../../domain/entities/index.js';
import type { GraphRepository } from '../graph/GraphRepository.interface.js';

export interface GraphLookupResult {
  available: boolean;
  paperIds: Set<string>;
}

const MIN_TERM_LENGTH = 3;

export class GraphLookup {
  constructor(private readonly graphRepo: Pick<GraphRepository, 'findPaperIdsByAuthor' | 'findPaperIdsByTopic'>) {}

  /** Never throws: an unreachable graph yields `available: false`. */
  async findCandidatePaperIds(entities: EntitySet): Promise<GraphLookupResult> {
    const paperIds = new Set<string>();

    try {
      for (const author of entities.authors) {
        for (const id of await this.graphRepo.findPaperIdsByAuthor(author)) {
          paperIds.add(id);
        }
      }

      const terms = [...entities.concepts, ...entities.keywords].filter(term => term.length >= MIN_TERM_LENGTH);
      for (const term of terms) {
        for (const id of await this.graphRepo.findPaperIdsByTopic(term)) {
          paperIds.add(id);
        }
      }
    } catch (error) {
      logger.warn({ error }, 'Graph lookup unavailable, continuing with vector search only');
      return { available: false, paperIds: new Set() };
    }

    logger.debug({ candidates: paperIds.size }, 'Graph lookup');
    return { available: true, paperIds };
  }
}
