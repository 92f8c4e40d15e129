export const FIND_PAPERS_BY_AUTHOR = `
  MATCH (p:Paper)-[:WRITTEN_BY]->(a:Author)
  WHERE toLower(a.name) CONTAINS toLower($author)
  RETURN DISTINCT p.id AS paperId
`;

export const FIND_PAPERS_BY_TOPIC = `
  MATCH (p:Paper)-[:ABOUT]->(c:Concept)
  WHERE toLower(c.name) CONTAINS toLower($keyword)
  RETURN p.id AS paperId
  UNION
  MATCH (p:Paper)
  WHERE toLower(p.title) CONTAINS toLower($keyword)
  RETURN p.id AS paperId
`;

export const GET_PAPER_METADATA = `
  MATCH (p:Paper {id: $paperId})
  OPTIONAL MATCH (p)-[:WRITTEN_BY]->(a:Author)
  OPTIONAL MATCH (p)-[:ABOUT]->(c:Concept)
  RETURN p.id AS id, p.title AS title, p.filename AS filename, p.doi AS doi, p.year AS year,
         collect(DISTINCT a.name) AS authors,
         collect(DISTINCT c.name) AS concepts
`;

export const UPSERT_PAPER = `
  MERGE (p:Paper {id: $id})
  SET p.title = $title,
      p.filename = $filename,
      p.doi = $doi,
      p.year = $year
  WITH p
  OPTIONAL MATCH (p)-[old:WRITTEN_BY|ABOUT]->()
  DELETE old
  WITH DISTINCT p
  FOREACH (name IN $authors |
    MERGE (a:Author {name: name})
    MERGE (p)-[:WRITTEN_BY]->(a))
  FOREACH (name IN $concepts |
    MERGE (c:Concept {name: name})
    MERGE (p)-[:ABOUT]->(c))
`;

export const GRAPH_STATS = `
  CALL { MATCH (p:Paper) RETURN count(p) AS papers }
  CALL { MATCH (a:Author) RETURN count(a) AS authors }
  CALL { MATCH (c:Concept) RETURN count(c) AS concepts }
  RETURN papers, authors, concepts
`;
