/**
 * Cypher for the process graph: (:Step {id, description, seq, process})
 * linked by [:NEXT]. Every read takes $process, which may be null.
 */

const STEP_PROJECTION = `
WITH DISTINCT s
OPTIONAL MATCH (s)-[:NEXT]->(n:Step)
WITH s, n
ORDER BY n.seq, n.id
RETURN s.id AS id, s.description AS description, s.seq AS seq, collect(n.id) AS next
ORDER BY seq, id`;

export const FULL_SCOPE_QUERY = `
MATCH (s:Step)
WHERE $process IS NULL OR s.process = $process
${STEP_PROJECTION}`;

export function buildTaskScopeQuery(hops: number): string {
  if (!Number.isInteger(hops) || hops < 0 || hops > 5) {
    throw new RangeError(`hops must be an integer between 0 and 5, got ${hops}`);
  }
  return `
MATCH (seed:Step)
WHERE ($process IS NULL OR seed.process = $process)
  AND any(keyword IN $keywords WHERE toLower(seed.description) CONTAINS keyword)
MATCH (seed)-[:NEXT*0..${hops}]-(s:Step)
WHERE $process IS NULL OR s.process = $process
${STEP_PROJECTION}`;
}

export const WINDOW_SCOPE_QUERY = `
MATCH (c:Step {id: $cursor})
WHERE $process IS NULL OR c.process = $process
MATCH (c)-[:NEXT*0..1]-(s:Step)
${STEP_PROJECTION}`;

// Prefers a step without predecessor; a fully cyclic process falls back to seq
export const FIRST_STEP_QUERY = `
MATCH (s:Step)
WHERE $process IS NULL OR s.process = $process
WITH s, size([(p:Step)-[:NEXT]->(s) | p]) > 0 AS hasPredecessor
RETURN s.id AS id, s.description AS description
ORDER BY hasPredecessor, s.seq, s.id
LIMIT 1`;

export const CURRENT_STEP_QUERY = `
MATCH (s:Step {id: $cursor})
RETURN s.id AS id, s.description AS description
LIMIT 1`;

export const NEXT_STEP_QUERY = `
MATCH (:Step {id: $cursor})-[:NEXT]->(s:Step)
WHERE $process IS NULL OR s.process = $process
RETURN s.id AS id, s.description AS description
ORDER BY s.seq, s.id
LIMIT 1`;

export const PREVIOUS_STEP_QUERY = `
MATCH (s:Step)-[:NEXT]->(:Step {id: $cursor})
WHERE $process IS NULL OR s.process = $process
RETURN s.id AS id, s.description AS description
ORDER BY s.seq, s.id
LIMIT 1`;

export const STEP_ID_CONSTRAINT = `
CREATE CONSTRAINT step_id_unique IF NOT EXISTS
FOR (s:Step) REQUIRE s.id IS UNIQUE`;

export const MERGE_STEPS = `
UNWIND $steps AS step
MERGE (s:Step {id: step.id})
SET s.description = step.description, s.seq = step.seq, s.process = step.process`;

export const MERGE_NEXT_EDGES = `
UNWIND $edges AS edge
MATCH (a:Step {id: edge.from}), (b:Step {id: edge.to})
MERGE (a)-[:NEXT]->(b)`;
