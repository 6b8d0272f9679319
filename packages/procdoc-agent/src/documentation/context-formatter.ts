import {
  ContextBlock,
  GraphQueryResult,
  NoDocumentation,
  ProcessStep,
  TextDocumentation,
} from './documentation.types';

export const NO_MATCHING_DOCUMENTATION =
  'No matching process documentation found.';

export type FormattableDocumentation =
  | NoDocumentation
  | TextDocumentation
  | GraphQueryResult;

/**
 * Collapses runs of blanks, strips trailing whitespace, normalizes line
 * endings and squeezes blank lines. Applying it twice changes nothing.
 */
export function normalizeDocumentationText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v]+/g, ' ').trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Orders steps so every step comes after its predecessors. Ties go to the
 * lower seq, then to the earlier position in the input. Steps caught in a
 * cycle are appended in the same tie order.
 */
export function linearizeProcessSteps(steps: ProcessStep[]): ProcessStep[] {
  const unique = new Map<string, { step: ProcessStep; position: number }>();
  steps.forEach((step, position) => {
    if (!unique.has(step.id)) {
      unique.set(step.id, { step, position });
    }
  });

  const indegree = new Map<string, number>();
  for (const id of unique.keys()) {
    indegree.set(id, 0);
  }
  for (const { step } of unique.values()) {
    for (const next of new Set(step.next)) {
      const current = indegree.get(next);
      if (current !== undefined && next !== step.id) {
        indegree.set(next, current + 1);
      }
    }
  }

  const compare = (a: string, b: string): number => {
    const left = unique.get(a);
    const right = unique.get(b);
    if (!left || !right) {
      return 0;
    }
    return left.step.seq - right.step.seq || left.position - right.position;
  };

  const ready = [...unique.keys()].filter((id) => indegree.get(id) === 0);
  const ordered: ProcessStep[] = [];
  const placed = new Set<string>();

  while (ready.length > 0) {
    ready.sort(compare);
    const id = ready.shift();
    const entry = id === undefined ? undefined : unique.get(id);
    if (!entry) {
      break;
    }
    ordered.push(entry.step);
    placed.add(entry.step.id);

    for (const next of new Set(entry.step.next)) {
      const current = indegree.get(next);
      if (current === undefined || next === entry.step.id) {
        continue;
      }
      indegree.set(next, current - 1);
      if (current - 1 === 0) {
        ready.push(next);
      }
    }
  }

  const cyclic = [...unique.keys()]
    .filter((id) => !placed.has(id))
    .sort(compare);
  for (const id of cyclic) {
    const entry = unique.get(id);
    if (entry) {
      ordered.push(entry.step);
    }
  }

  return ordered;
}

function renderSteps(result: GraphQueryResult): string {
  const ordered = linearizeProcessSteps(result.steps);
  const included = new Set(ordered.map((step) => step.id));
  const predecessors = new Map<string, string[]>();
  for (const step of ordered) {
    for (const next of step.next) {
      if (included.has(next) && next !== step.id) {
        const list = predecessors.get(next) ?? [];
        if (!list.includes(step.id)) {
          list.push(step.id);
        }
        predecessors.set(next, list);
      }
    }
  }

  const lines = [
    `Process steps (${ordered.length}, scope: ${result.scope}), in execution order:`,
  ];
  ordered.forEach((step, index) => {
    const marker = step.id === result.cursor ? ' (current)' : '';
    const description = normalizeDocumentationText(step.description).replace(
      /\n+/g,
      ' ',
    );
    lines.push(`${index + 1}. [${step.id}]${marker} ${description}`.trimEnd());

    const after = predecessors.get(step.id) ?? [];
    if (after.length > 0) {
      lines.push(`   after: ${after.join(', ')}`);
    }
    const then = [...new Set(step.next)];
    if (then.length > 0) {
      lines.push(`   then: ${then.join(', ')}`);
    }
  });
  return lines.join('\n');
}

/**
 * Renders documentation into the text block the model sees. Pure: equal
 * inputs give equal output.
 */
export function formatContext(
  documentation: FormattableDocumentation,
): ContextBlock {
  switch (documentation.kind) {
    case 'none':
      return { source: 'none', text: '' };
    case 'text':
      return {
        source: 'text',
        text: normalizeDocumentationText(documentation.content),
      };
    case 'graph-query':
      return {
        source: 'graph',
        text:
          documentation.steps.length === 0
            ? NO_MATCHING_DOCUMENTATION
            : renderSteps(documentation),
      };
  }
}
