import type { Action } from '../rules/types.js';
import type { Goal } from './types.js';

/**
 * Turns a goal into its seed action sequence. Each action in the returned
 * list depends on the one before it.
 */
export interface GoalDecomposer {
  readonly kind: string;
  matches(description: string): boolean;
  decompose(goal: Goal): Action[];
}

const URL_PATTERN = /\bhttps?:\/\/[^\s'"]+|\b[a-z0-9-]+(?:\.[a-z0-9-]+)+(?:\/[^\s'"]*)?/i;
const LEAD_IN = /^\s*(?:please\s+)?(?:browse|navigate|open|visit|go|search|find|look\s+up|extract|scrape|collect)\b(?:\s+(?:to|for|from|on|at))?\s*/i;

/**
 * The first URL-like token, or the description without its leading verb.
 */
export function extractTarget(description: string): string {
  const url = description.match(URL_PATTERN);
  if (url) return url[0];
  const rest = description.replace(LEAD_IN, '').trim().replace(/^['"]|['"]$/g, '');
  return rest.length > 0 ? rest : description.trim();
}

function keywordDecomposer(kind: string, keywords: RegExp, plan: (goal: Goal) => Action[]): GoalDecomposer {
  return { kind, matches: d => keywords.test(d), decompose: plan };
}

export const BROWSE_DECOMPOSER = keywordDecomposer('browse', /\b(browse|navigate|open|visit)\b/i, goal => [
  { name: 'browser.open', params: { url: goal.target } },
]);

export const SEARCH_DECOMPOSER = keywordDecomposer('search', /\b(search|find)\b/i, (goal): Action[] => [
  { name: 'browser.open', params: { url: 'search' } },
  { name: 'browser.fill', params: { selector: '#search', value: goal.target } },
  { name: 'browser.click', params: { selector: '#search-button' } },
]);

export const EXTRACT_DECOMPOSER = keywordDecomposer('extract', /\b(extract|scrape)\b/i, (goal): Action[] => [
  { name: 'browser.open', params: { url: goal.target } },
  { name: 'browser.extract', params: { selector: 'body' } },
  { name: 'filesystem.write', params: { path: 'extracted.txt' } },
]);

export const GENERIC_DECOMPOSER: GoalDecomposer = {
  kind: 'generic',
  matches: () => true,
  decompose: goal => [{ name: 'generic.execute', params: { goal: goal.description } }],
};

/**
 * Ordered decomposer lookup. Registered decomposers are consulted before the
 * built-in ones; the generic decomposer always matches last.
 */
export class GoalDecomposerRegistry {
  private custom: GoalDecomposer[] = [];
  private readonly builtins: GoalDecomposer[] = [BROWSE_DECOMPOSER, SEARCH_DECOMPOSER, EXTRACT_DECOMPOSER];

  constructor(decomposers: GoalDecomposer[] = []) {
    for (const d of decomposers) this.register(d);
  }

  /** Later registrations take precedence over earlier ones */
  register(decomposer: GoalDecomposer): void {
    this.custom.unshift(decomposer);
  }

  parse(description: string): Goal {
    const decomposer = this.match(description);
    return {
      description,
      kind: decomposer.kind,
      target: decomposer.kind === 'generic' ? description.trim() : extractTarget(description),
    };
  }

  decompose(goal: Goal): Action[] {
    const byKind = [...this.custom, ...this.builtins].find(d => d.kind === goal.kind);
    return (byKind ?? GENERIC_DECOMPOSER).decompose(goal);
  }

  private match(description: string): GoalDecomposer {
    return [...this.custom, ...this.builtins].find(d => d.matches(description)) ?? GENERIC_DECOMPOSER;
  }
}

const defaultRegistry = new GoalDecomposerRegistry();

export function parseGoal(description: string): Goal {
  return defaultRegistry.parse(description);
}
