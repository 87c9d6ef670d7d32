import type { GraphDB } from '../storage/database.js';
import type { OpenQuestion, Window } from './types.js';
import { isPastWindow } from './windows.js';

export type Successors = ReadonlyMap<string, readonly string[]>;

const edgeKey = (from: string, to: string): string => `${from}\u0000${to}`;

/** Causal successors of every member that are members themselves, earliest first. */
export function causalSuccessors(db: GraphDB, members: readonly string[]): Map<string, string[]> {
  const inSet = new Set(members);
  const successors = new Map<string, string[]>();
  for (const id of members) {
    const next = db
      .getOutgoing(id)
      .filter(link => link.relationship.kind === 'causal' && inSet.has(link.neighborId))
      .map(link => link.neighborId);
    successors.set(id, [...new Set(next)]);
  }
  return successors;
}

export interface ChainBuild {
  chains: string[][];       // Carried chains (extended where possible) plus new ones
  local: string[][];        // Chains touching at least one window document
  linkCount: number;        // Causal edges in the working set ending in the window
}

/**
 * Follow causal edges inside the working set. Carried chains are extended
 * from their tails first; every edge not yet covered then seeds a new chain.
 * A chain longer than `maxLength` keeps its most recent ids.
 */
export function buildChains(
  successors: Successors,
  order: readonly string[],
  carried: readonly string[][],
  windowIds: ReadonlySet<string>,
  maxLength: number
): ChainBuild {
  const covered = new Set<string>();

  const extend = (chain: string[]): string[] => {
    const seen = new Set(chain);
    for (;;) {
      const tail = chain[chain.length - 1];
      if (tail === undefined) return chain;
      const next = (successors.get(tail) ?? []).find(id => !seen.has(id));
      if (next === undefined) return chain;
      covered.add(edgeKey(tail, next));
      seen.add(next);
      chain.push(next);
      if (chain.length > maxLength) chain.shift();
    }
  };

  for (const chain of carried) {
    for (let i = 1; i < chain.length; i++) {
      const from = chain[i - 1];
      const to = chain[i];
      if (from !== undefined && to !== undefined) covered.add(edgeKey(from, to));
    }
  }

  const chains = carried.map(chain => extend([...chain]));

  for (const from of order) {
    for (const to of successors.get(from) ?? []) {
      if (covered.has(edgeKey(from, to))) continue;
      covered.add(edgeKey(from, to));
      chains.push(extend([from, to]));
    }
  }

  let linkCount = 0;
  for (const targets of successors.values()) {
    linkCount += targets.filter(id => windowIds.has(id)).length;
  }

  return {
    chains,
    local: chains.filter(chain => chain.some(id => windowIds.has(id))),
    linkCount,
  };
}

/**
 * A chain is open when its tail has a causal edge to a document past the
 * window that is not in the working set. A single document counts as a
 * chain of one.
 */
export function raiseQuestions(
  db: GraphDB,
  chains: readonly string[][],
  window: Window,
  members: ReadonlySet<string>,
  chunkIndex: number
): OpenQuestion[] {
  const byTail = new Map<string, OpenQuestion>();
  for (const chain of chains) {
    const tail = chain[chain.length - 1];
    if (tail === undefined || byTail.has(tail)) continue;

    const awaiting = db
      .getOutgoing(tail)
      .filter(
        link =>
          link.relationship.kind === 'causal' &&
          !members.has(link.neighborId) &&
          isPastWindow(window, link.neighborTimestamp)
      )
      .map(link => link.neighborId);

    if (awaiting.length > 0) {
      byTail.set(tail, {
        text: `What follows "${tail}"? Awaiting ${awaiting.join(', ')}`,
        chain: [...chain],
        awaiting,
        raisedInChunk: chunkIndex,
      });
    }
  }
  return [...byTail.values()];
}

/** Split carried questions into those answered by the working set and those still open. */
export function resolveQuestions(
  questions: readonly OpenQuestion[],
  members: ReadonlySet<string>
): { resolved: OpenQuestion[]; pending: OpenQuestion[] } {
  const resolved: OpenQuestion[] = [];
  const pending: OpenQuestion[] = [];
  for (const question of questions) {
    (question.awaiting.some(id => members.has(id)) ? resolved : pending).push(question);
  }
  return { resolved, pending };
}
