import { InvalidArgumentError, NoPathError, NotFoundError } from '../errors.js';
import type { Instant } from '../temporal/timestamp.js';
import type { GraphDB, NeighborDirection } from '../storage/database.js';
import type {
  CancelledMarker,
  Document,
  PathOptions,
  PathResult,
  ReachabilityOptions,
  ReachabilityResult,
  ReachableDocument,
} from '../types/index.js';

const DEFAULT_REACH_HOPS = 5;
const DEFAULT_MAX_RESULTS = 50;
const DEFAULT_PATH_HOPS = 10;

type Direction = ReachabilityResult['direction'];

function cancelledAt(completed: number, signal: AbortSignal): CancelledMarker {
  const reason: unknown = signal.reason;
  return {
    kind: 'Cancelled',
    stage: 'hop',
    completed,
    ...(reason instanceof Error ? { reason: reason.message } : typeof reason === 'string' ? { reason } : {}),
  };
}

function requireCount(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

/**
 * Bounded breadth-first search over the temporal graph.
 *
 * Reachability walks one hop level at a time and checks the cancellation
 * signal between levels. Each document is visited at most once, so cycles
 * terminate.
 */
export class TraversalEngine {
  constructor(private db: GraphDB) {}

  forwardReachable(id: string, options: ReachabilityOptions = {}): ReachabilityResult {
    return this.reachable(id, 'forward', options);
  }

  /** Mirror of {@link forwardReachable} along incoming edges, nearest first. */
  backwardReachable(id: string, options: ReachabilityOptions = {}): ReachabilityResult {
    return this.reachable(id, 'backward', options);
  }

  private reachable(id: string, direction: Direction, options: ReachabilityOptions): ReachabilityResult {
    const maxHops = requireCount('maxHops', options.maxHops ?? DEFAULT_REACH_HOPS, 0);
    const maxResults = requireCount('maxResults', options.maxResults ?? DEFAULT_MAX_RESULTS, 0);
    const windowDays = options.timeWindowDays;
    if (windowDays !== undefined && !(windowDays >= 0)) {
      throw new InvalidArgumentError(`timeWindowDays must be >= 0, got ${windowDays}`);
    }

    const source = this.db.getDocument(id);
    const inWindow = this.windowFilter(source.timestamp, direction, windowDays);
    const edgeDirection: NeighborDirection = direction === 'forward' ? 'outgoing' : 'incoming';

    const visited = new Set<string>([source.id]);
    const found: ReachableDocument[] = [];
    let frontier = [source.id];
    let cancelled: CancelledMarker | undefined;

    for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
      if (options.signal?.aborted) {
        cancelled = cancelledAt(hop - 1, options.signal);
        break;
      }

      const next: string[] = [];
      for (const current of frontier) {
        for (const link of this.db.getNeighbors(current, edgeDirection)) {
          if (visited.has(link.neighborId) || !inWindow(link.neighborTimestamp)) continue;
          visited.add(link.neighborId);
          found.push({ document: this.db.getDocument(link.neighborId), hops: hop });
          next.push(link.neighborId);
        }
      }
      frontier = next;
    }

    found.sort(direction === 'forward' ? byTimeAscending : byTimeDescending);

    return {
      sourceId: source.id,
      direction,
      reachable: found.slice(0, maxResults),
      truncated: found.length > maxResults,
      ...(cancelled && { cancelled }),
    };
  }

  private windowFilter(origin: Instant, direction: Direction, windowDays?: number): (t: Instant) => boolean {
    if (direction === 'forward') {
      const limit = windowDays === undefined ? undefined : origin.plusDays(windowDays);
      return t => !t.isBefore(origin) && (limit === undefined || !t.isAfter(limit));
    }
    const limit = windowDays === undefined ? undefined : origin.plusDays(-windowDays);
    return t => !t.isAfter(origin) && (limit === undefined || !t.isBefore(limit));
  }

  /**
   * Shortest path by hop count along outgoing edges. Neighbours are expanded
   * in (timestamp, id) order, so among equally short paths the one taking
   * the earliest next hop wins.
   *
   * @throws NoPathError when `to` is not reachable within `maxHops`
   */
  findPath(from: string, to: string, options: PathOptions = {}): PathResult {
    const maxHops = requireCount('maxHops', options.maxHops ?? DEFAULT_PATH_HOPS, 0);

    if (!this.db.hasDocument(from)) throw new NotFoundError(from);
    if (!this.db.hasDocument(to)) throw new NotFoundError(to);

    if (from === to) {
      return { found: true, path: [from], hops: 0 };
    }

    const parent = new Map<string, string>();
    const visited = new Set<string>([from]);
    let frontier = [from];

    for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
      if (options.signal?.aborted) {
        return { found: false, cancelled: cancelledAt(hop - 1, options.signal), explored: visited.size };
      }

      const next: string[] = [];
      for (const current of frontier) {
        for (const link of this.db.getNeighbors(current, 'outgoing')) {
          if (visited.has(link.neighborId)) continue;
          visited.add(link.neighborId);
          parent.set(link.neighborId, current);

          if (link.neighborId === to) {
            const path = this.unwind(parent, to);
            return { found: true, path, hops: path.length - 1 };
          }
          next.push(link.neighborId);
        }
      }
      frontier = next;
    }

    throw new NoPathError(from, to, maxHops);
  }

  hasPath(from: string, to: string, maxHops = DEFAULT_PATH_HOPS): boolean {
    try {
      return this.findPath(from, to, { maxHops }).found;
    } catch (error) {
      if (error instanceof NoPathError) return false;
      throw error;
    }
  }

  private unwind(parent: Map<string, string>, to: string): string[] {
    const path = [to];
    let step = parent.get(to);
    while (step !== undefined) {
      path.push(step);
      step = parent.get(step);
    }
    return path.reverse();
  }
}

function compareDocs(a: Document, b: Document): number {
  const diff = a.timestamp.epochMs - b.timestamp.epochMs;
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function byTimeAscending(a: ReachableDocument, b: ReachableDocument): number {
  return compareDocs(a.document, b.document);
}

// Nearest first: latest timestamp, ties by id ascending
function byTimeDescending(a: ReachableDocument, b: ReachableDocument): number {
  const diff = b.document.timestamp.epochMs - a.document.timestamp.epochMs;
  if (diff !== 0) return diff;
  return a.document.id < b.document.id ? -1 : a.document.id > b.document.id ? 1 : 0;
}
