import { Candidate, CandidateKind } from '../types/crawl';
import { canonicalizeUrl } from '../utils/url';

/**
 * The job-scoped frontier: a depth-ordered queue plus the visited set every strategy
 * shares. A canonical URL is admitted once per job, whoever discovers it.
 */
export class Frontier {
  private readonly queue: Candidate[] = [];
  private readonly visited = new Set<string>();

  /** Queues the candidate unless its canonical URL was seen before. */
  offer(candidate: Candidate): boolean {
    const key = canonicalizeUrl(candidate.url);
    if (!key || this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);
    this.insert({ ...candidate, url: key });
    return true;
  }

  /**
   * Records a redirect target as seen. Returns false when it was already known,
   * meaning the content behind it has been (or is being) handled.
   */
  registerAlias(url: string): boolean {
    const key = canonicalizeUrl(url);
    if (!key || this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);
    return true;
  }

  has(url: string): boolean {
    const key = canonicalizeUrl(url);
    return key !== null && this.visited.has(key);
  }

  /** Shallowest candidate whose kind is accepted; ties keep discovery order. */
  next(accept: (kind: CandidateKind) => boolean = () => true): Candidate | undefined {
    const index = this.queue.findIndex((candidate) => accept(candidate.kind));
    if (index < 0) {
      return undefined;
    }
    const [candidate] = this.queue.splice(index, 1);
    return candidate;
  }

  /** Empties the queue and returns how many candidates were dropped. */
  discard(): number {
    return this.queue.splice(0).length;
  }

  get size(): number {
    return this.queue.length;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  private insert(candidate: Candidate): void {
    let index = this.queue.length;
    while (index > 0 && this.queue[index - 1].depth > candidate.depth) {
      index -= 1;
    }
    this.queue.splice(index, 0, candidate);
  }
}
