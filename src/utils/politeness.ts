import { randomBetween, sleep } from './wait';

export interface PolitenessOptions {
  delayMs: number;
  jitterMs: number;
  now?: () => number;
  random?: (min: number, max: number) => number;
}

/**
 * Minimum spacing between requests that share one network identity. Slots are
 * reserved up front, so concurrent callers on the same identity queue behind each
 * other instead of firing together once the delay passes.
 */
export class PolitenessGate {
  private readonly nextSlot = new Map<string, number>();
  private readonly now: () => number;
  private readonly random: (min: number, max: number) => number;

  constructor(private readonly options: PolitenessOptions) {
    this.now = options.now ?? Date.now;
    this.random = options.random ?? randomBetween;
  }

  /** Resolves false if the signal aborted before the slot arrived. */
  async wait(identity: string, signal?: AbortSignal): Promise<boolean> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot.get(identity) ?? now);
    const spacing = this.options.delayMs + (this.options.jitterMs > 0 ? this.random(0, this.options.jitterMs) : 0);
    this.nextSlot.set(identity, slot + spacing);

    return sleep(slot - now, signal);
  }

  /** Earliest time the identity may be used again. */
  nextAvailableAt(identity: string): number {
    return this.nextSlot.get(identity) ?? this.now();
  }
}
