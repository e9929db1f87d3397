/**
 * Fleetplan — Activation Gate
 *
 * Single-slot FIFO gate a negotiation holds while it is active. One gate is
 * shared by the whole process, so at most one negotiation runs at a time no
 * matter how many cycle managers or protocols exist. Tests inject their own.
 */

import { NegotiationError } from '../types/index.js';

export type ReleaseGate = () => void;

interface Waiter {
  holder: string;
  resolve: (release: ReleaseGate) => void;
}

export class ActivationGate {
  private holder: string | null = null;
  private waiters: Waiter[] = [];

  /** Negotiation currently holding the gate, if any. */
  get current(): string | null {
    return this.holder;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the slot. Resolves with a release function that must be called
   * exactly once; later calls are ignored. Aborting `signal` while waiting
   * leaves the queue and rejects with a NegotiationError.
   */
  acquire(holder: string, signal?: AbortSignal): Promise<ReleaseGate> {
    if (signal?.aborted) {
      return Promise.reject(abandoned(holder));
    }
    if (this.holder === null) {
      this.holder = holder;
      return Promise.resolve(this.releaser(holder));
    }
    if (this.holder === holder || this.waiters.some((w) => w.holder === holder)) {
      return Promise.reject(
        new NegotiationError(`Negotiation ${holder} already holds or awaits the activation gate`, { holder }),
      );
    }
    return new Promise<ReleaseGate>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(abandoned(holder));
      };
      const waiter: Waiter = {
        holder,
        resolve: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private releaser(holder: string): ReleaseGate {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff(holder);
    };
  }

  private handOff(from: string): void {
    if (this.holder !== from) return;
    const next = this.waiters.shift();
    if (!next) {
      this.holder = null;
      return;
    }
    this.holder = next.holder;
    next.resolve(this.releaser(next.holder));
  }
}

function abandoned(holder: string): NegotiationError {
  return new NegotiationError(`Negotiation ${holder} stopped waiting for the activation gate`, { holder });
}

/** Process-wide gate used when a protocol is not handed one explicitly. */
export const processActivationGate: ActivationGate = new ActivationGate();
