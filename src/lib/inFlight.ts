// src/lib/inFlight.ts

export interface InFlightTicket {
  signal: AbortSignal;
  release: () => void;
}

/**
 * Per-user registry of in-flight events.
 *
 * Starting a new event for a user aborts the previous one, whose handler sees
 * `signal.aborted` and discards its result.
 */
export class InFlightRegistry {
  private readonly controllers = new Map<string, AbortController>();

  begin(key: string): InFlightTicket {
    this.controllers.get(key)?.abort(new SupersededError(key));

    const controller = new AbortController();
    this.controllers.set(key, controller);

    return {
      signal: controller.signal,
      release: () => {
        if (this.controllers.get(key) === controller) {
          this.controllers.delete(key);
        }
      },
    };
  }

  get size(): number {
    return this.controllers.size;
  }
}

/**
 * Abort reason used when a newer event replaces an older one
 */
export class SupersededError extends Error {
  constructor(key: string) {
    super(`Event for ${key} superseded by a newer one`);
    this.name = 'AbortError';
  }
}
