/**
 * In-process single-flight table.
 *
 * The first caller for a key starts the work; callers that arrive while it is
 * in flight attach to the same promise. Claiming a key is a Map lookup and
 * insert in one synchronous step, so two callers can never both start work
 * for the same key.
 *
 * Every caller may bring its own AbortSignal. An aborted caller detaches on
 * its own; the shared work keeps running for whoever is still attached, and
 * is aborted only when the last caller detaches.
 */

export type FlightResult<T> =
  | { status: 'settled'; value: T; shared: boolean }
  | { status: 'detached'; reason: unknown; shared: boolean };

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

export class SingleFlight<T> {
  private readonly flights = new Map<string, Flight<T>>();

  /** Number of keys with work in flight. */
  get size(): number {
    return this.flights.size;
  }

  has(key: string): boolean {
    return this.flights.has(key);
  }

  /**
   * Run `work` for `key`, or join the run already in flight.
   * `work` receives a signal that fires once no caller is left waiting.
   * A rejection from `work` is passed to every attached caller.
   */
  run(
    key: string,
    work: (signal: AbortSignal) => Promise<T>,
    callerSignal?: AbortSignal,
  ): Promise<FlightResult<T>> {
    let flight = this.flights.get(key);
    const shared = flight !== undefined;
    if (!flight) {
      flight = this.start(key, work);
    }
    flight.waiters += 1;
    return this.attach(key, flight, shared, callerSignal);
  }

  private start(key: string, work: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController();
    const flight: Flight<T> = {
      // Deferred to a microtask so the entry is registered before work begins.
      promise: Promise.resolve().then(() => work(controller.signal)),
      controller,
      waiters: 0,
      settled: false,
    };
    const release = () => {
      flight.settled = true;
      if (this.flights.get(key) === flight) this.flights.delete(key);
    };
    flight.promise.then(release, release);
    this.flights.set(key, flight);
    return flight;
  }

  private attach(
    key: string,
    flight: Flight<T>,
    shared: boolean,
    callerSignal: AbortSignal | undefined,
  ): Promise<FlightResult<T>> {
    return new Promise<FlightResult<T>>((resolve, reject) => {
      let done = false;

      const detach = () => {
        if (done) return;
        done = true;
        flight.waiters -= 1;
        if (flight.waiters === 0 && !flight.settled) {
          // Abandoned: later callers must start fresh rather than join an aborted run.
          if (this.flights.get(key) === flight) this.flights.delete(key);
          flight.controller.abort(callerSignal?.reason);
        }
        resolve({ status: 'detached', reason: callerSignal?.reason, shared });
      };

      if (callerSignal?.aborted) {
        detach();
        return;
      }
      callerSignal?.addEventListener('abort', detach, { once: true });

      flight.promise.then(
        (value) => {
          callerSignal?.removeEventListener('abort', detach);
          if (done) return;
          done = true;
          resolve({ status: 'settled', value, shared });
        },
        (err: unknown) => {
          callerSignal?.removeEventListener('abort', detach);
          if (done) return;
          done = true;
          reject(err);
        },
      );
    });
  }
}
