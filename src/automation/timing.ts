import { TimeoutError } from "../core/errors";

export type DelayRange = [number, number];

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Pacer {
  pause(range: DelayRange): Promise<number>;
  wait(ms: number): Promise<void>;
}

export interface PacerOptions {
  sleep?: Sleep;
  random?: () => number;
}

export function createPacer(options: PacerOptions = {}): Pacer {
  const doSleep = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  return {
    async pause(range: DelayRange): Promise<number> {
      const [min, max] = range[0] <= range[1] ? range : [range[1], range[0]];
      const ms = Math.round(min + random() * (max - min));
      if (ms > 0) {
        await doSleep(ms);
      }
      return ms;
    },
    async wait(ms: number): Promise<void> {
      if (ms > 0) {
        await doSleep(ms);
      }
    },
  };
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Resolves with the first promise to produce a non-null value, or null once
 * every promise has settled without one.
 */
export function firstNonNull<T>(promises: Array<Promise<T | null>>): Promise<T | null> {
  return new Promise((resolve) => {
    let pending = promises.length;
    if (pending === 0) {
      resolve(null);
      return;
    }
    for (const promise of promises) {
      promise.then(
        (value) => {
          if (value !== null) {
            resolve(value);
          }
          pending -= 1;
          if (pending === 0) {
            resolve(null);
          }
        },
        () => {
          pending -= 1;
          if (pending === 0) {
            resolve(null);
          }
        }
      );
    }
  });
}
