export { matchPattern } from './pattern.js';

export function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/**
 * Recursively freeze plain objects and arrays.
 */
export function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === 'object' && !Object.isFrozen(obj)) {
    Object.freeze(obj);
    for (const value of Object.values(obj)) {
      deepFreeze(value);
    }
  }
  return obj;
}

/**
 * Race `work` against a timer. The timer is always cleared, so a settled
 * call never keeps the process alive. `timeoutMs` of 0 disables the limit.
 */
export async function withTimeout<T>(
  work: () => Promise<T> | T,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const execution = Promise.resolve().then(work);
  if (timeoutMs <= 0) {
    return execution;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([execution, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
