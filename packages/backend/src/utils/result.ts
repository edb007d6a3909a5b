export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export interface Strategy<TInput, TOutput> {
  name: string;
  run(input: TInput): Promise<Result<TOutput>>;
}

export interface StrategyOutcome<TOutput> {
  strategy: string;
  value: TOutput;
  failures: Array<{ strategy: string; error: Error }>;
}

/**
 * Tries each strategy in order and returns the first success, together with
 * the failures collected on the way. Fails with the last error when none
 * succeeds.
 */
export async function firstSuccess<TInput, TOutput>(
  strategies: ReadonlyArray<Strategy<TInput, TOutput>>,
  input: TInput
): Promise<Result<StrategyOutcome<TOutput>>> {
  const failures: Array<{ strategy: string; error: Error }> = [];

  for (const strategy of strategies) {
    const result = await strategy.run(input);
    if (result.ok) {
      return ok({ strategy: strategy.name, value: result.value, failures });
    }
    failures.push({ strategy: strategy.name, error: result.error });
  }

  const last = failures.at(-1);
  return err(last?.error ?? new Error("No strategy was configured"));
}

export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (error) {
    return err(toError(error));
  }
}
