export type Outcome<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Outcome<never, E> {
  return { ok: false, error };
}

/**
 * Run a step and capture errors of the given classes as an `err` outcome.
 * Anything else is rethrown so fatal errors keep unwinding.
 */
export async function attempt<T, E extends Error>(
  step: () => Promise<T> | T,
  recoverable: Array<abstract new (...args: never[]) => E>,
): Promise<Outcome<T, E>> {
  try {
    return ok(await step());
  } catch (error) {
    for (const ctor of recoverable) {
      if (error instanceof ctor) return err(error);
    }
    throw error;
  }
}
