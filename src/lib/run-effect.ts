import { Effect, Either } from 'effect';

/**
 * Run an Effect and reject with its typed failure rather than a FiberFailure wrapper
 */
export async function runPromiseOrThrow<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

/**
 * Synchronous counterpart of runPromiseOrThrow
 */
export function runSyncOrThrow<A, E>(effect: Effect.Effect<A, E>): A {
  const result = Effect.runSync(Effect.either(effect));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
