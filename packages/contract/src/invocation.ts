import { CacheStorage, type Storage } from '@ftgate/storage';
import { err, ok, type Result } from 'neverthrow';

/**
 * Run one invocation over a write-buffering overlay of `storage`. Buffered
 * writes reach `storage` only when `run` succeeds; a failed run leaves it
 * untouched.
 */
export async function executeInvocation<T>(
  storage: Storage,
  run: (overlay: Storage) => Promise<Result<T, Error>>
): Promise<Result<T, Error>> {
  const overlay = new CacheStorage(storage);
  const result = await run(overlay);

  if (result.isErr()) {
    overlay.discard();
    return err(result.error);
  }

  const committed = await overlay.commit();
  if (committed.isErr()) {
    return err(committed.error);
  }
  return ok(result.value);
}
