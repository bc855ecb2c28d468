import { CollaboratorError } from '../errors';

/**
 * Run `fn` with a deadline. On expiry the signal handed to `fn` is aborted
 * and the call rejects with a `timeout` CollaboratorError, whether or not
 * `fn` honours the signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorError(label, 'timeout', `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
