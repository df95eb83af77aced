/**
 * Run `task` once `at` is reached. Tasks already due run straight away.
 */
export async function scheduleAt<T>(
  at: Date,
  task: () => Promise<T>,
  now: () => number = Date.now,
): Promise<T> {
  const waitMs = at.getTime() - now();
  if (waitMs > 0) {
    await new Promise(resolve => setTimeout(resolve, waitMs));
  }
  return task();
}
