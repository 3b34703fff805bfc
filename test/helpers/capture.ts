/**
 * Resolves with whatever the promise rejects with; fails if it resolves.
 */
export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}
