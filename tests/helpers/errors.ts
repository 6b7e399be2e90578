/**
 * Await a promise that should reject with a specific error class.
 */
export async function rejectionOf<E extends Error>(
  promise: Promise<unknown>,
  errorClass: abstract new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected a rejection with ${errorClass.name}`);
}
