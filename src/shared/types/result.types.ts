/**
 * Outcome of a call to an external collaborator.
 * The failure branch is a value so callers choose their fallback explicitly.
 */
export type FetchResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function fetched<T>(data: T): FetchResult<T> {
  return { success: true, data };
}

export function fetchFailed<T>(error: string): FetchResult<T> {
  return { success: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
