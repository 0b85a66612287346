/**
 * One record that could not be fully unsealed, with the failure that degraded it.
 */
export interface PartialResult<P> {
  partial: P;
  cause: Error;
}

export type ListResult<T, P> =
  | { status: 'success'; items: T[] }
  | { status: 'partial'; items: T[]; failed: PartialResult<P>[] };
