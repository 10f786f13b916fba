/**
 * Outcome of resolving one entity through an external service chain.
 * Expected absence is a value, not an exception; exceptions are reserved
 * for network and payload failures.
 */
export type Resolution<T, C extends number | null = number | null> =
  | { kind: 'resolved'; value: T }
  | { kind: 'unresolvable'; code: C; message: string };

export function resolved<T>(value: T): Resolution<T, never> {
  return { kind: 'resolved', value };
}

export function unresolvable<C extends number | null = null>(
  message: string,
  code: C,
): Resolution<never, C>;
export function unresolvable(message: string): Resolution<never, null>;
export function unresolvable(message: string, code: number | null = null): Resolution<never, number | null> {
  return { kind: 'unresolvable', code, message };
}
