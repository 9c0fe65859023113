import { HarnessError } from "./errors";

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok(value?: unknown): Ok<unknown> {
  return { ok: true, value };
}

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Value of an `Ok`, or a `HarnessError` naming `context` and the carried error. */
export const unwrap = <T, E>(result: Result<T, E>, context: string): T => {
  if (result.ok) return result.value;
  throw new HarnessError(`${context} failed`, result.error);
};
