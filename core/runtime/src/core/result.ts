// Minimal Result runtime with helpers

export type Ok<T> = { t: "ok"; v: T };
export type Err<C extends string = string> = { t: "err"; code: C; msg?: string; data?: unknown };
export type Result<T, C extends string = string> = Ok<T> | Err<C>;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const err = <C extends string>(code: C, msg?: string, data?: unknown): Err<C> => ({ t: "err", code, msg, data });

export const isOk = <T, C extends string>(r: Result<T, C>): r is Ok<T> => r.t === "ok";
export const isErr = <T, C extends string>(r: Result<T, C>): r is Err<C> => r.t === "err";

export const map = <A, B, C extends string>(r: Result<A, C>, f: (a: A) => B): Result<B, C> =>
  isOk(r) ? ok(f(r.v)) : r;

export const unwrapOr = <T, C extends string>(r: Result<T, C>, dflt: T): T => (isOk(r) ? r.v : dflt);

export const match = <T, C extends string, R>(
  r: Result<T, C>,
  arms: { ok: (v: T) => R; err: (e: Err<C>) => R },
): R => (isOk(r) ? arms.ok(r.v) : arms.err(r));
