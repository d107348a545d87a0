/**
 * Value that is either present or absent.
 *
 * Single-row results use it instead of `null` so both cases must be handled.
 */
export type Option<T> = { readonly kind: "some"; readonly value: T } | { readonly kind: "none" };

const NONE: Option<never> = Object.freeze({ kind: "none" });

export function some<T>(value: T): Option<T> {
  return { kind: "some", value };
}

export function none<T = never>(): Option<T> {
  return NONE;
}

export function isSome<T>(option: Option<T>): option is { readonly kind: "some"; readonly value: T } {
  return option.kind === "some";
}

export function isNone<T>(option: Option<T>): option is { readonly kind: "none" } {
  return option.kind === "none";
}

/**
 * Get the value or the fallback when absent
 */
export function unwrapOption<T>(option: Option<T>): T | undefined;
export function unwrapOption<T>(option: Option<T>, fallback: T): T;
export function unwrapOption<T>(option: Option<T>, fallback?: T): T | undefined {
  return option.kind === "some" ? option.value : fallback;
}

/**
 * Transform the value when present
 */
export function mapOption<T, TResult>(option: Option<T>, map: (value: T) => TResult): Option<TResult> {
  return option.kind === "some" ? some(map(option.value)) : NONE;
}
