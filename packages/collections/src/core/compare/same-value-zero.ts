/** Equality used by `Array.prototype.includes` and `Map`: `NaN` equals `NaN`, `+0` equals `-0`. */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b))
}
