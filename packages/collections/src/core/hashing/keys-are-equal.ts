import { isHashable } from "../../ports/hashable"
import { sameValueZero } from "../compare/same-value-zero"

export function keysAreEqual(a: unknown, b: unknown): boolean {
  if (isHashable(a)) {
    return isHashable(b) && a.constructor === b.constructor && a.equals(b)
  }

  return sameValueZero(a, b)
}
