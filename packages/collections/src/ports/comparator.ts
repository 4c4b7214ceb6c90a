/** Negative when `a` sorts first, positive when `b` does, zero when tied. */
export type Comparator<T> = (a: T, b: T) => number
