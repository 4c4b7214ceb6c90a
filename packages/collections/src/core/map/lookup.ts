/**
 * Outcome of {@link OrderedMap.lookup}. Keeps "absent" apart from a stored
 * `undefined` or `null`.
 */
export type Lookup<V> = Readonly<{ found: true; value: V }> | Readonly<{ found: false }>
