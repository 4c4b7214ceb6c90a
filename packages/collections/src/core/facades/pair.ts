/** A mutable key/value pair, as handed out by `OrderedMap.pairs()`. */
export class Pair<K, V> {
  constructor(
    public key: K,
    public value: V,
  ) {}

  copy(): Pair<K, V> {
    return new Pair(this.key, this.value)
  }

  toJSON(): { key: K; value: V } {
    return { key: this.key, value: this.value }
  }
}
