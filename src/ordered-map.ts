import type { YamlNode } from './types.js'

/**
 * A YAML mapping that remembers the order its keys first appeared in.
 *
 * Keys and values live in a single insertion-ordered table, so the key
 * order and the lookup can never disagree. Only the parser writes to a map;
 * everything downstream sees it through the read-only accessors.
 */
export class OrderedMap {
  private readonly table = new Map<string, YamlNode>()

  get size(): number {
    return this.table.size
  }

  keys(): string[] {
    return [...this.table.keys()]
  }

  entries(): Array<[string, YamlNode]> {
    return [...this.table.entries()]
  }

  has(key: string): boolean {
    return this.table.has(key)
  }

  get(key: string): YamlNode | undefined {
    return this.table.get(key)
  }

  /**
   * Stores a value, keeping the key's original position when it already exists.
   */
  set(key: string, value: YamlNode): void {
    this.table.set(key, value)
  }

  /**
   * Stores a value only when the key is not present yet. Used for `<<` merge
   * keys, where explicit entries win over merged ones.
   *
   * @returns Whether the value was inserted
   */
  setIfAbsent(key: string, value: YamlNode): boolean {
    if (this.table.has(key)) {
      return false
    }
    this.table.set(key, value)
    return true
  }

  static from(entries: Iterable<[string, YamlNode]>): OrderedMap {
    const map = new OrderedMap()
    for (const [key, value] of entries) {
      map.set(key, value)
    }
    return map
  }
}
