/**
 * Deep Copy
 *
 * Structural clone for arbitrarily nested, possibly cyclic values.
 *
 * Every source node is cloned exactly once: a map from source identity to
 * clone is consulted before a node is copied, so a value reachable through
 * two paths ends up as one shared clone, and cycles close onto the clone
 * already made. Nodes are filled from an explicit work stack rather than by
 * recursion, so nesting depth is not limited by the call stack.
 *
 * Copied: arrays, Maps, Sets, Dates and other objects (own enumerable
 * string keys, prototype kept). Primitives and functions are shared.
 */

type Copyable = object

function isCopyable(value: unknown): value is Copyable {
  return typeof value === 'object' && value !== null
}

/** Define an own data property, so keys like `__proto__` stay plain keys */
export function setOwn(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

function emptyCloneOf(source: Copyable): Copyable {
  if (Array.isArray(source)) return []
  if (source instanceof Map) return new Map()
  if (source instanceof Set) return new Set()
  if (source instanceof Date) return new Date(source.getTime())
  return Object.create(Object.getPrototypeOf(source))
}

/**
 * Clone `value` so the result shares no mutable storage with it.
 */
export function deepCopy<T>(value: T): T {
  if (!isCopyable(value)) return value

  const copies = new Map<Copyable, Copyable>()
  const pending: Copyable[] = []

  const copyOf = (node: unknown): unknown => {
    if (!isCopyable(node)) return node
    const existing = copies.get(node)
    if (existing) return existing

    const clone = emptyCloneOf(node)
    copies.set(node, clone)
    pending.push(node)
    return clone
  }

  const root = copyOf(value)

  while (pending.length > 0) {
    const source = pending.pop()
    if (source === undefined) break
    const clone = copies.get(source)

    if (Array.isArray(source) && Array.isArray(clone)) {
      for (let i = 0; i < source.length; i++) {
        clone[i] = copyOf(source[i])
      }
    } else if (source instanceof Map && clone instanceof Map) {
      for (const [key, entry] of source) {
        clone.set(copyOf(key), copyOf(entry))
      }
    } else if (source instanceof Set && clone instanceof Set) {
      for (const entry of source) {
        clone.add(copyOf(entry))
      }
    } else if (source instanceof Date) {
      // Leaf: the timestamp was taken when the clone was made
    } else if (clone !== undefined) {
      for (const key of Object.keys(source)) {
        setOwn(clone, key, copyOf(Reflect.get(source, key)))
      }
    }
  }

  // The clone has the same shape as `value`, node for node
  return root as T
}
