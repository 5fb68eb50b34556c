import type { CacheKey, CacheKeyPattern } from "../../ports/cache-key"

/**
 * A dependent in the graph. Keys are deleted as-is, patterns are resolved
 * against the keyspace. The kind is fixed at registration, never inferred
 * from the characters of the value.
 */
export type DependencyNode =
  | { kind: "key"; value: CacheKey }
  | { kind: "pattern"; value: CacheKeyPattern }

const nodeId = (node: DependencyNode): string => `${node.kind}:${node.value}`

/**
 * Directed graph of cache keys (or key patterns). An edge `key -> dependent`
 * means invalidating `key` must also invalidate `dependent`.
 *
 * Nodes may name keys that do not exist yet; cycles are allowed. Edges leave
 * from a string, so a pattern node's own dependents are those registered
 * under the same string.
 */
export class DependencyGraph {
  private readonly edges = new Map<string, Map<string, DependencyNode>>()

  /** Adds edges from `key` to each of `dependents`. Re-adding is a no-op. */
  register(
    key: string,
    dependents: Iterable<string>,
    kind: DependencyNode["kind"] = "key",
  ): void {
    let out = this.edges.get(key)
    if (out === undefined) {
      out = new Map()
      this.edges.set(key, out)
    }

    for (const value of dependents) {
      const node: DependencyNode = { kind, value }
      out.set(nodeId(node), node)
    }
  }

  directDependentsOf(key: string): DependencyNode[] {
    return [...(this.edges.get(key)?.values() ?? [])]
  }

  /**
   * Every node reachable from `key`, in discovery order. Each node is
   * expanded once; `key` itself is included only when a cycle leads back
   * to it.
   */
  dependentsOf(key: string): DependencyNode[] {
    const visited = new Map<string, DependencyNode>()
    const stack = [key]

    while (stack.length > 0) {
      const current = stack.pop()
      if (current === undefined) break

      for (const dependent of this.directDependentsOf(current)) {
        const id = nodeId(dependent)
        if (visited.has(id)) continue

        visited.set(id, dependent)
        stack.push(dependent.value)
      }
    }

    return [...visited.values()]
  }

  get size(): number {
    return this.edges.size
  }

  clear(): void {
    this.edges.clear()
  }
}
