/**
 * Step Dependency Graph
 *
 * Orders plan steps so every prerequisite comes first, keeping declaration
 * order wherever dependencies allow it.
 *
 * @purpose Dependency resolution and cycle detection for plan steps
 */

// ============================================================================
// Types
// ============================================================================

export interface GraphNode {
  key: string
  dependsOn: string[]
}

export interface DependencyGraph {
  nodes: string[]
  edges: Map<string, string[]> // node -> dependencies
  dependents: Map<string, string[]> // node -> who depends on it
}

// ============================================================================
// Graph Building
// ============================================================================

export function buildDependencyGraph(nodes: GraphNode[]): DependencyGraph {
  const graph: DependencyGraph = {
    nodes: nodes.map(n => n.key),
    edges: new Map(),
    dependents: new Map(),
  }

  for (const node of nodes) {
    graph.edges.set(node.key, node.dependsOn)

    for (const dep of node.dependsOn) {
      const list = graph.dependents.get(dep) ?? []
      list.push(node.key)
      graph.dependents.set(dep, list)
    }
  }

  return graph
}

// ============================================================================
// Validation
// ============================================================================

export function findUnknownDependencies(nodes: GraphNode[]): string[] {
  const known = new Set(nodes.map(n => n.key))
  const errors: string[] = []

  for (const node of nodes) {
    for (const dep of node.dependsOn) {
      if (!known.has(dep)) {
        errors.push(`"${node.key}" depends on unknown resource "${dep}"`)
      }
    }
  }

  return errors
}

export function detectCycles(nodes: GraphNode[]): string[] | null {
  const graph = buildDependencyGraph(nodes)
  const visited = new Set<string>()
  const recursionStack = new Set<string>()
  const cycle: string[] = []

  function visit(name: string, path: string[]): boolean {
    if (recursionStack.has(name)) {
      const cycleStart = path.indexOf(name)
      cycle.push(...path.slice(cycleStart), name)
      return true
    }

    if (visited.has(name)) return false

    visited.add(name)
    recursionStack.add(name)

    for (const dep of graph.edges.get(name) ?? []) {
      if (visit(dep, [...path, name])) {
        return true
      }
    }

    recursionStack.delete(name)
    return false
  }

  for (const node of graph.nodes) {
    if (visit(node, [])) {
      return cycle
    }
  }

  return null
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Depth-first, dependencies first, declaration order otherwise. Callers must
 * have ruled out unknown dependencies and cycles.
 */
export function getExecutionOrder<T extends GraphNode>(nodes: T[]): T[] {
  const byKey = new Map(nodes.map(n => [n.key, n]))
  const visited = new Set<string>()
  const order: T[] = []

  function visit(node: T) {
    if (visited.has(node.key)) return
    visited.add(node.key)

    for (const dep of node.dependsOn) {
      const target = byKey.get(dep)
      if (!target) {
        throw new Error(`"${node.key}" depends on unknown resource "${dep}"`)
      }
      visit(target)
    }

    order.push(node)
  }

  for (const node of nodes) {
    visit(node)
  }
  return order
}
