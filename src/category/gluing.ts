/**
 * Gluing classes for pushout-like constructions.
 *
 * Nodes linked directly or transitively must end up as one node. Classes
 * are the connected components of the link graph.
 */

import Graph from 'graphology'
import { connectedComponents } from 'graphology-components'

/**
 * Partition `nodes` into classes of linked nodes. Members of each class keep
 * the order of `nodes`; singleton classes are omitted.
 */
export const gluingClasses = (
  nodes: string[],
  links: Iterable<readonly [string, string]>,
): string[][] => {
  const graph = new Graph({ type: 'undirected', multi: false })
  for (const node of nodes) graph.mergeNode(node)
  for (const [a, b] of links) {
    if (a === b) continue
    graph.mergeNode(a)
    graph.mergeNode(b)
    graph.mergeEdge(a, b)
  }

  const order = new Map(nodes.map((node, i) => [node, i]))
  const rank = (node: string) => order.get(node) ?? nodes.length

  return connectedComponents(graph)
    .filter((component) => component.length > 1)
    .map((component) => [...component].sort((a, b) => rank(a) - rank(b)))
}
