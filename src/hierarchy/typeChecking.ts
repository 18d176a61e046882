/**
 * Type checking of rewrites
 *
 * Before a rewrite touches anything, the typing of its three rule graphs
 * is completed from the hierarchy and validated:
 *
 * - `lhsTyping` gains the types the instance already has in every
 *   successor of the rewritten graph
 * - `rhsTyping` gains the types of preserved nodes, then is extended to
 *   every descendant
 * - `pTyping` (controlled clones of ancestors) is checked for retyping and
 *   for composability along typing edges
 *
 * Contradictions raise RewritingTypingError. In strict mode every rhs node
 * must end up typed by every successor, otherwise the rewrite would break
 * totality and HierarchyConsistencyError is raised.
 */

import {
  CategoryOperatorPreconditionError,
  HierarchyConsistencyError,
  RewritingTypingError,
} from '../core/errors'
import type {
  Mapping,
  Relation,
  TypingDict,
  TypingRelationDict,
} from '../core/types'
import type { TypedGraph } from '../graphs/typedGraph'
import { checkHomomorphism } from '../homomorphisms/check'
import type { Rule } from '../rules/rule'
import {
  copyMapping,
  isMonic,
  lookup,
  normalizeRelation,
  own,
  preimageIndex,
} from '../utils/mapping'
import type { Hierarchy } from './hierarchy'
import type { RelationInput } from './types'

export interface RewriteTypingInput {
  lhsTyping?: Record<string, Mapping>
  pTyping?: Record<string, RelationInput>
  rhsTyping?: Record<string, RelationInput>
}

export interface CheckedTyping {
  lhsTyping: TypingDict
  pTyping: TypingRelationDict
  rhsTyping: TypingRelationDict
}

const quote = (values: Iterable<string>) =>
  [...values].map((value) => `"${value}"`).join(', ')

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

const assertTypingKeys = (
  kind: string,
  keys: string[],
  allowed: Set<string>,
  graphId: string,
  direction: 'descendant' | 'ancestor',
): void => {
  for (const key of keys) {
    if (!allowed.has(key)) {
      throw new RewritingTypingError(
        `Typing of the ${kind} refers to "${key}" which is not a graph ${direction} of "${graphId}"`,
        { graph: graphId, typeGraph: key },
      )
    }
  }
}

const assertNodes = (
  what: string,
  graph: TypedGraph,
  nodes: Iterable<string>,
): void => {
  for (const node of nodes) {
    if (!graph.hasNode(node)) {
      throw new RewritingTypingError(
        `Typing of the ${what} refers to "${node}" which does not exist`,
        { node },
      )
    }
  }
}

// ---------------------------------------------------------------------------
// Autocompletion
// ---------------------------------------------------------------------------

/**
 * Complete the typing of the rule graphs from the typing of the instance.
 * Inputs are copied.
 */
export const autocompleteTyping = (
  hierarchy: Hierarchy,
  graphId: string,
  rule: Rule,
  instance: Mapping,
  input: RewriteTypingInput = {},
): CheckedTyping => {
  const descendants = hierarchy.getDescendants(graphId)
  const below = new Set(Object.keys(descendants))
  const above = new Set(Object.keys(hierarchy.getAncestors(graphId)))

  const lhsTyping: TypingDict = {}
  for (const [typeGraph, mapping] of Object.entries(input.lhsTyping ?? {})) {
    lhsTyping[typeGraph] = copyMapping(mapping)
  }
  const pTyping: TypingRelationDict = {}
  for (const [typeGraph, relation] of Object.entries(input.pTyping ?? {})) {
    pTyping[typeGraph] = normalizeRelation(relation)
  }
  const rhsTyping: TypingRelationDict = {}
  for (const [typeGraph, relation] of Object.entries(input.rhsTyping ?? {})) {
    rhsTyping[typeGraph] = normalizeRelation(relation)
  }

  assertTypingKeys('lhs', Object.keys(lhsTyping), below, graphId, 'descendant')
  assertTypingKeys('rhs', Object.keys(rhsTyping), below, graphId, 'descendant')
  assertTypingKeys('interface', Object.keys(pTyping), above, graphId, 'ancestor')
  for (const [typeGraph, mapping] of Object.entries(lhsTyping)) {
    assertNodes('lhs', rule.lhs, Object.keys(mapping))
    assertNodes(`lhs by "${typeGraph}"`, hierarchy.getGraph(typeGraph), Object.values(mapping))
  }
  for (const [typeGraph, relation] of Object.entries(rhsTyping)) {
    assertNodes('rhs', rule.rhs, Object.keys(relation))
    assertNodes(
      `rhs by "${typeGraph}"`,
      hierarchy.getGraph(typeGraph),
      Object.values(relation).flatMap((types) => [...types]),
    )
  }
  for (const [ancestor, relation] of Object.entries(pTyping)) {
    assertNodes(`interface by "${ancestor}"`, hierarchy.getGraph(ancestor), Object.keys(relation))
    assertNodes('interface', rule.p, Object.values(relation).flatMap((ps) => [...ps]))
  }

  for (const descendant of below) {
    if (!Object.hasOwn(rhsTyping, descendant)) rhsTyping[descendant] = {}
  }

  const addType = (relation: Relation, node: string, type: string) => {
    const types = own(relation, node) ?? new Set<string>()
    types.add(type)
    relation[node] = types
  }

  // Types induced by the instance in immediate successors
  for (const successor of hierarchy.successors(graphId)) {
    const typing = hierarchy.getTyping(graphId, successor)
    const lhs = own(lhsTyping, successor) ?? {}
    for (const [lhsNode, host] of Object.entries(instance)) {
      if (lookup(lhs, lhsNode) !== undefined) continue
      const type = lookup(typing, host)
      if (type !== undefined) lhs[lhsNode] = type
    }
    lhsTyping[successor] = lhs

    const rhs = own(rhsTyping, successor) ?? {}
    for (const [pNode, lhsNode] of Object.entries(rule.pLhs)) {
      const type = lookup(lhs, lhsNode)
      if (type !== undefined) addType(rhs, rule.pRhs[pNode], type)
    }
    rhsTyping[successor] = rhs
  }

  // Carry rhs types down to every descendant until nothing changes
  let changed = true
  while (changed) {
    changed = false
    for (const [typeGraph, relation] of Object.entries(rhsTyping)) {
      for (const [descendant, typing] of Object.entries(
        hierarchy.getDescendants(typeGraph),
      )) {
        const target = own(rhsTyping, descendant) ?? {}
        for (const [node, types] of Object.entries(relation)) {
          if (own(target, node) !== undefined) continue
          const induced = new Set(
            [...types].flatMap((type) => {
              const image = lookup(typing, type)
              return image === undefined ? [] : [image]
            }),
          )
          if (induced.size === 0) continue
          target[node] = induced
          changed = true
        }
        rhsTyping[descendant] = target
      }
    }
  }

  return { lhsTyping, pTyping, rhsTyping }
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

/**
 * The instance must be a monic homomorphism that agrees with `lhsTyping`
 * wherever the host node is typed.
 */
export const checkInstance = (
  hierarchy: Hierarchy,
  graphId: string,
  pattern: TypedGraph,
  instance: Mapping,
  lhsTyping: TypingDict,
): void => {
  checkHomomorphism(pattern, hierarchy.getGraph(graphId), instance, true)
  if (!isMonic(instance)) {
    throw new CategoryOperatorPreconditionError(
      'Instance of the pattern is not injective',
      { graph: graphId },
    )
  }
  for (const [typeGraph, typing] of Object.entries(lhsTyping)) {
    const hostTyping = hierarchy.getTyping(graphId, typeGraph)
    for (const [node, type] of Object.entries(typing)) {
      const actual = lookup(hostTyping, instance[node])
      if (actual !== undefined && actual !== type) {
        throw new RewritingTypingError(
          `Pattern node "${node}" is typed by "${type}" in "${typeGraph}" while its instance "${instance[node]}" is typed by "${actual}"`,
          { node, typeGraph, expected: type, actual },
        )
      }
    }
  }
}

/**
 * Types given by a graph and by one of its descendants must agree along
 * the typing between them.
 */
export const checkSelfConsistency = (
  hierarchy: Hierarchy,
  typing: TypingRelationDict,
  side: 'lhs' | 'rhs',
): void => {
  for (const [typeGraph, relation] of Object.entries(typing)) {
    for (const [descendant, descendantTyping] of Object.entries(
      hierarchy.getDescendants(typeGraph),
    )) {
      const other = own(typing, descendant)
      if (other === undefined) continue
      for (const [node, types] of Object.entries(relation)) {
        const expected = own(other, node)
        if (expected === undefined) continue
        for (const type of types) {
          const image = lookup(descendantTyping, type)
          if (image !== undefined && !expected.has(image)) {
            throw new RewritingTypingError(
              `Node "${node}" of the ${side} is typed as "${image}" through "${typeGraph}" and as ${quote(expected)} in "${descendant}"`,
              { node, side, typeGraph, descendant },
            )
          }
        }
      }
    }
  }
}

/**
 * Controlled clones of ancestors must not retype nodes and must compose
 * with the clones their neighbours in the hierarchy receive.
 */
export const checkPTyping = (
  hierarchy: Hierarchy,
  graphId: string,
  rule: Rule,
  instance: Mapping,
  pTyping: TypingRelationDict,
): void => {
  const clonesOf = preimageIndex(rule.pLhs)

  for (const [ancestor, relation] of Object.entries(pTyping)) {
    const origin = hierarchy.getTyping(ancestor, graphId)
    for (const [node, pNodes] of Object.entries(relation)) {
      for (const pNode of pNodes) {
        const host = instance[rule.pLhs[pNode]]
        if (lookup(origin, node) !== host) {
          throw new RewritingTypingError(
            `Node "${node}" of "${ancestor}" is typed by "${String(lookup(origin, node))}" in "${graphId}" but is given the interface node "${pNode}" matched to "${host}"`,
            { ancestor, node, pNode },
          )
        }
      }
    }

    // Uncontrolled predecessors receive every clone
    for (const predecessor of hierarchy.predecessors(ancestor)) {
      if (own(pTyping, predecessor) !== undefined) continue
      const typed = new Set(
        hierarchy.isGraph(predecessor)
          ? Object.values(hierarchy.getTyping(predecessor, ancestor))
          : [],
      )
      for (const [node, pNodes] of Object.entries(relation)) {
        if (!typed.has(node) || pNodes.size === 0) continue
        const [first] = pNodes
        const canonical = clonesOf.get(rule.pLhs[first]) ?? []
        if (canonical.length !== pNodes.size || canonical.some((p) => !pNodes.has(p))) {
          throw new RewritingTypingError(
            `Controlled clones of "${node}" in "${ancestor}" (${quote(pNodes)}) do not compose with "${predecessor}", which receives ${quote(canonical)}`,
            { ancestor, predecessor, node },
          )
        }
      }
    }

    for (const successor of hierarchy.successors(ancestor)) {
      const successorRelation = own(pTyping, successor)
      if (successorRelation === undefined) continue
      const typing = hierarchy.getTyping(ancestor, successor)
      for (const [node, pNodes] of Object.entries(relation)) {
        const type = lookup(typing, node)
        if (type === undefined) continue
        const allowed = own(successorRelation, type)
        if (allowed === undefined) continue
        const extra = [...pNodes].filter((p) => !allowed.has(p))
        if (extra.length > 0) {
          throw new RewritingTypingError(
            `Controlled clones of "${node}" in "${ancestor}" include ${quote(extra)} which its type "${type}" in "${successor}" does not keep`,
            { ancestor, successor, node },
          )
        }
      }
    }
  }
}

/**
 * A preserved node keeps its type: its rhs types in every descendant of a
 * typing graph must contain the type induced by its lhs type. Strict mode
 * allows a single rhs type per node.
 */
export const checkLhsRhsConsistency = (
  hierarchy: Hierarchy,
  rule: Rule,
  typing: CheckedTyping,
  strict: boolean,
): void => {
  if (strict) {
    for (const [typeGraph, relation] of Object.entries(typing.rhsTyping)) {
      for (const [node, types] of Object.entries(relation)) {
        if (types.size > 1) {
          throw new RewritingTypingError(
            `Rewriting is strict: rhs node "${node}" is typed by ${quote(types)} in "${typeGraph}"`,
            { node, typeGraph },
          )
        }
      }
    }
  }

  for (const [typeGraph, lhs] of Object.entries(typing.lhsTyping)) {
    const targets: [string, Mapping | undefined][] = [
      [typeGraph, undefined],
      ...Object.entries(hierarchy.getDescendants(typeGraph)),
    ]
    for (const pNode of rule.p.nodes()) {
      const lhsType = lookup(lhs, rule.pLhs[pNode])
      if (lhsType === undefined) continue
      for (const [target, composed] of targets) {
        const expected = composed ? lookup(composed, lhsType) : lhsType
        const rhsTypes = own(own(typing.rhsTyping, target) ?? {}, rule.pRhs[pNode])
        if (expected === undefined || rhsTypes === undefined) continue
        if (rhsTypes.size === 1 && !rhsTypes.has(expected)) {
          throw new RewritingTypingError(
            `Preserved node "${pNode}" is typed as "${expected}" in "${target}" by the lhs and as ${quote(rhsTypes)} by the rhs`,
            { node: pNode, typeGraph: target },
          )
        }
      }
    }
  }
}

/**
 * Strict rewrites must leave every rhs node typed by every successor,
 * except merges of nodes that were all untyped.
 */
export const checkTotality = (
  hierarchy: Hierarchy,
  graphId: string,
  rule: Rule,
  instance: Mapping,
  rhsTyping: TypingRelationDict,
): void => {
  const preimages = preimageIndex(rule.pRhs)
  for (const successor of hierarchy.successors(graphId)) {
    const typing = hierarchy.getTyping(graphId, successor)
    for (const node of rule.rhs.nodes()) {
      const pNodes = preimages.get(node) ?? []
      if (
        pNodes.length > 1 &&
        pNodes.every((p) => lookup(typing, instance[rule.pLhs[p]]) === undefined)
      ) {
        continue
      }
      const types = own(own(rhsTyping, successor) ?? {}, node)
      if (types === undefined || types.size === 0) {
        throw new HierarchyConsistencyError(
          `Rewriting is strict: rhs node "${node}" must be typed by "${successor}"`,
          { node, typeGraph: successor },
        )
      }
    }
  }
}

/**
 * Autocomplete and validate the typing of a rewrite. Nothing is mutated.
 */
export const checkRewriteTyping = (
  hierarchy: Hierarchy,
  graphId: string,
  rule: Rule,
  instance: Mapping,
  input: RewriteTypingInput,
  strict: boolean,
): CheckedTyping => {
  const typing = autocompleteTyping(hierarchy, graphId, rule, instance, input)
  checkInstance(hierarchy, graphId, rule.lhs, instance, typing.lhsTyping)

  const lhsRelations: TypingRelationDict = {}
  for (const [typeGraph, mapping] of Object.entries(typing.lhsTyping)) {
    lhsRelations[typeGraph] = normalizeRelation(mapping)
  }
  checkSelfConsistency(hierarchy, lhsRelations, 'lhs')
  checkPTyping(hierarchy, graphId, rule, instance, typing.pTyping)
  checkSelfConsistency(hierarchy, typing.rhsTyping, 'rhs')
  checkLhsRhsConsistency(hierarchy, rule, typing, strict)
  if (strict) {
    checkTotality(hierarchy, graphId, rule, instance, typing.rhsTyping)
  }
  return typing
}
