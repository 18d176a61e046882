/**
 * Node mappings and relations
 *
 * Mappings are plain records (source node -> target node). Relations map a
 * node to a set of related nodes. Every helper returns a new object.
 */

import type { Mapping, Relation } from '../core/types'
import { deepClone } from './deep-clone'

/**
 * Own entry of a record. Node ids and attribute names are arbitrary strings,
 * so `toString` or `constructor` must not resolve to inherited members.
 */
export const own = <V>(record: Readonly<Record<string, V>>, key: string): V | undefined =>
  Object.hasOwn(record, key) ? record[key] : undefined

/** Image of `key`, or undefined when the mapping is not defined there. */
export const lookup = (mapping: Mapping, key: string): string | undefined =>
  own(mapping, key)

export const copyMapping = (mapping: Mapping): Mapping => deepClone(mapping)

export const identityMapping = (nodes: Iterable<string>): Mapping => {
  const out: Mapping = {}
  for (const node of nodes) out[node] = node
  return out
}

/**
 * Compose `first` then `second`. Keys whose image has no entry in `second`
 * are dropped.
 */
export const compose = (first: Mapping, second: Mapping): Mapping => {
  const out: Mapping = {}
  for (const [key, value] of Object.entries(first)) {
    const image = lookup(second, value)
    if (image !== undefined) out[key] = image
  }
  return out
}

export const composeChain = (chain: Mapping[]): Mapping => {
  if (chain.length === 0) return {}
  return chain.slice(1).reduce(compose, chain[0])
}

export const keysByValue = (mapping: Mapping, value: string): string[] =>
  Object.keys(mapping).filter((key) => mapping[key] === value)

/** Inverse index: image -> all of its preimages. */
export const preimageIndex = (mapping: Mapping): Map<string, string[]> => {
  const index = new Map<string, string[]>()
  for (const [key, value] of Object.entries(mapping)) {
    const keys = index.get(value)
    if (keys) keys.push(key)
    else index.set(value, [key])
  }
  return index
}

export const isMonic = (mapping: Mapping): boolean =>
  new Set(Object.values(mapping)).size === Object.keys(mapping).length

/** Inverse of a monic mapping; undefined when two keys share an image. */
export const invertMapping = (mapping: Mapping): Mapping | undefined => {
  const out: Mapping = {}
  for (const [key, value] of Object.entries(mapping)) {
    if (Object.hasOwn(out, value)) return undefined
    out[value] = key
  }
  return out
}

// ---------------------------------------------------------------------------
// Relations
// ---------------------------------------------------------------------------

export const relationFromPairs = (
  pairs: Iterable<readonly [string, string]>,
): Relation => {
  const out: Relation = {}
  for (const [left, right] of pairs) {
    const rights = own(out, left) ?? new Set<string>()
    rights.add(right)
    out[left] = rights
  }
  return out
}

export const relationToPairs = (relation: Relation): [string, string][] =>
  Object.entries(relation).flatMap(([left, rights]) =>
    [...rights].map((right): [string, string] => [left, right]),
  )

export const reverseRelation = (relation: Relation): Relation =>
  relationFromPairs(
    relationToPairs(relation).map(([left, right]): [string, string] => [
      right,
      left,
    ]),
  )

export const mappingToRelation = (mapping: Mapping): Relation =>
  relationFromPairs(Object.entries(mapping))

/** Accept single ids or collections as relation values. */
export const normalizeRelation = (
  input: Record<string, string | Iterable<string>>,
): Relation => {
  const out: Relation = {}
  for (const [key, value] of Object.entries(input)) {
    out[key] = typeof value === 'string' ? new Set([value]) : new Set(value)
  }
  return out
}

export const copyRelation = (relation: Relation): Relation =>
  normalizeRelation(relation)

/** Compose a -> b with b -> c into a -> c. */
export const composeRelationDicts = (
  left: Relation,
  right: Relation,
): Relation => {
  const out: Relation = {}
  for (const [a, bs] of Object.entries(left)) {
    const cs = new Set<string>()
    for (const b of bs) {
      for (const c of own(right, b) ?? []) cs.add(c)
    }
    if (cs.size > 0) out[a] = cs
  }
  return out
}
