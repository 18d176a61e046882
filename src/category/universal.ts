/**
 * Universal arrows into pullbacks and out of pushouts.
 *
 * Used during propagation to recover the typing between two rewritten
 * graphs from the squares that produced them.
 */

import { CategoryOperatorPreconditionError } from '../core/errors'
import type { Mapping } from '../core/types'
import { lookup, preimageIndex } from '../utils/mapping'

/**
 * Arrow Z -> P into a pullback P with projections `pA`, `pB`, given a cone
 * `zA`, `zB`. Nodes of Z without a matching pair are left unmapped.
 * @throws CategoryOperatorPreconditionError if the arrow is not unique
 */
export const getUniqueMapToPullback = (
  pNodes: Iterable<string>,
  pA: Mapping,
  pB: Mapping,
  zA: Mapping,
  zB: Mapping,
): Mapping => {
  const byPair = new Map<string, string>()
  const key = (a: string, b: string) => JSON.stringify([a, b])
  for (const p of pNodes) {
    const a = lookup(pA, p)
    const b = lookup(pB, p)
    if (a === undefined || b === undefined) continue
    const k = key(a, b)
    if (byPair.has(k)) {
      throw new CategoryOperatorPreconditionError(
        `Arrow into the pullback is not unique: "${String(byPair.get(k))}" and "${p}" project identically`,
        { nodes: [byPair.get(k), p] },
      )
    }
    byPair.set(k, p)
  }

  const zP: Mapping = {}
  for (const [z, a] of Object.entries(zA)) {
    const b = lookup(zB, z)
    if (b === undefined) continue
    const p = byPair.get(key(a, b))
    if (p !== undefined) zP[z] = p
  }
  return zP
}

/**
 * Arrow P -> Z out of a pushout P with injections `aP`, `bP`, given a
 * cocone `aZ`, `bZ`. Nodes of P reached by neither side are left unmapped.
 * @throws CategoryOperatorPreconditionError if both sides disagree
 */
export const getUniqueMapFromPushout = (
  pNodes: Iterable<string>,
  aP: Mapping,
  bP: Mapping,
  aZ: Mapping,
  bZ: Mapping,
): Mapping => {
  const aByP = preimageIndex(aP)
  const bByP = preimageIndex(bP)
  const pZ: Mapping = {}

  for (const p of pNodes) {
    const images = new Set<string>()
    for (const a of aByP.get(p) ?? []) {
      const z = lookup(aZ, a)
      if (z !== undefined) images.add(z)
    }
    for (const b of bByP.get(p) ?? []) {
      const z = lookup(bZ, b)
      if (z !== undefined) images.add(z)
    }
    if (images.size > 1) {
      throw new CategoryOperatorPreconditionError(
        `Arrow out of the pushout is not unique: "${p}" would map to ${[...images].map((z) => `"${z}"`).join(', ')}`,
        { node: p, images: [...images] },
      )
    }
    const [image] = images
    if (image !== undefined) pZ[p] = image
  }
  return pZ
}
