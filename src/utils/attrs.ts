/**
 * Attribute set algebra
 *
 * Node and edge attributes map names to sets of values. Keys holding an
 * empty set are dropped, so every dict has a single canonical form.
 */

import type { AttrDict, AttrInput, AttrValue } from '../core/types'
import { own } from './mapping'

const isAttrValue = (value: unknown): value is AttrValue =>
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'boolean'

const toSet = (
  value: AttrValue | readonly AttrValue[] | ReadonlySet<AttrValue>,
): Set<AttrValue> => (isAttrValue(value) ? new Set([value]) : new Set(value))

/** Normalize user input into an attribute dict of fresh sets. */
export const normalizeAttrs = (input: AttrInput = {}): AttrDict => {
  const out: AttrDict = {}
  for (const [key, value] of Object.entries(input)) {
    const values = toSet(value)
    if (values.size > 0) out[key] = values
  }
  return out
}

/** Independent copy; no set is shared with the input. */
export const copyAttrs = (attrs: AttrDict): AttrDict => normalizeAttrs(attrs)

export const isEmptyAttrs = (attrs: AttrDict): boolean =>
  Object.values(attrs).every((values) => values.size === 0)

/** True when every value of `sub` is present under the same key in `sup`. */
export const isSubAttrs = (sub: AttrDict, sup: AttrDict): boolean => {
  for (const [key, values] of Object.entries(sub)) {
    if (values.size === 0) continue
    const target = own(sup, key)
    if (target === undefined) return false
    for (const value of values) {
      if (!target.has(value)) return false
    }
  }
  return true
}

export const attrsEqual = (a: AttrDict, b: AttrDict): boolean =>
  isSubAttrs(a, b) && isSubAttrs(b, a)

export const unionAttrs = (...dicts: AttrDict[]): AttrDict => {
  const out: AttrDict = {}
  for (const dict of dicts) {
    for (const [key, values] of Object.entries(dict)) {
      if (values.size === 0) continue
      const target = own(out, key) ?? new Set<AttrValue>()
      for (const value of values) target.add(value)
      out[key] = target
    }
  }
  return out
}

export const intersectAttrs = (a: AttrDict, b: AttrDict): AttrDict => {
  const out: AttrDict = {}
  for (const [key, values] of Object.entries(a)) {
    const other = own(b, key)
    if (other === undefined) continue
    const common = new Set([...values].filter((value) => other.has(value)))
    if (common.size > 0) out[key] = common
  }
  return out
}

/** Values of `a` that are not in `b`. */
export const subtractAttrs = (a: AttrDict, b: AttrDict): AttrDict => {
  const out: AttrDict = {}
  for (const [key, values] of Object.entries(a)) {
    const other = own(b, key)
    const rest = new Set(
      [...values].filter((value) => other === undefined || !other.has(value)),
    )
    if (rest.size > 0) out[key] = rest
  }
  return out
}

/** JSON form: sets become arrays. */
export const attrsToJson = (attrs: AttrDict): Record<string, AttrValue[]> => {
  const out: Record<string, AttrValue[]> = {}
  for (const [key, values] of Object.entries(attrs)) {
    if (values.size > 0) out[key] = [...values]
  }
  return out
}
