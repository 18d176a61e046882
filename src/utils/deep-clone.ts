/**
 * Deep clone of plain data records (typing mappings, JSON snapshots).
 *
 * Attribute sets are copied by `copyAttrs`; this helper is only used for
 * string-keyed records of primitives and nested plain objects.
 */

import _deepClone from '@jsbits/deep-clone'

export const deepClone = <T extends object>(value: T): T =>
  _deepClone(value, false)
