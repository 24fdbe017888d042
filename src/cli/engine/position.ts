/**
 * Cursor/scroll arithmetic shared by the store and the reconciler.
 * All functions are pure and operate on id sequences.
 */

export interface PanelPosition {
  cursor: number | null
  scroll: number
}

export interface PanelAnchor {
  selectedId: string | null
  topId: string | null
}

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min
  if (value > max) return max
  return value
}

export function anchorOf(sequence: readonly string[], position: PanelPosition): PanelAnchor {
  return {
    selectedId: position.cursor === null ? null : sequence[position.cursor] ?? null,
    topId: sequence[position.scroll] ?? null,
  }
}

/**
 * Bring a position into range for a sequence of `length` items
 */
export function clampPosition(position: PanelPosition, length: number): PanelPosition {
  if (length === 0) {
    return position.cursor === null && position.scroll === 0 ? position : { cursor: null, scroll: 0 }
  }
  const cursor = position.cursor === null ? 0 : clamp(position.cursor, 0, length - 1)
  let scroll = clamp(position.scroll, 0, length - 1)
  if (cursor < scroll) scroll = cursor
  if (cursor === position.cursor && scroll === position.scroll) return position
  return { cursor, scroll }
}

// First id of `from[start]`, `from[start + step]`, ... that still exists in `lookup`
function scanSurvivor(
  from: readonly string[],
  start: number,
  step: 1 | -1,
  lookup: ReadonlyMap<string, number>
): number | null {
  for (let i = start; i >= 0 && i < from.length; i += step) {
    const index = lookup.get(from[i])
    if (index !== undefined) return index
  }
  return null
}

function indexLookup(sequence: readonly string[]): Map<string, number> {
  const lookup = new Map<string, number>()
  sequence.forEach((id, index) => lookup.set(id, index))
  return lookup
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  if (a === b) return true
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Re-derive cursor and scroll after `prev` became `next`.
 *
 * The selected entity stays selected; if it is gone the cursor lands on the
 * nearest survivor below its old position, then above. The entity at the top
 * of the viewport stays on top; if it is gone its nearest survivor above
 * takes the top, then below.
 */
export function preservePosition(
  prev: readonly string[],
  next: readonly string[],
  position: PanelPosition
): PanelPosition {
  if (sameSequence(prev, next)) return clampPosition(position, next.length)
  if (next.length === 0) return clampPosition(position, 0)

  const lookup = indexLookup(next)

  let cursor: number
  if (position.cursor === null || prev.length === 0) {
    cursor = 0
  } else {
    const old = clamp(position.cursor, 0, prev.length - 1)
    cursor =
      lookup.get(prev[old]) ??
      scanSurvivor(prev, old + 1, 1, lookup) ??
      scanSurvivor(prev, old - 1, -1, lookup) ??
      clamp(old, 0, next.length - 1)
  }

  let scroll: number
  if (prev.length === 0) {
    scroll = 0
  } else {
    const top = clamp(position.scroll, 0, prev.length - 1)
    scroll =
      lookup.get(prev[top]) ??
      scanSurvivor(prev, top - 1, -1, lookup) ??
      scanSurvivor(prev, top + 1, 1, lookup) ??
      0
  }

  return clampPosition({ cursor, scroll }, next.length)
}

/**
 * Restore a saved position against the current sequence, using the saved
 * anchor ids first and the saved indices as fallback
 */
export function restorePosition(
  sequence: readonly string[],
  saved: PanelPosition,
  anchor: PanelAnchor
): PanelPosition {
  if (sequence.length === 0) return clampPosition(saved, 0)
  const cursorIndex = anchor.selectedId === null ? -1 : sequence.indexOf(anchor.selectedId)
  const topIndex = anchor.topId === null ? -1 : sequence.indexOf(anchor.topId)
  return clampPosition(
    {
      cursor: cursorIndex >= 0 ? cursorIndex : saved.cursor,
      scroll: topIndex >= 0 ? topIndex : saved.scroll,
    },
    sequence.length
  )
}

/**
 * Move the cursor by `delta` without wrapping; scroll follows so the cursor
 * stays inside a viewport of `capacity` items
 */
export function moveWithin(
  position: PanelPosition,
  length: number,
  delta: number,
  capacity: number
): PanelPosition {
  if (length === 0 || position.cursor === null) return position
  const cursor = clamp(position.cursor + delta, 0, length - 1)
  if (cursor === position.cursor) return position
  const visible = Math.max(1, capacity)
  let scroll = position.scroll
  if (cursor < scroll) {
    scroll = cursor
  } else if (cursor >= scroll + visible) {
    scroll = cursor - visible + 1
  }
  return { cursor, scroll }
}
