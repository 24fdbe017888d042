/**
 * Bounded cache of rendered image grids, keyed by message id.
 * LRU by access order; entries pinned as visible are never evicted.
 */

export type CharGrid = readonly string[]

const DEFAULT_CAPACITY = 32

export class ImageRenderCache {
  // Map iteration order doubles as LRU order (oldest first)
  private readonly entries = new Map<string, CharGrid>()
  private visible: ReadonlySet<string> = new Set()
  readonly capacity: number

  constructor(capacity: number = DEFAULT_CAPACITY) {
    this.capacity = Math.max(1, capacity)
  }

  get size(): number {
    return this.entries.size
  }

  has(messageId: string): boolean {
    return this.entries.has(messageId)
  }

  /**
   * Look up a grid and refresh its recency
   */
  get(messageId: string): CharGrid | undefined {
    const grid = this.entries.get(messageId)
    if (grid === undefined) return undefined
    this.entries.delete(messageId)
    this.entries.set(messageId, grid)
    return grid
  }

  set(messageId: string, grid: CharGrid): void {
    this.entries.delete(messageId)
    this.entries.set(messageId, grid)
    this.evict()
  }

  /**
   * Replace the set of ids currently on screen, then evict
   */
  pinVisible(messageIds: Iterable<string>): void {
    this.visible = new Set(messageIds)
    this.evict()
  }

  isPinned(messageId: string): boolean {
    return this.visible.has(messageId)
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }

  private evict(): void {
    if (this.entries.size <= this.capacity) return
    for (const id of [...this.entries.keys()]) {
      if (this.entries.size <= this.capacity) return
      if (!this.visible.has(id)) this.entries.delete(id)
    }
  }
}
