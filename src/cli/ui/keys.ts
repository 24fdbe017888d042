import type { Key } from 'ink'
import type { KeyName } from '@/cli/engine/event-queue'

/**
 * Decode an Ink input event into the keys the dispatcher knows
 */
export function decodeKey(input: string, key: Key): KeyName {
  if (key.ctrl && (input === 'q' || input === 'c')) return 'quit'
  if (key.tab) return 'tab'
  if (key.upArrow) return 'up'
  if (key.downArrow) return 'down'
  if (key.return) return 'enter'
  if (key.escape) return 'escape'
  return 'other'
}
