import type { Key } from 'ink'
import type { SessionKey } from '../session/sessionTypes'

type KeyFlags = Pick<
  Key,
  | 'ctrl'
  | 'meta'
  | 'return'
  | 'escape'
  | 'backspace'
  | 'delete'
  | 'tab'
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'pageUp'
  | 'pageDown'
>

/** Maps an Ink key press to an engine key; navigation keys the engine has no use for map to null. */
export const toSessionKey = (input: string, key: Partial<KeyFlags>): SessionKey | null => {
  if (key.ctrl && input === 'c') return { type: 'interrupt' }
  if (key.return) return { type: 'enter' }
  if (key.escape) return { type: 'escape' }
  // Most terminals send DEL for the backspace key.
  if (key.backspace || key.delete) return { type: 'backspace' }
  if (
    key.ctrl ||
    key.meta ||
    key.tab ||
    key.upArrow ||
    key.downArrow ||
    key.leftArrow ||
    key.rightArrow ||
    key.pageUp ||
    key.pageDown
  ) {
    return null
  }
  return input.length > 0 ? { type: 'text', text: input } : null
}
