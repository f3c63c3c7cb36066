import { useState } from 'react'
import { useApp, useInput } from 'ink'
import { createSession } from '../session/session'
import type { SessionDeps } from '../session/sessionTypes'
import { toSessionKey } from './inputKeys'

export const useSession = (deps: SessionDeps) => {
  const [session] = useState(() => createSession(deps))
  const [, setRevision] = useState(0)
  const { exit } = useApp()

  useInput((input, key) => {
    const next = toSessionKey(input, key)
    if (!next) {
      return
    }
    session.handleKey(next)
    if (session.closed) {
      exit()
      return
    }
    setRevision((revision) => revision + 1)
  })

  return session
}
