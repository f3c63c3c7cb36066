import { Box } from 'ink'
import { ScreenLines } from './components/ScreenLines'
import { useSession } from './hooks/useSession'
import type { SessionDeps } from './session/sessionTypes'

function App(props: SessionDeps) {
  const session = useSession(props)

  return (
    <Box flexDirection="column" paddingX={1}>
      <ScreenLines lines={session.render()} />
    </Box>
  )
}

export default App
