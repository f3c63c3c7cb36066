import { Box, Text } from 'ink'
import { styleFor } from '../lib/theme'
import type { ScreenLine } from '../lib/theme'

type ScreenLinesProps = {
  lines: ScreenLine[]
}

export function ScreenLines({ lines }: ScreenLinesProps) {
  return (
    <Box flexDirection="column">
      {lines.map((screenLine, row) => (
        <Text key={row}>
          {screenLine.length === 0
            ? ' '
            : screenLine.map((part, index) => (
                <Text key={index} {...styleFor(part.role)}>
                  {part.text}
                </Text>
              ))}
        </Text>
      ))}
    </Box>
  )
}
