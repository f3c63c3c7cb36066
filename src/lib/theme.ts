export type ThemeRole =
  | 'title'
  | 'subtitle'
  | 'accent'
  | 'primary'
  | 'secondary'
  | 'success'
  | 'warning'
  | 'danger'
  | 'faint'
  | 'highlight'
  | 'border'
  | 'helpKey'
  | 'helpValue'
  | 'plain'

export type TextSegment = {
  text: string
  role: ThemeRole
}

export type ScreenLine = TextSegment[]

export type ThemeStyle = {
  color?: string
  bold?: boolean
  underline?: boolean
}

export const themeStyles: Record<ThemeRole, ThemeStyle> = {
  title: { color: '#ff87ff', bold: true, underline: true },
  subtitle: { color: '#87afff', bold: true },
  accent: { color: '#ffafff', bold: true },
  primary: { color: '#5fd7ff' },
  secondary: { color: '#b2b2b2' },
  success: { color: '#00d787', bold: true },
  warning: { color: '#ffff5f', bold: true },
  danger: { color: '#ff5f5f', bold: true },
  faint: { color: '#767676' },
  highlight: { color: '#ff5faf', bold: true },
  border: { color: '#585858' },
  helpKey: { color: '#87d7ff', bold: true },
  helpValue: { color: '#b2b2b2' },
  plain: {},
}

export const segment = (role: ThemeRole, text: string): TextSegment => ({ role, text })

export const line = (role: ThemeRole, text: string): ScreenLine => [segment(role, text)]

export const blankLine = (): ScreenLine => []

export const styleFor = (role: ThemeRole) => themeStyles[role]

export const lineText = (screenLine: ScreenLine) => screenLine.map((part) => part.text).join('')

/** Plain-text rendering of a screen, one line per row. */
export const screenToText = (lines: ScreenLine[]) => lines.map(lineText).join('\n')
