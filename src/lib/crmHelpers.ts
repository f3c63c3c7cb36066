import type { Account } from '../components/crmTypes'
import { backTokens, exitTokens } from './crmConstants'

const normalizeToken = (value: string) => value.trim().toLowerCase()

export const isExitToken = (value: string) => exitTokens.includes(normalizeToken(value))

export const isBackToken = (value: string) => backTokens.includes(normalizeToken(value))

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : 'Something went wrong. Try again.'

export const withContext = (context: string, error: unknown) => `${context}: ${errorMessage(error)}`

export const accountMetaLine = (account: Account) => {
  const meta: string[] = []
  if (account.phone) meta.push(`Phone: ${account.phone}`)
  if (account.email) meta.push(`Email: ${account.email}`)
  if (account.decisionMaker) meta.push(`Decision Maker: ${account.decisionMaker}`)
  return meta.join('  •  ')
}
