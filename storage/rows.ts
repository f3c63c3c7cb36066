import { z } from 'zod'
import type { Account, Note, ScheduledEvent } from '../src/components/crmTypes'
import type { ActivityRow } from '../src/lib/activityFeed'

const optionalText = z.string().nullable()

export const accountRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  phone: optionalText,
  address: optionalText,
  email: optionalText,
  decision_maker: optionalText,
  creator: z.string(),
  created_at: z.number(),
})

export const noteRowSchema = z.object({
  id: z.number().int(),
  content: z.string(),
  account_id: z.number().int().nullable(),
  account_name: optionalText,
  creator: z.string(),
  created_at: z.number(),
})

export const eventRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  details: optionalText,
  event_time: z.number(),
  account_id: z.number().int().nullable(),
  account_name: optionalText,
  creator: z.string(),
  created_at: z.number(),
})

export const activityRowSchema = z.object({
  id: z.number().int(),
  kind: z.string(),
  title: optionalText,
  detail: optionalText,
  created_at: z.number(),
})

export const toAccount = (row: unknown): Account => {
  const parsed = accountRowSchema.parse(row)
  return {
    id: parsed.id,
    name: parsed.name,
    phone: parsed.phone ?? '',
    address: parsed.address ?? '',
    email: parsed.email ?? '',
    decisionMaker: parsed.decision_maker ?? '',
    creator: parsed.creator,
    createdAt: parsed.created_at,
  }
}

export const toNote = (row: unknown): Note => {
  const parsed = noteRowSchema.parse(row)
  return {
    id: parsed.id,
    content: parsed.content,
    accountId: parsed.account_id,
    accountName: parsed.account_name,
    creator: parsed.creator,
    createdAt: parsed.created_at,
  }
}

export const toEvent = (row: unknown): ScheduledEvent => {
  const parsed = eventRowSchema.parse(row)
  return {
    id: parsed.id,
    title: parsed.title,
    details: parsed.details ?? '',
    eventTime: parsed.event_time,
    accountId: parsed.account_id,
    accountName: parsed.account_name,
    creator: parsed.creator,
    createdAt: parsed.created_at,
  }
}

export const toActivityRow = (row: unknown): ActivityRow => {
  const parsed = activityRowSchema.parse(row)
  return {
    id: parsed.id,
    kind: parsed.kind,
    title: parsed.title,
    detail: parsed.detail,
    createdAt: parsed.created_at,
  }
}
