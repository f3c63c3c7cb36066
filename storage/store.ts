import { existsSync, readFileSync, renameSync, writeFileSync } from 'node:fs'
import initSqlJs from 'sql.js'
import type { BindParams, Database, ParamsObject, SqlJsStatic, SqlValue } from 'sql.js'
import type { Account, AccountId, Activity, CrmStore, NewAccount } from '../src/components/crmTypes'
import { normalizeActivityFeed, normalizeActivityLimit } from '../src/lib/activityFeed'
import { activityDetailLength } from '../src/lib/crmConstants'
import { toAccount, toActivityRow, toEvent, toNote } from './rows'
import { schemaStatements } from './schema'
import { StoreError, duplicateAccountMessage, toStoreError } from './storeErrors'

export type SqliteStore = CrmStore & {
  close: () => void
}

/** Keeps the database in memory only; nothing is written to disk. */
export const memoryDatabase = ':memory:'

const connectionPragmas = 'PRAGMA foreign_keys = ON'

const accountColumns = 'id, name, phone, address, email, decision_maker, creator, created_at'

const eventSelect = `
  SELECT e.id, e.title, e.details, e.event_time, e.account_id, a.name AS account_name, e.creator, e.created_at
  FROM events e
  LEFT JOIN accounts a ON a.id = e.account_id`

const noteSelect = `
  SELECT n.id, n.content, n.account_id, a.name AS account_name, n.creator, n.created_at
  FROM notes n
  LEFT JOIN accounts a ON a.id = n.account_id`

const activityUnion = (scoped: boolean) => `
  SELECT id, 'account' AS kind, name AS title, phone AS detail, created_at FROM accounts
    ${scoped ? 'WHERE id = @accountId' : ''}
  UNION ALL
  SELECT id, 'note' AS kind, substr(content, 1, ${activityDetailLength}) AS title, '' AS detail, created_at FROM notes
    ${scoped ? 'WHERE account_id = @accountId' : ''}
  UNION ALL
  SELECT id, 'event' AS kind, title, substr(COALESCE(details, ''), 1, ${activityDetailLength}) AS detail, created_at FROM events
    ${scoped ? 'WHERE account_id = @accountId' : ''}
  ORDER BY created_at DESC, id DESC
  LIMIT @limit`

/** Blank optional text is stored as NULL. */
const optional = (value: string) => {
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

const escapeLike = (term: string) => term.replace(/[\\%_]/g, (match) => `\\${match}`)

/** Prefixes keys with `@` to match the named parameters in the SQL text. */
const named = (values: Record<string, SqlValue>): ParamsObject =>
  Object.fromEntries(Object.entries(values).map(([key, value]) => [`@${key}`, value]))

const isUniqueViolation = (error: unknown) =>
  error instanceof Error && error.message.startsWith('UNIQUE constraint failed')

const guard = <T>(op: string, action: () => T): T => {
  try {
    return action()
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new StoreError('account_exists', op, duplicateAccountMessage, { cause: error })
    }
    throw toStoreError(op, error)
  }
}

let engine: Promise<SqlJsStatic> | null = null

const loadEngine = () => {
  engine ??= initSqlJs()
  return engine
}

const openDatabase = async (filename: string): Promise<Database> => {
  try {
    const SQL = await loadEngine()
    const persisted = filename !== memoryDatabase && existsSync(filename) ? readFileSync(filename) : undefined
    return new SQL.Database(persisted)
  } catch (error) {
    throw toStoreError('openStore', error)
  }
}

/**
 * Opens the database file at `filename`, creating it when missing. The whole database lives in
 * memory and every write is flushed back to the file before the call returns.
 */
export const openStore = async (filename: string): Promise<SqliteStore> => {
  const db = await openDatabase(filename)

  const persist = () => {
    if (filename === memoryDatabase) return
    // export() reopens the connection, which drops connection pragmas.
    const data = db.export()
    db.exec(connectionPragmas)
    const staging = `${filename}.tmp`
    writeFileSync(staging, data)
    renameSync(staging, filename)
  }

  try {
    db.exec(connectionPragmas)
    for (const statement of schemaStatements) {
      db.exec(statement)
    }
    persist()
  } catch (error) {
    db.close()
    throw toStoreError('openStore', error)
  }

  const queryAll = (sql: string, params?: BindParams): ParamsObject[] => {
    const statement = db.prepare(sql)
    try {
      if (params) statement.bind(params)
      const rows: ParamsObject[] = []
      while (statement.step()) {
        rows.push(statement.getAsObject())
      }
      return rows
    } finally {
      statement.free()
    }
  }

  const queryOne = (sql: string, params?: BindParams): ParamsObject | undefined => queryAll(sql, params)[0]

  /** Runs a write and returns the new row id. */
  const insert = (sql: string, params: ParamsObject) => {
    db.run(sql, params)
    const row = queryOne('SELECT last_insert_rowid() AS id')
    const id = row?.id
    if (typeof id !== 'number') {
      throw new Error('insert returned no row id')
    }
    return id
  }

  const readAccount = (op: string, id: AccountId) => {
    const row = queryOne(`SELECT ${accountColumns} FROM accounts WHERE id = ?`, [id])
    if (row === undefined) {
      throw new StoreError('not_found', op, `account ${id} not found`)
    }
    return toAccount(row)
  }

  const readActivity = (sql: string, params: { limit: number; accountId?: AccountId }): Activity[] => {
    const values: Record<string, SqlValue> = { limit: params.limit }
    if (params.accountId !== undefined) values.accountId = params.accountId
    const rows = queryAll(sql, named(values)).map(toActivityRow)
    return normalizeActivityFeed(rows, params.limit)
  }

  const accountParams = (account: NewAccount | Account) => ({
    name: account.name.trim(),
    phone: optional(account.phone),
    address: optional(account.address),
    email: optional(account.email),
    decisionMaker: optional(account.decisionMaker),
  })

  const allAccounts = () =>
    queryAll(`SELECT ${accountColumns} FROM accounts ORDER BY name COLLATE NOCASE, id`).map(toAccount)

  return {
    listAccounts: () => guard('listAccounts', allAccounts),

    searchAccounts: (term) =>
      guard('searchAccounts', () => {
        const needle = term.trim()
        if (needle.length === 0) {
          return allAccounts()
        }
        return queryAll(
          `SELECT ${accountColumns} FROM accounts WHERE name LIKE ? ESCAPE '\\' ORDER BY name COLLATE NOCASE, id`,
          [`%${escapeLike(needle)}%`],
        ).map(toAccount)
      }),

    accountByName: (name) =>
      guard('accountByName', () => {
        const row = queryOne(`SELECT ${accountColumns} FROM accounts WHERE name = ? COLLATE NOCASE`, [name.trim()])
        if (row === undefined) {
          throw new StoreError('not_found', 'accountByName', `account "${name.trim()}" not found`)
        }
        return toAccount(row)
      }),

    accountById: (id) => guard('accountById', () => readAccount('accountById', id)),

    createAccount: (account) =>
      guard('createAccount', () => {
        const id = insert(
          `INSERT INTO accounts (name, phone, address, email, decision_maker, creator, created_at)
           VALUES (@name, @phone, @address, @email, @decisionMaker, @creator, @createdAt)`,
          named({ ...accountParams(account), creator: account.creator, createdAt: account.createdAt }),
        )
        persist()
        return readAccount('createAccount', id)
      }),

    updateAccount: (account) =>
      guard('updateAccount', () => {
        db.run(
          `UPDATE accounts
           SET name = @name, phone = @phone, address = @address, email = @email, decision_maker = @decisionMaker
           WHERE id = @id`,
          named({ ...accountParams(account), id: account.id }),
        )
        if (db.getRowsModified() === 0) {
          throw new StoreError('not_found', 'updateAccount', `account ${account.id} not found`)
        }
        persist()
        return readAccount('updateAccount', account.id)
      }),

    listEvents: () => guard('listEvents', () => queryAll(`${eventSelect} ORDER BY e.event_time, e.id`).map(toEvent)),

    listActivity: (limit) =>
      guard('listActivity', () => readActivity(activityUnion(false), { limit: normalizeActivityLimit(limit) })),

    listAccountActivity: (accountId, limit) =>
      guard('listAccountActivity', () =>
        readActivity(activityUnion(true), { limit: normalizeActivityLimit(limit), accountId }),
      ),

    createNote: (note) =>
      guard('createNote', () => {
        const id = insert(
          `INSERT INTO notes (content, account_id, creator, created_at)
           VALUES (@content, @accountId, @creator, @createdAt)`,
          named({
            content: note.content.trim(),
            accountId: note.accountId,
            creator: note.creator,
            createdAt: note.createdAt,
          }),
        )
        persist()
        return toNote(queryOne(`${noteSelect} WHERE n.id = ?`, [id]))
      }),

    createEvent: (event) =>
      guard('createEvent', () => {
        const id = insert(
          `INSERT INTO events (title, details, event_time, account_id, creator, created_at)
           VALUES (@title, @details, @eventTime, @accountId, @creator, @createdAt)`,
          named({
            title: event.title.trim(),
            details: optional(event.details),
            eventTime: event.eventTime,
            accountId: event.accountId,
            creator: event.creator,
            createdAt: event.createdAt,
          }),
        )
        persist()
        return toEvent(queryOne(`${eventSelect} WHERE e.id = ?`, [id]))
      }),

    close: () => {
      db.close()
    },
  }
}
