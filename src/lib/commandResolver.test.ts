import { describe, expect, it } from 'vitest'
import type { MenuOption } from '../components/crmTypes'
import { accountDetailOptions, mainMenuOptions } from './crmConstants'
import { resolveCommand } from './commandResolver'

const table: MenuOption[] = [
  { id: 'settings', keywords: ['settings'], synonyms: ['1', 's'] },
  { id: 'search', keywords: ['search'], synonyms: ['2'] },
  { id: 'quit', keywords: ['quit'], synonyms: ['3', 'q'] },
]

describe('resolveCommand', () => {
  it('returns null for blank input', () => {
    expect(resolveCommand('', table)).toBeNull()
    expect(resolveCommand('   ', table)).toBeNull()
  })

  it('prefers an exact synonym over an ambiguous prefix', () => {
    // "s" prefixes both settings and search, but is a synonym of settings.
    expect(resolveCommand('s', table)).toBe('settings')
    expect(resolveCommand('  S ', table)).toBe('settings')
  })

  it('resolves a unique keyword prefix', () => {
    expect(resolveCommand('sea', table)).toBe('search')
    expect(resolveCommand('SET', table)).toBe('settings')
    expect(resolveCommand('qu', table)).toBe('quit')
  })

  it('fails when a prefix matches several options', () => {
    expect(resolveCommand('se', table)).toBeNull()
  })

  it('fails for text that matches nothing', () => {
    expect(resolveCommand('zebra', table)).toBeNull()
    expect(resolveCommand('settingsx', table)).toBeNull()
  })

  it('counts an option once even when several of its keywords match', () => {
    const options: MenuOption[] = [{ id: 'add', keywords: ['add', 'addition'], synonyms: [] }]
    expect(resolveCommand('ad', options)).toBe('add')
  })

  it('resolves the main menu shortcuts', () => {
    expect(resolveCommand('1', mainMenuOptions)).toBe('dashboard')
    expect(resolveCommand('dash', mainMenuOptions)).toBe('dashboard')
    expect(resolveCommand('view accounts', mainMenuOptions)).toBe('accounts')
    expect(resolveCommand('set', mainMenuOptions)).toBe('settings')
    expect(resolveCommand('he', mainMenuOptions)).toBe('settings')
    expect(resolveCommand('new', mainMenuOptions)).toBe('add-account')
    expect(resolveCommand('ev', mainMenuOptions)).toBe('create')
    expect(resolveCommand('exit.', mainMenuOptions)).toBe('quit')
    expect(resolveCommand('q', mainMenuOptions)).toBe('quit')
  })

  it('treats "e" as ambiguous on the main menu', () => {
    // event and exit both start with "e".
    expect(resolveCommand('e', mainMenuOptions)).toBeNull()
  })

  it('resolves the account detail actions', () => {
    expect(resolveCommand('2', accountDetailOptions)).toBe('add-note')
    expect(resolveCommand('time', accountDetailOptions)).toBe('activity')
    expect(resolveCommand('up', accountDetailOptions)).toBe('edit-account')
    expect(resolveCommand('5', accountDetailOptions)).toBe('back')
  })

  it('reads back prefixes and a plain exit as leaving the account detail', () => {
    expect(resolveCommand('b', accountDetailOptions)).toBe('back')
    expect(resolveCommand('ba', accountDetailOptions)).toBe('back')
    expect(resolveCommand('cl', accountDetailOptions)).toBe('back')
    expect(resolveCommand('exit', accountDetailOptions)).toBe('back')
  })
})
