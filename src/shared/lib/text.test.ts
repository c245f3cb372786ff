import { describe, expect, it } from 'vitest'
import { stripAnsi, stripControl, titleCase, truncateVisible, visibleLength } from './text'

describe('text helpers', () => {
  it('measures text without escape sequences', () => {
    expect(stripAnsi('\x1b[1mbold\x1b[22m')).toBe('bold')
    expect(visibleLength('\x1b[1mbold\x1b[22m text')).toBe(9)
  })

  it('counts wide characters as two columns', () => {
    expect(visibleLength('📚 Reader')).toBe(9)
    expect(visibleLength('日本語')).toBe(6)
  })

  it('strips control characters but keeps tabs and newlines', () => {
    expect(stripControl('hi \x1b[2J\x1b]0;owned\x07 there')).toBe('hi [2J]0;owned there')
    expect(stripControl('a\tb\nc\r\x7f\x85')).toBe('a\tb\nc')
  })

  it('leaves short lines alone', () => {
    expect(truncateVisible('hello', 5)).toBe('hello')
    expect(truncateVisible('hello', 0)).toBe('hello')
  })

  it('truncates with an ellipsis', () => {
    expect(truncateVisible('hello world', 6)).toBe('hello…')
  })

  it('truncates by terminal columns', () => {
    expect(truncateVisible('日本語のタイトル', 7)).toBe('日本語…')
  })

  it('keeps escape sequences and resets styling when truncating', () => {
    expect(truncateVisible('\x1b[1mhello world\x1b[22m', 4)).toBe('\x1b[1mhel…\x1b[0m')
  })

  it('title-cases unknown locations', () => {
    expect(titleCase('inbox')).toBe('Inbox')
    expect(titleCase('READING list')).toBe('Reading List')
    expect(titleCase('to-do')).toBe('To-Do')
    expect(titleCase('my_pile')).toBe('My_pile')
  })
})
