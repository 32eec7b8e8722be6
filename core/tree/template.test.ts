import { describe, it, expect } from 'vitest'
import { renderTemplate } from './template.js'

describe('renderTemplate', () => {
  it('should replace placeholders with or without inner spaces', () => {
    expect(renderTemplate('Hello {{ name }} and {{name}}!', { name: 'world' })).toBe('Hello world and world!')
  })

  it('should look up dotted keys in nested objects', () => {
    expect(renderTemplate('v{{ app.version }}', { app: { version: 2 } })).toBe('v2')
  })

  it('should stringify numbers and booleans', () => {
    expect(renderTemplate('{{ count }}/{{ debug }}', { count: 0, debug: false })).toBe('0/false')
  })

  it('should leave unknown, null and object values untouched', () => {
    const vars = { empty: null, app: { name: 'demo' } }
    expect(renderTemplate('{{ missing }} {{ empty }} {{ app }} {{ app.name.first }}', vars)).toBe(
      '{{ missing }} {{ empty }} {{ app }} {{ app.name.first }}'
    )
  })

  it('should accept dashes in keys', () => {
    expect(renderTemplate('{{ app-name }}', { 'app-name': 'demo' })).toBe('demo')
  })
})
