import { describe, it, expect } from 'vitest'
import { findPathVariables, replacePathVariables, resolveActionPath } from '../../client/path-variables'

describe('path variables', () => {
  it('should find template variables in order', () => {
    expect(findPathVariables('/repos/{{owner}}/{{repo}}/stargazers')).toEqual(['owner', 'repo'])
    expect(findPathVariables('/user/starred')).toEqual([])
  })

  it('should replace every occurrence', () => {
    expect(replacePathVariables('/a/{{id}}/b/{{id}}', { id: 7 })).toBe('/a/7/b/7')
  })

  it('should throw for a variable without a value', () => {
    expect(() => replacePathVariables('/a/{{id}}', {})).toThrow('Missing value for path variable: id')
  })

  describe('resolveActionPath', () => {
    it('should leave paths without variables untouched', () => {
      const data = { name: 'x' }
      expect(resolveActionPath('/user/repos', data)).toEqual({ path: '/user/repos', data })
    })

    it('should move variables out of the body without mutating it', () => {
      const data = { owner: 'octo', repo: 'hello', description: 'demo' }

      const resolved = resolveActionPath('/repos/{{owner}}/{{repo}}', data)

      expect(resolved).toEqual({ path: '/repos/octo/hello', data: { description: 'demo' } })
      expect(data).toEqual({ owner: 'octo', repo: 'hello', description: 'demo' })
    })

    it('should prefer explicit path variables over the body', () => {
      const resolved = resolveActionPath('/repos/{{owner}}', { owner: 'body' }, { owner: 'explicit' })

      expect(resolved).toEqual({ path: '/repos/explicit', data: { owner: 'body' } })
    })

    it('should not take object values from the body', () => {
      expect(() => resolveActionPath('/items/{{id}}', { id: { nested: true } })).toThrow(
        'Missing required path variables: id. Please provide values for these variables.'
      )
    })

    it('should list each missing variable once', () => {
      expect(() => resolveActionPath('/a/{{x}}/b/{{x}}/c/{{y}}', ['not', 'an', 'object'])).toThrow(
        'Missing required path variables: x, y. Please provide values for these variables.'
      )
    })
  })
})
