import { describe, it, expect } from 'vitest'
import { containersAuthPropertyNameMatch } from '../src/core/ociauth/match.js'
import {
  DomainCredentialsSpecificity,
  NoCredentialsSpecificity,
  repositoryCredentialsSpecificity
} from '../src/core/ociauth/specificity.js'

describe('containersAuthPropertyNameMatch', () => {
  const cases: Array<[string, string, number]> = [
    ['example.net', 'foo', DomainCredentialsSpecificity],
    ['example.net/foo', 'foo', repositoryCredentialsSpecificity(1)],
    ['example.net/foo', 'foo/bar', repositoryCredentialsSpecificity(1)],
    ['example.net/foo/bar', 'foo', NoCredentialsSpecificity],
    ['example.net/foo/bar', 'foo/bar', repositoryCredentialsSpecificity(2)],
    ['example.net/foo/bar', 'foo/bar/baz', repositoryCredentialsSpecificity(2)],
    ['example.net/foo/not-bar', 'foo/bar', NoCredentialsSpecificity],
    ['example.net/not-foo', 'foo/bar', NoCredentialsSpecificity]
  ]

  it.each(cases)('%s against example.net/%s', (propName, wantPath, want) => {
    expect(containersAuthPropertyNameMatch(propName, 'example.net', wantPath)).toBe(want)
  })

  it('never matches an empty name', () => {
    expect(containersAuthPropertyNameMatch('', 'example.net', 'foo')).toBe(NoCredentialsSpecificity)
  })

  it('never matches another domain', () => {
    expect(containersAuthPropertyNameMatch('example.com', 'example.net', 'foo')).toBe(NoCredentialsSpecificity)
    expect(containersAuthPropertyNameMatch('example.com/foo', 'example.net', 'foo')).toBe(NoCredentialsSpecificity)
  })

  it('matches segments exactly rather than by string prefix', () => {
    expect(containersAuthPropertyNameMatch('example.net/foo', 'example.net', 'foobar')).toBe(NoCredentialsSpecificity)
  })

  it('ignores names it cannot parse', () => {
    expect(containersAuthPropertyNameMatch('example.net/Not_Valid', 'example.net', 'Not_Valid')).toBe(NoCredentialsSpecificity)
  })

  it('matches bracketed IPv6 registry hosts', () => {
    expect(containersAuthPropertyNameMatch('[::1]:5000/foo', '[::1]:5000', 'foo/bar')).toBe(repositoryCredentialsSpecificity(1))
    expect(containersAuthPropertyNameMatch('[::1]:5000/foo', '[::1]:5001', 'foo/bar')).toBe(NoCredentialsSpecificity)
  })

  it('does not match a path rule when only the domain is requested', () => {
    expect(containersAuthPropertyNameMatch('example.net/foo', 'example.net', '')).toBe(NoCredentialsSpecificity)
  })
})
