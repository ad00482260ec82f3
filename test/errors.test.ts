import { describe, it, expect } from 'vitest'
import {
  FadError,
  RepositoryAccessError,
  PathOutsideRepositoryError,
  IndexWriteError,
  MalformedPatternError,
  isFadError,
  isRepositoryAccessError,
  isPathOutsideRepositoryError,
  isIndexWriteError,
  isMalformedPatternError,
  hasErrorCode,
} from '../src/errors'

describe('FadError', () => {
  describe('base class', () => {
    it('should create error with message and code', () => {
      const error = new FadError('Something went wrong', 'INDEX_WRITE')
      expect(error.message).toBe('Something went wrong')
      expect(error.code).toBe('INDEX_WRITE')
      expect(error.name).toBe('FadError')
      expect(error).toBeInstanceOf(Error)
      expect(error).toBeInstanceOf(FadError)
    })

    it('should default to UNKNOWN code', () => {
      expect(new FadError('Unknown error').code).toBe('UNKNOWN')
    })

    it('should carry cause, path and operation', () => {
      const cause = new Error('Root cause')
      const error = new FadError('Wrapper error', 'UNKNOWN', { cause, path: '/repo/a.txt', operation: 'write-blob' })
      expect(error.cause).toBe(cause)
      expect(error.path).toBe('/repo/a.txt')
      expect(error.operation).toBe('write-blob')
    })

    it('should serialize to JSON', () => {
      const error = new FadError('Test error', 'REPOSITORY_ACCESS', {
        cause: new Error('Root cause'),
        path: '/repo',
        operation: 'read-index',
      })
      const json = error.toJSON()
      expect(json.name).toBe('FadError')
      expect(json.message).toBe('Test error')
      expect(json.code).toBe('REPOSITORY_ACCESS')
      expect(json.path).toBe('/repo')
      expect(json.operation).toBe('read-index')
      expect(json.cause).toBe('Root cause')
      expect(json.stack).toBeDefined()
    })

    it('should serialize a non-Error cause as is', () => {
      expect(new FadError('x', 'UNKNOWN', { cause: 'EACCES' }).toJSON().cause).toBe('EACCES')
    })
  })
})

describe('RepositoryAccessError', () => {
  it('should use the REPOSITORY_ACCESS code', () => {
    const error = new RepositoryAccessError('cannot read index', { path: '/repo/.git/index', operation: 'read-index' })
    expect(error.code).toBe('REPOSITORY_ACCESS')
    expect(error.name).toBe('RepositoryAccessError')
    expect(error).toBeInstanceOf(FadError)
  })

  it('should build the not-a-repository error', () => {
    const cause = new Error('ENOENT')
    const error = RepositoryAccessError.notARepository('/work/plain', cause)
    expect(error.message).toBe('not a git repository: /work/plain')
    expect(error.path).toBe('/work/plain')
    expect(error.operation).toBe('open-repository')
    expect(error.cause).toBe(cause)
  })
})

describe('PathOutsideRepositoryError', () => {
  it('should name the path and the root', () => {
    const error = new PathOutsideRepositoryError('../x.txt', '/repo')
    expect(error.message).toBe('path ../x.txt is not inside repository /repo')
    expect(error.code).toBe('PATH_OUTSIDE_REPOSITORY')
    expect(error.path).toBe('../x.txt')
    expect(error.root).toBe('/repo')
    expect(error.toJSON().root).toBe('/repo')
  })
})

describe('IndexWriteError', () => {
  it('should use the INDEX_WRITE code', () => {
    const error = new IndexWriteError('index is locked', { path: '/repo/.git/index.lock' })
    expect(error.code).toBe('INDEX_WRITE')
    expect(error.name).toBe('IndexWriteError')
    expect(error.path).toBe('/repo/.git/index.lock')
  })
})

describe('MalformedPatternError', () => {
  it('should keep the pattern and cause', () => {
    const cause = new TypeError('pattern is too long')
    const error = new MalformedPatternError('[', cause)
    expect(error.message).toBe('malformed glob pattern: [')
    expect(error.pattern).toBe('[')
    expect(error.code).toBe('MALFORMED_PATTERN')
    expect(error.operation).toBe('compile-glob')
    expect(error.cause).toBe(cause)
  })
})

describe('Type guards', () => {
  const errors = {
    base: new FadError('x'),
    access: new RepositoryAccessError('x'),
    outside: new PathOutsideRepositoryError('a', '/r'),
    index: new IndexWriteError('x'),
    pattern: new MalformedPatternError('['),
  }

  it('should recognise every subclass as a FadError', () => {
    for (const error of Object.values(errors)) {
      expect(isFadError(error)).toBe(true)
    }
    expect(isFadError(new Error('plain'))).toBe(false)
    expect(isFadError('string')).toBe(false)
  })

  it('should tell the subclasses apart', () => {
    expect(isRepositoryAccessError(errors.access)).toBe(true)
    expect(isRepositoryAccessError(errors.index)).toBe(false)
    expect(isPathOutsideRepositoryError(errors.outside)).toBe(true)
    expect(isPathOutsideRepositoryError(errors.base)).toBe(false)
    expect(isIndexWriteError(errors.index)).toBe(true)
    expect(isIndexWriteError(errors.pattern)).toBe(false)
    expect(isMalformedPatternError(errors.pattern)).toBe(true)
    expect(isMalformedPatternError(errors.access)).toBe(false)
  })

  it('should check error codes', () => {
    expect(hasErrorCode(errors.index, 'INDEX_WRITE')).toBe(true)
    expect(hasErrorCode(errors.index, 'REPOSITORY_ACCESS')).toBe(false)
    expect(hasErrorCode(new Error('plain'), 'UNKNOWN')).toBe(false)
  })
})
