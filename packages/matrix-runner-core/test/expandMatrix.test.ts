import { describe, expect, it } from 'vitest'

import type { MatrixDefinition } from '../src/index.js'
import { createEnvironment, deriveShardId, expandMatrix } from '../src/index.js'

const createDefinition = (overrides: Partial<MatrixDefinition> = {}): MatrixDefinition => {
  return {
    base: createEnvironment(),
    defaultSteps: {
      before: [],
      script: ['run-tests'],
    },
    toolchains: [{ toolchain: 'stable' }, { toolchain: 'beta' }, { toolchain: 'nightly' }],
    include: [{ tag: 'rustfmt', allowFailure: false, steps: ['check-fmt'] }],
    allowFailures: [{ toolchain: 'nightly' }],
    fastFinish: true,
    ...overrides,
  }
}

describe('expandMatrix', () => {
  it('places implicit shards before included shards in listed order', () => {
    const shards = expandMatrix(createDefinition())

    expect(shards.map((shard) => shard.id)).toEqual(['stable', 'beta', 'nightly', 'rustfmt'])
    expect(shards.map((shard) => shard.index)).toEqual([0, 1, 2, 3])
    expect(shards.map((shard) => shard.origin)).toEqual([
      { source: 'toolchains', index: 0 },
      { source: 'toolchains', index: 1 },
      { source: 'toolchains', index: 2 },
      { source: 'include', index: 0 },
    ])
  })

  it('resolves allow-failure rules into the shard flag', () => {
    const shards = expandMatrix(createDefinition())

    expect(shards.map((shard) => shard.allowFailure)).toEqual([false, false, true, false])
  })

  it('uses default steps unless an include entry provides its own', () => {
    const shards = expandMatrix(
      createDefinition({
        defaultSteps: { before: ['setup'], script: ['run-tests'] },
      })
    )

    expect(shards[0]?.beforeSteps).toEqual(['setup'])
    expect(shards[0]?.steps).toEqual(['run-tests'])
    expect(shards[3]?.beforeSteps).toEqual(['setup'])
    expect(shards[3]?.steps).toEqual(['check-fmt'])
  })

  it('overlays include env patches on the base environment', () => {
    const shards = expandMatrix(
      createDefinition({
        base: createEnvironment({ PATH: '/usr/bin', SHARD: 'none' }),
        include: [
          {
            toolchain: 'stable',
            tag: 'clippy',
            env: createEnvironment({ SHARD: 'clippy' }),
            beforeSteps: ['install-clippy'],
            steps: ['run-clippy'],
          },
        ],
      })
    )

    expect(shards[0]?.env).toEqual({ PATH: '/usr/bin', SHARD: 'none' })
    expect(shards[3]?.id).toBe('stable/clippy')
    expect(shards[3]?.env).toEqual({ PATH: '/usr/bin', SHARD: 'clippy' })
    expect(shards[3]?.beforeSteps).toEqual(['install-clippy'])
  })

  it('exports the toolchain when a toolchain variable is configured', () => {
    const shards = expandMatrix(
      createDefinition({
        toolchainVariable: 'RUST_TOOLCHAIN',
        include: [
          {
            toolchain: 'stable',
            tag: 'pinned',
            env: createEnvironment({ RUST_TOOLCHAIN: '1.70.0' }),
          },
          { tag: 'docs' },
        ],
      })
    )

    expect(shards[1]?.env).toEqual({ RUST_TOOLCHAIN: 'beta' })
    expect(shards[3]?.env).toEqual({ RUST_TOOLCHAIN: '1.70.0' })
    expect(shards[4]?.env).toEqual({})
  })

  it('matches allow-failure rules against the resolved environment', () => {
    const shards = expandMatrix(
      createDefinition({
        include: [
          { toolchain: 'stable', tag: 'coverage', env: createEnvironment({ SHARD: 'coverage' }) },
          { toolchain: 'stable', tag: 'clippy', env: createEnvironment({ SHARD: 'clippy' }) },
        ],
        allowFailures: [{ env: createEnvironment({ SHARD: 'coverage' }) }],
      })
    )

    expect(shards.map((shard) => [shard.id, shard.allowFailure])).toEqual([
      ['stable', false],
      ['beta', false],
      ['nightly', false],
      ['stable/coverage', true],
      ['stable/clippy', false],
    ])
  })

  it('keeps an explicit allowFailure on include entries', () => {
    const shards = expandMatrix(
      createDefinition({
        include: [{ tag: 'audit', allowFailure: true }],
        allowFailures: [],
      })
    )

    expect(shards[3]?.allowFailure).toBe(true)
  })

  it('yields structurally identical shards when expanded twice', () => {
    const definition = createDefinition()

    expect(expandMatrix(definition)).toEqual(expandMatrix(definition))
  })

  it('returns frozen shards', () => {
    const shards = expandMatrix(createDefinition())

    expect(Object.isFrozen(shards)).toBe(true)
    expect(Object.isFrozen(shards[0])).toBe(true)
    expect(Object.isFrozen(shards[0]?.steps)).toBe(true)
  })

  it('rejects an include entry whose id collides with an implicit shard', () => {
    expect(() => expandMatrix(createDefinition({ include: [{ toolchain: 'stable' }] }))).toThrow(
      'include[0]: shard id "stable" is already defined by toolchains[0]'
    )
  })

  it('rejects two include entries resolving to the same id', () => {
    expect(() =>
      expandMatrix(createDefinition({ include: [{ tag: 'lint' }, { tag: 'lint' }] }))
    ).toThrow('include[1]: shard id "lint" is already defined by include[0]')
  })

  it('rejects shards without script steps', () => {
    expect(() =>
      expandMatrix(createDefinition({ defaultSteps: { before: ['setup'], script: [] } }))
    ).toThrow('toolchains[0]: shard "stable" has no script steps')

    expect(() =>
      expandMatrix(createDefinition({ include: [{ tag: 'empty', steps: [] }] }))
    ).toThrow('include[0]: shard "empty" has no script steps')
  })

  it('rejects a matrix without shards', () => {
    expect(() => expandMatrix(createDefinition({ toolchains: [], include: [] }))).toThrow(
      'matrix: matrix defines no shards'
    )
  })

  it('rejects include entries without toolchain or tag', () => {
    expect(() =>
      expandMatrix(createDefinition({ include: [{ steps: ['orphan'] }] }))
    ).toThrow('include[0]: include entries must set a toolchain or a tag')
  })

  it('rejects allow-failure rules that match nothing specific', () => {
    expect(() =>
      expandMatrix(createDefinition({ allowFailures: [{ env: createEnvironment() }] }))
    ).toThrow('allowFailures[0]: rule must match on toolchain, tag or env')
  })

  it('throws configuration errors with the entry path', () => {
    try {
      expandMatrix(createDefinition({ include: [{ toolchain: 'beta' }] }))
      expect.unreachable()
    } catch (error: unknown) {
      expect(error).toMatchObject({ name: 'MatrixConfigurationError', path: 'include[0]' })
    }
  })
})

describe('deriveShardId', () => {
  it('joins toolchain and tag', () => {
    expect(deriveShardId('stable', 'rustfmt')).toBe('stable/rustfmt')
    expect(deriveShardId('nightly')).toBe('nightly')
    expect(deriveShardId(undefined, 'docs')).toBe('docs')
  })
})
