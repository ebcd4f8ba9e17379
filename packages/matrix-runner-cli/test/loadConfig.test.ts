import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { MatrixConfigurationError } from '@shardrun/matrix-runner-core'
import { afterEach, describe, expect, it } from 'vitest'

import { loadMatrixRunnerConfig } from '../src/config/loadConfig.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createDirectory = async (): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), 'matrix-runner-cli-config-'))
  createdDirectories.push(directory)
  return directory
}

const writeJsonConfig = async (directory: string, value: unknown): Promise<void> => {
  await writeFile(resolve(directory, 'ci.matrix.json'), JSON.stringify(value), 'utf8')
}

describe('loadMatrixRunnerConfig', () => {
  it('loads ci.matrix.json', async () => {
    const directory = await createDirectory()
    await writeJsonConfig(directory, {
      env: ['RUST_BACKTRACE=1'],
      script: ['cargo test'],
      parallel: 'unlimited',
      matrix: {
        toolchains: ['stable', { toolchain: 'nightly', tag: 'miri' }],
        include: [{ tag: 'rustfmt', script: ['cargo fmt -- --check'] }],
        allowFailures: [{ toolchain: 'nightly' }],
        fastFinish: true,
      },
    })

    const loaded = await loadMatrixRunnerConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'ci.matrix.json'))
    expect(loaded.config.env).toEqual(['RUST_BACKTRACE=1'])
    expect(loaded.config.parallel).toBe('unlimited')
    expect(loaded.config.matrix.toolchains).toEqual([
      'stable',
      { toolchain: 'nightly', tag: 'miri' },
    ])
    expect(loaded.config.matrix.include?.[0]?.tag).toBe('rustfmt')
    expect(loaded.config.matrix.allowFailures?.[0]?.toolchain).toBe('nightly')
    expect(loaded.config.matrix.fastFinish).toBe(true)
  })

  it('loads ci.matrix.ts default export before ci.matrix.json', async () => {
    const directory = await createDirectory()
    await writeJsonConfig(directory, { script: ['json'], matrix: { toolchains: ['json'] } })
    await writeFile(
      resolve(directory, 'ci.matrix.ts'),
      [
        'const toolchains: string[] = ["stable", "beta"]',
        'export default {',
        '  script: ["cargo build"],',
        '  matrix: { toolchains },',
        '}',
      ].join('\n'),
      'utf8'
    )

    const loaded = await loadMatrixRunnerConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'ci.matrix.ts'))
    expect(loaded.config.script).toEqual(['cargo build'])
    expect(loaded.config.matrix.toolchains).toEqual(['stable', 'beta'])
  })

  it('loads a named config export', async () => {
    const directory = await createDirectory()
    await writeFile(
      resolve(directory, 'custom.ts'),
      'export const config = { script: ["make"], matrix: { toolchains: ["gcc"] } }\n',
      'utf8'
    )

    const loaded = await loadMatrixRunnerConfig(directory, 'custom.ts')

    expect(loaded.config.matrix.toolchains).toEqual(['gcc'])
  })

  it('fails when no description exists', async () => {
    const directory = await createDirectory()

    await expect(loadMatrixRunnerConfig(directory)).rejects.toThrow(
      'No matrix description found. Expected ci.matrix.ts or ci.matrix.json'
    )
  })

  it('fails when an explicit path is missing', async () => {
    const directory = await createDirectory()

    await expect(loadMatrixRunnerConfig(directory, 'missing.json')).rejects.toThrow(
      `Matrix description not found: ${resolve(directory, 'missing.json')}`
    )
  })

  it('reports malformed JSON as a configuration error', async () => {
    const directory = await createDirectory()
    await writeFile(resolve(directory, 'ci.matrix.json'), '{ "matrix": ', 'utf8')

    const loading = loadMatrixRunnerConfig(directory)

    await expect(loading).rejects.toBeInstanceOf(MatrixConfigurationError)
    await expect(loading).rejects.toThrow(
      `Failed to parse ${resolve(directory, 'ci.matrix.json')}`
    )
  })

  it.each([
    [{ script: ['make'] }, 'matrix: must be an object'],
    [{ matrix: { toolchains: 'stable' } }, 'matrix.toolchains: must be an array'],
    [{ matrix: { toolchains: [''] } }, 'matrix.toolchains[0]: must be a non-empty string'],
    [{ matrix: { include: [{ name: 'x' }] } }, 'matrix.include[0]: must set toolchain or tag'],
    [{ matrix: { fastFinish: 'yes' } }, 'matrix.fastFinish: must be a boolean'],
    [{ matrix: {}, parallel: 0 }, 'parallel: must be a positive integer or "unlimited"'],
    [{ matrix: {}, stepTimeoutMs: -5 }, 'stepTimeoutMs: must be a positive number'],
    [{ matrix: {}, env: { CI: 1 } }, 'env.CI: must be a string'],
    [{ matrix: {}, env: ['CI'] }, 'env[0]: expected KEY=VALUE, got "CI"'],
    [{ matrix: {}, output: { format: 'xml' } }, 'output.format: must be "pretty" or "json"'],
    [
      { matrix: { allowFailures: [{ env: [1] }] } },
      'matrix.allowFailures[0].env[0]: must be a KEY=VALUE string',
    ],
  ])('rejects invalid description %#', async (value, message) => {
    const directory = await createDirectory()
    await writeJsonConfig(directory, value)

    await expect(loadMatrixRunnerConfig(directory)).rejects.toThrow(message)
  })
})
