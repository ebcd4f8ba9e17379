import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import {
  MatrixConfigurationError,
  type CommandExecutionRequest,
  type CommandExecutor,
} from '@shardrun/matrix-runner-core'
import { afterEach, describe, expect, it, vi } from 'vitest'

import { CliUsageError } from '../src/cliOptions.js'
import { getExitCodeForError } from '../src/exitCodes.js'
import { runCliMatrix, type RunCliMatrixOptions } from '../src/runMatrix.js'

const ANSI_ESCAPE_PATTERN = new RegExp(String.raw`\u001B\[[0-?]*[ -/]*[@-~]`, 'gu')
const EXAMPLE_PATH = fileURLToPath(
  new URL('../examples/rust-toolchains.matrix.json', import.meta.url)
)

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

describe('runCliMatrix', () => {
  it('runs every shard and returns 0 when all pass', async () => {
    const directory = await createConfigDirectory({
      script: ['make test'],
      toolchainVariable: 'CC',
      matrix: { toolchains: ['gcc', 'clang'] },
    })
    const fake = createFakeExecutor(() => false)

    const { result: exitCode, output } = await captureStdout(() =>
      runCliMatrix(createOptions(directory, { executor: fake.executor }))
    )

    expect(exitCode).toBe(0)
    expect(fake.requests.map((request) => request.env.CC).sort()).toEqual(['clang', 'gcc'])
    expect(fake.requests.every((request) => request.cwd === directory)).toBe(true)
    expect(output).toContain('matrix-runner: executing 2 shards (fast finish off)')
    expect(output).toContain('Result: ✅ PASS')
  })

  it('returns 1 and prints the JSON verdict when a blocking shard fails', async () => {
    const directory = await createConfigDirectory({
      script: ['make test'],
      toolchainVariable: 'CC',
      matrix: { toolchains: ['gcc', 'clang'] },
    })
    const fake = createFakeExecutor((request) => request.env.CC === 'clang')

    const { result: exitCode, output } = await captureStdout(() =>
      runCliMatrix(
        createOptions(directory, { executor: fake.executor, format: 'json', formatProvided: true })
      )
    )
    const verdict = parseVerdict(output)

    expect(exitCode).toBe(1)
    expect(verdict.status).toBe('failure')
    expect(verdict.shards.map((shard) => [shard.id, shard.status])).toEqual([
      ['gcc', 'passed'],
      ['clang', 'failed'],
    ])
    expect(verdict.summary.failed).toBe(1)
  })

  it('returns 0 when only allowed failures fail', async () => {
    const directory = await createConfigDirectory({
      script: ['make test'],
      toolchainVariable: 'CC',
      output: { format: 'json' },
      matrix: { toolchains: ['gcc', 'clang'], allowFailures: [{ toolchain: 'clang' }] },
    })
    const fake = createFakeExecutor((request) => request.env.CC === 'clang')

    const { result: exitCode, output } = await captureStdout(() =>
      runCliMatrix(createOptions(directory, { executor: fake.executor }))
    )
    const verdict = parseVerdict(output)

    expect(exitCode).toBe(0)
    expect(verdict.summary.allowedFailures).toBe(1)
    expect(verdict.summary.failed).toBe(0)
  })

  it('prefers an explicit --format over the description output format', async () => {
    const directory = await createConfigDirectory({
      script: ['make test'],
      output: { format: 'json' },
      matrix: { toolchains: ['gcc'] },
    })
    const fake = createFakeExecutor(() => false)

    const { output } = await captureStdout(() =>
      runCliMatrix(
        createOptions(directory, {
          executor: fake.executor,
          format: 'pretty',
          formatProvided: true,
        })
      )
    )

    expect(output.split('\n')[0]).toBe('matrix-runner: executing 1 shards (fast finish off)')
  })

  it('runs only the selected shards', async () => {
    const directory = await createConfigDirectory({
      script: ['make test'],
      toolchainVariable: 'CC',
      matrix: { toolchains: ['gcc', 'clang'] },
    })
    const fake = createFakeExecutor(() => false)

    await captureStdout(() =>
      runCliMatrix(createOptions(directory, { executor: fake.executor, shardIds: ['clang'] }))
    )

    expect(fake.requests.map((request) => request.env.CC)).toEqual(['clang'])
  })

  it('lists the example matrix without running it', async () => {
    const fake = createFakeExecutor(() => false)

    const { result: exitCode, output } = await captureStdout(() =>
      runCliMatrix(
        createOptions(dirname(EXAMPLE_PATH), {
          command: 'list',
          configPath: EXAMPLE_PATH,
          executor: fake.executor,
        })
      )
    )

    expect(exitCode).toBe(0)
    expect(fake.requests).toEqual([])
    expect(output).toBe(
      [
        'Shards:',
        '- stable: stable [3 steps]',
        '- beta: beta [3 steps]',
        '- nightly: nightly [3 steps] (allowed to fail)',
        '- stable/rustfmt: stable/rustfmt [2 steps]',
        '- stable/clippy: stable/clippy [2 steps]',
        '- nightly/coverage: Coverage (nightly) [2 steps] (allowed to fail)',
        '',
      ].join('\n')
    )
  })

  it('lists shards as JSON', async () => {
    const { output } = await captureStdout(() =>
      runCliMatrix(
        createOptions(dirname(EXAMPLE_PATH), {
          command: 'list',
          configPath: EXAMPLE_PATH,
          format: 'json',
        })
      )
    )
    const payload = JSON.parse(output) as { shards: unknown[] }

    expect(payload.shards).toHaveLength(6)
    expect(payload.shards[5]).toEqual({
      id: 'nightly/coverage',
      name: 'Coverage (nightly)',
      toolchain: 'nightly',
      tag: 'coverage',
      allowFailure: true,
      stepCount: 2,
      env: { RUST_BACKTRACE: '1', RUST_TOOLCHAIN: 'nightly', SHARD: 'coverage' },
    })
  })

  it('runs the example matrix with its per-shard steps', async () => {
    const fake = createFakeExecutor(() => false)

    const { result: exitCode } = await captureStdout(() =>
      runCliMatrix(
        createOptions(dirname(EXAMPLE_PATH), {
          configPath: EXAMPLE_PATH,
          executor: fake.executor,
        })
      )
    )
    const stableCommands = fake.requests
      .filter((request) => request.shardId === 'stable')
      .map((request) => request.command)

    expect(exitCode).toBe(0)
    expect(stableCommands).toEqual([
      'rustup default $RUST_TOOLCHAIN',
      'cargo build --verbose',
      'cargo test --verbose',
    ])
    expect(fake.requests.map((request) => request.command)).toContain('cargo fmt --all -- --check')
  })

  it('rejects a malformed description with a configuration error', async () => {
    const directory = await createConfigDirectory({ script: ['make'], matrix: { toolchains: [] } })

    const running = runCliMatrix(createOptions(directory))

    await expect(running).rejects.toBeInstanceOf(MatrixConfigurationError)
    await expect(running).rejects.toThrow('matrix: matrix defines no shards')
  })
})

describe('getExitCodeForError', () => {
  it('separates malformed input from internal errors', () => {
    expect(getExitCodeForError(new MatrixConfigurationError('bad', 'matrix'))).toBe(2)
    expect(getExitCodeForError(new CliUsageError('Unknown argument: --x'))).toBe(2)
    expect(getExitCodeForError(new Error('boom'))).toBe(3)
    expect(getExitCodeForError('boom')).toBe(3)
  })
})

interface ParsedVerdict {
  readonly status: string
  readonly shards: readonly { readonly id: string; readonly status: string }[]
  readonly summary: { readonly failed: number; readonly allowedFailures: number }
}

const parseVerdict = (output: string): ParsedVerdict => {
  return JSON.parse(output) as ParsedVerdict
}

const createOptions = (
  cwd: string,
  overrides: Partial<RunCliMatrixOptions> = {}
): RunCliMatrixOptions => {
  return {
    command: 'run',
    cwd,
    shardIds: [],
    format: 'pretty',
    verbose: false,
    ...overrides,
  }
}

const createConfigDirectory = async (config: unknown): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), 'matrix-runner-cli-run-'))
  createdDirectories.push(directory)
  await writeFile(resolve(directory, 'ci.matrix.json'), JSON.stringify(config), 'utf8')
  return directory
}

const createFakeExecutor = (
  fails: (request: CommandExecutionRequest) => boolean
): { executor: CommandExecutor; requests: CommandExecutionRequest[] } => {
  const requests: CommandExecutionRequest[] = []
  const executor: CommandExecutor = (request) => {
    requests.push(request)
    const failed = fails(request)

    return Promise.resolve({
      exitCode: failed ? 1 : 0,
      signal: null,
      stdout: '',
      stderr: failed ? 'failed' : '',
      timedOut: false,
      durationMs: 1,
      successful: !failed,
    })
  }

  return { executor, requests }
}

const captureStdout = async <T>(
  callback: () => Promise<T>
): Promise<{ result: T; output: string }> => {
  const chunks: string[] = []
  const writeSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'))
      return true
    })

  try {
    const result = await callback()
    return { result, output: chunks.join('').replaceAll(ANSI_ESCAPE_PATTERN, '') }
  } finally {
    writeSpy.mockRestore()
  }
}
