import type {
  MatrixReporter,
  MatrixRunPolicy,
  RunVerdict,
  Shard,
  ShardReport,
  StepResult,
} from '@shardrun/matrix-runner-core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Emits stdout/stderr also for successful steps. */
  readonly verbose: boolean
}

/**
 * Console reporter with shard-prefixed, failure-focused output.
 */
export class PrettyReporter implements MatrixReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  /**
   * Handles run start.
   *
   * @param shards Scheduled shards.
   * @param policy Active run policy.
   */
  public onRunStart(shards: readonly Shard[], policy: MatrixRunPolicy): void {
    const fastFinish = policy.fastFinish ? 'on' : 'off'
    process.stdout.write(
      colorize(
        `matrix-runner: executing ${shards.length} shards (fast finish ${fastFinish})\n`,
        'blue'
      )
    )
  }

  /**
   * Handles shard start.
   *
   * @param shard Current shard.
   */
  public onShardStart(shard: Shard): void {
    const allowed = shard.allowFailure ? ' (allowed to fail)' : ''
    process.stdout.write(colorize(`-> [${shard.id}] ${shard.name}${allowed}\n`, 'blue'))
  }

  /**
   * Handles step completion.
   *
   * @param shard Owning shard.
   * @param result Step result.
   */
  public onStepComplete(shard: Shard, result: StepResult): void {
    const prefix = `  [${shard.id}]`
    const duration = `${result.durationMs}ms`

    if (result.status === 'passed') {
      process.stdout.write(colorize(`${prefix} ✓ ${result.command} ${duration}\n`, 'green'))
      if (this.options.verbose) {
        this.printOutput(result)
      }
      return
    }

    if (result.status === 'cancelled') {
      process.stdout.write(colorize(`${prefix} ℹ ${result.command} cancelled\n`, 'yellow'))
      return
    }

    const exit = result.exitCode === null ? 'no exit code' : `exit ${result.exitCode}`
    const details = `${result.reason ?? 'no reason'}, ${exit}, ${duration}`
    process.stdout.write(
      colorize(`${prefix} ✗ ${result.command} ${result.status} (${details})\n`, 'red')
    )
    if (result.error) {
      process.stdout.write(colorize(`    error: ${result.error}\n`, 'red'))
    }
    this.printOutput(result)
  }

  /**
   * Handles shard completion, including shards that never started.
   *
   * @param report Shard report.
   */
  public onShardComplete(report: ShardReport): void {
    const duration = `${report.durationMs}ms`

    if (report.status === 'passed') {
      process.stdout.write(colorize(`✓ ${report.id} passed ${duration}\n`, 'green'))
      return
    }

    if (report.status === 'skipped') {
      process.stdout.write(
        colorize(`ℹ ${report.id} skipped (${report.reason ?? 'no reason'})\n`, 'yellow')
      )
      return
    }

    if (report.allowFailure) {
      const details = `${report.reason ?? 'no reason'}, allowed failure, ${duration}`
      process.stdout.write(colorize(`⚠ ${report.id} failed (${details})\n`, 'yellow'))
      return
    }

    process.stdout.write(
      colorize(`✗ ${report.id} failed (${report.reason ?? 'no reason'}, ${duration})\n`, 'red')
    )
  }

  /**
   * Handles run completion.
   *
   * @param verdict Run verdict.
   */
  public onRunComplete(verdict: RunVerdict): void {
    const summary = verdict.summary
    process.stdout.write('\n')
    const counts = [
      `total=${summary.total}`,
      `passed=${summary.passed}`,
      `failed=${summary.failed}`,
      `allowedFailures=${summary.allowedFailures}`,
      `skipped=${summary.skipped}`,
      `duration=${summary.durationMs}ms`,
    ]
    process.stdout.write(`Summary: ${counts.join(' ')}\n`)

    const fastFinished = verdict.fastFinished ? ' (fast finish)' : ''
    if (verdict.status === 'success') {
      process.stdout.write(colorize(`Result: ✅ PASS${fastFinished}\n`, 'green'))
      return
    }

    process.stdout.write(colorize(`Result: FAIL${fastFinished}\n`, 'red'))
  }

  private printOutput(result: StepResult): void {
    const stdout = result.stdout.trim()
    const stderr = result.stderr.trim()

    if (stdout) {
      process.stdout.write(colorize('    stdout:\n', 'yellow'))
      process.stdout.write(indent(stdout))
      process.stdout.write('\n')
    }

    if (stderr) {
      process.stdout.write(colorize('    stderr:\n', 'yellow'))
      process.stdout.write(indent(stderr))
      process.stdout.write('\n')
    }
  }
}

const indent = (text: string): string => {
  return text
    .split('\n')
    .map((line) => `      ${line}`)
    .join('\n')
}

const colorize = (text: string, color: 'red' | 'green' | 'yellow' | 'blue'): string => {
  const colors: Record<'red' | 'green' | 'yellow' | 'blue', string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
