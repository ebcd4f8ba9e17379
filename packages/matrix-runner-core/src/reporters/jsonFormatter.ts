import type { RunVerdict, ShardReport } from '../contracts/run.js'
import type { StepResult } from '../contracts/step.js'

/**
 * Serialized form of a run verdict.
 */
export interface RunVerdictDocument {
  readonly status: RunVerdict['status']
  readonly exitCode: RunVerdict['exitCode']
  readonly fastFinished: boolean
  readonly summary: RunVerdict['summary']
  readonly startedAt: number
  readonly finishedAt: number
  readonly shards: readonly ShardDocument[]
}

interface ShardDocument {
  readonly id: string
  readonly name: string
  readonly toolchain: string | null
  readonly tag: string | null
  readonly allowFailure: boolean
  readonly status: ShardReport['status']
  readonly reason: ShardReport['reason'] | null
  readonly blocking: boolean
  readonly durationMs: number
  readonly steps: readonly StepDocument[]
}

interface StepDocument {
  readonly phase: StepResult['phase']
  readonly command: string
  readonly status: StepResult['status']
  readonly reason: StepResult['reason'] | null
  readonly exitCode: number | null
  readonly signal: string | null
  readonly durationMs: number
  readonly error: string | null
  readonly stdout: string
  readonly stderr: string
}

/**
 * Converts a verdict into its JSON document shape. Absent optional fields become null.
 *
 * @param verdict Run verdict.
 * @returns Plain document in shard order.
 */
export const toRunVerdictDocument = (verdict: RunVerdict): RunVerdictDocument => {
  return {
    status: verdict.status,
    exitCode: verdict.exitCode,
    fastFinished: verdict.fastFinished,
    summary: verdict.summary,
    startedAt: verdict.startedAt,
    finishedAt: verdict.finishedAt,
    shards: verdict.shards.map(toShardDocument),
  }
}

/**
 * Formats a run verdict as JSON output.
 *
 * @param verdict Run verdict.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatRunVerdictAsJson = (verdict: RunVerdict, indentation = 2): string => {
  return JSON.stringify(toRunVerdictDocument(verdict), null, indentation)
}

const toShardDocument = (report: ShardReport): ShardDocument => {
  return {
    id: report.id,
    name: report.name,
    toolchain: report.toolchain ?? null,
    tag: report.tag ?? null,
    allowFailure: report.allowFailure,
    status: report.status,
    reason: report.reason ?? null,
    blocking: report.blocking,
    durationMs: report.durationMs,
    steps: report.steps.map(toStepDocument),
  }
}

const toStepDocument = (step: StepResult): StepDocument => {
  return {
    phase: step.phase,
    command: step.command,
    status: step.status,
    reason: step.reason ?? null,
    exitCode: step.exitCode,
    signal: step.signal,
    durationMs: step.durationMs,
    error: step.error ?? null,
    stdout: step.stdout,
    stderr: step.stderr,
  }
}
