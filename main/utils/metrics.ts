/**
 * 流程阶段耗时统计
 *
 * 录音、转写、LLM 增强、剪贴板投递各自累计；整条流程另按模式分组
 */

import crypto from 'node:crypto'
import type { TransmissionMode } from '../../shared/hotkeys'
import { createModuleLogger } from './logger'

const logger = createModuleLogger('metrics')

export type PipelineStage = 'recording' | 'transcription' | 'augmentation' | 'delivery' | 'pipeline'

export interface StageSample {
  mode?: TransmissionMode
  failed?: boolean
}

export interface StageStats {
  count: number
  failures: number
  totalMs: number
  avgMs: number
  minMs: number
  maxMs: number
}

export interface MetricsReport {
  stages: Partial<Record<PipelineStage, StageStats>>
  pipelineByMode: Partial<Record<TransmissionMode, StageStats>>
}

function accumulate(existing: StageStats | undefined, durationMs: number, failed: boolean): StageStats {
  if (!existing) {
    return {
      count: 1,
      failures: failed ? 1 : 0,
      totalMs: durationMs,
      avgMs: durationMs,
      minMs: durationMs,
      maxMs: durationMs,
    }
  }
  const count = existing.count + 1
  const totalMs = existing.totalMs + durationMs
  return {
    count,
    failures: existing.failures + (failed ? 1 : 0),
    totalMs,
    avgMs: Math.round(totalMs / count),
    minMs: Math.min(existing.minMs, durationMs),
    maxMs: Math.max(existing.maxMs, durationMs),
  }
}

export class MetricsCollector {
  private static instance: MetricsCollector
  private readonly timers = new Map<string, number>()
  private readonly stages = new Map<PipelineStage, StageStats>()
  private readonly modes = new Map<TransmissionMode, StageStats>()

  private constructor() {}

  static getInstance(): MetricsCollector {
    if (!MetricsCollector.instance) {
      MetricsCollector.instance = new MetricsCollector()
    }
    return MetricsCollector.instance
  }

  startTimer(stage: PipelineStage): string {
    const id = `${stage}_${crypto.randomUUID()}`
    this.timers.set(id, performance.now())
    return id
  }

  /**
   * 结束计时并计入统计，返回耗时；计时器不存在时返回 null
   */
  endTimer(timerId: string, stage: PipelineStage, sample: StageSample = {}): number | null {
    const startedAt = this.timers.get(timerId)
    if (startedAt === undefined) {
      logger.warn('计时器不存在', { timerId, stage })
      return null
    }
    this.timers.delete(timerId)

    const durationMs = Math.round(performance.now() - startedAt)
    const failed = sample.failed === true
    this.stages.set(stage, accumulate(this.stages.get(stage), durationMs, failed))
    if (stage === 'pipeline' && sample.mode) {
      this.modes.set(sample.mode, accumulate(this.modes.get(sample.mode), durationMs, failed))
    }

    logger.debug('阶段耗时', { stage, durationMs, ...sample })
    return durationMs
  }

  getStats(stage: PipelineStage): StageStats | null {
    const stats = this.stages.get(stage)
    return stats ? { ...stats } : null
  }

  getModeStats(mode: TransmissionMode): StageStats | null {
    const stats = this.modes.get(mode)
    return stats ? { ...stats } : null
  }

  clear(): void {
    this.timers.clear()
    this.stages.clear()
    this.modes.clear()
  }

  exportReport(): MetricsReport {
    const report: MetricsReport = { stages: {}, pipelineByMode: {} }
    for (const [stage, stats] of this.stages) {
      report.stages[stage] = { ...stats }
    }
    for (const [mode, stats] of this.modes) {
      report.pipelineByMode[mode] = { ...stats }
    }
    return report
  }
}

export const metrics = MetricsCollector.getInstance()
