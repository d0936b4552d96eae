/**
 * MetricsCollector Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MetricsCollector, metrics } from '../../main/utils/metrics'

describe('MetricsCollector', () => {
  beforeEach(() => {
    metrics.clear()
  })

  it('is a process-wide singleton', () => {
    expect(MetricsCollector.getInstance()).toBe(metrics)
  })

  it('aggregates finished timers per stage and counts failures', () => {
    const first = metrics.startTimer('transcription')
    const second = metrics.startTimer('transcription')
    expect(first).not.toBe(second)

    expect(metrics.endTimer(first, 'transcription')).toBeGreaterThanOrEqual(0)
    metrics.endTimer(second, 'transcription', { failed: true })

    const stats = metrics.getStats('transcription')
    expect(stats).toMatchObject({ count: 2, failures: 1 })
    expect(stats?.minMs).toBeLessThanOrEqual(stats?.maxMs ?? 0)
    expect(metrics.getStats('delivery')).toBeNull()
  })

  it('ignores unknown timers', () => {
    expect(metrics.endTimer('missing', 'pipeline')).toBeNull()
    expect(metrics.exportReport()).toEqual({ stages: {}, pipelineByMode: {} })
  })

  it('groups whole pipelines by transmission mode', () => {
    metrics.endTimer(metrics.startTimer('pipeline'), 'pipeline', { mode: 'prompt' })
    metrics.endTimer(metrics.startTimer('pipeline'), 'pipeline', { mode: 'prompt' })
    metrics.endTimer(metrics.startTimer('augmentation'), 'augmentation', { mode: 'prompt' })

    expect(metrics.getModeStats('prompt')?.count).toBe(2)
    expect(metrics.getModeStats('plain')).toBeNull()

    const report = metrics.exportReport()
    expect(Object.keys(report.stages)).toEqual(['pipeline', 'augmentation'])
    expect(Object.keys(report.pipelineByMode)).toEqual(['prompt'])
    expect(report.stages.pipeline?.count).toBe(2)
  })
})
