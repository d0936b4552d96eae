/**
 * SoxAudioCapture Tests
 *
 * node:child_process is replaced with scripted child processes.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'node:events'
import { SoxAudioCapture } from '../../main/audio/audio-recorder'
import { silentLogger } from '../helpers/fakes'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({
  spawn: spawnMock,
}))

class ScriptedChild extends EventEmitter {
  exitCode: number | null = null
  readonly pid = 4242
  readonly stderr = new EventEmitter()
  readonly signals: string[] = []

  kill(signal: string): boolean {
    this.signals.push(signal)
    this.exit(0)
    return true
  }

  exit(code: number): void {
    this.exitCode = code
    this.emit('close', code)
  }
}

describe('SoxAudioCapture process lifecycle', () => {
  let children: ScriptedChild[]

  function createCapture(): SoxAudioCapture {
    return new SoxAudioCapture({ sampleRate: 16000, channels: 1 }, 'sox', silentLogger())
  }

  beforeEach(() => {
    children = []
    spawnMock.mockReset()
    spawnMock.mockImplementation(() => {
      const child = new ScriptedChild()
      children.push(child)
      return child
    })
  })

  it('rejects a second start while the first process is still spawning', async () => {
    const capture = createCapture()

    const first = capture.startRecording('/tmp/first.wav')
    const second = capture.startRecording('/tmp/second.wav')

    await expect(second).rejects.toThrow('已有录音在进行中')
    expect(spawnMock).toHaveBeenCalledTimes(1)

    children[0]?.emit('spawn')
    await first
    expect(capture.isRecording()).toBe(true)

    await capture.stopRecording()
    expect(children[0]?.signals).toEqual(['SIGINT'])
    expect(capture.isRecording()).toBe(false)
  })

  it('allows a new recording after the process fails to spawn', async () => {
    const capture = createCapture()

    const failed = capture.startRecording('/tmp/first.wav')
    children[0]?.emit('error', new Error('spawn sox ENOENT'))
    await expect(failed).rejects.toThrow('spawn sox ENOENT')

    const retry = capture.startRecording('/tmp/second.wav')
    children[1]?.emit('spawn')
    await retry

    expect(spawnMock).toHaveBeenCalledTimes(2)
    expect(capture.isRecording()).toBe(true)
  })

  it('forgets a recorder that exits on its own', async () => {
    const capture = createCapture()

    const started = capture.startRecording('/tmp/first.wav')
    children[0]?.emit('spawn')
    await started
    children[0]?.exit(1)

    expect(capture.isRecording()).toBe(false)
    await expect(capture.stopRecording()).rejects.toThrow('当前没有进行中的录音')
  })
})
