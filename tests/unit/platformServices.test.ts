/**
 * Platform Service Tests
 *
 * Command selection per platform; child processes are mocked.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { execFileAsync, runForOutput, runWithInput } from '../../main/utils/process'
import { ClipboardService, getClipboardCommands } from '../../main/services/clipboard-service'
import { SoundNotificationPlayer, buildPlayCommand } from '../../main/services/notification-player'
import { SystemSpeechSynthesizer, getSpeechCommand } from '../../main/services/speech-service'
import { getRequiredCommands } from '../../main/services/dependency-checker'
import { SoxAudioCapture } from '../../main/audio/audio-recorder'
import { StubSettings, silentLogger } from '../helpers/fakes'

vi.mock('../../main/utils/process', () => ({
  execFileAsync: vi.fn(async () => ({ stdout: '', stderr: '' })),
  runWithInput: vi.fn(async () => {}),
  runForOutput: vi.fn(async () => ''),
}))

describe('clipboard', () => {
  beforeEach(() => {
    vi.mocked(runWithInput).mockClear()
    vi.mocked(runForOutput).mockReset()
  })

  it('selects the platform clipboard tools', () => {
    expect(getClipboardCommands('darwin')).toEqual({
      read: { command: 'pbpaste', args: [] },
      write: { command: 'pbcopy', args: [] },
    })
    expect(getClipboardCommands('linux').read).toEqual({ command: 'xclip', args: ['-selection', 'clipboard', '-o'] })
    expect(getClipboardCommands('win32').write.command).toBe('powershell')
  })

  it('writes text through standard input', async () => {
    const clipboard = new ClipboardService('linux', silentLogger())

    await clipboard.setText('hello world')

    expect(runWithInput).toHaveBeenCalledWith({ command: 'xclip', args: ['-selection', 'clipboard'] }, 'hello world')
  })

  it('strips the trailing newline PowerShell adds', async () => {
    vi.mocked(runForOutput).mockResolvedValueOnce('copied text\r\n')
    const clipboard = new ClipboardService('win32', silentLogger())

    expect(await clipboard.getText()).toBe('copied text')
  })

  it('returns pbpaste output unchanged', async () => {
    vi.mocked(runForOutput).mockResolvedValueOnce('line one\n')
    const clipboard = new ClipboardService('darwin', silentLogger())

    expect(await clipboard.getText()).toBe('line one\n')
  })
})

describe('notification sounds', () => {
  beforeEach(() => {
    vi.mocked(execFileAsync).mockClear()
  })

  it('builds a player command per platform', () => {
    expect(buildPlayCommand('/sounds/ding.wav', 0.5, 'darwin')).toEqual({
      command: 'afplay',
      args: ['-v', '0.50', '/sounds/ding.wav'],
    })
    expect(buildPlayCommand('/sounds/ding.wav', 0.5, 'linux')).toEqual({ command: 'aplay', args: ['-q', '/sounds/ding.wav'] })
    expect(buildPlayCommand("C:\\it's\\ding.wav", 1, 'win32').args[2])
      .toBe("(New-Object Media.SoundPlayer 'C:\\it''s\\ding.wav').PlaySync()")
  })

  it('plays the configured file with the latest volume', async () => {
    const settings = new StubSettings({ notification: { enabled: true, soundFile: '/sounds/ding.wav' } })
    const player = new SoundNotificationPlayer(settings, 'darwin', silentLogger())

    settings.update({ notification: { volume: 0.25 } })
    await player.play('speechToText')

    expect(execFileAsync).toHaveBeenCalledWith('afplay', ['-v', '0.25', '/sounds/ding.wav'], { timeout: 10000 })
    player.destroy()
  })

  it('does nothing without a sound file', async () => {
    const player = new SoundNotificationPlayer(new StubSettings(), 'darwin', silentLogger())

    await player.play('llmResponse')

    expect(execFileAsync).not.toHaveBeenCalled()
  })
})

describe('speech', () => {
  it('selects the platform synthesizer', () => {
    expect(getSpeechCommand('darwin')).toEqual({ command: 'say', args: ['-f', '-'] })
    expect(getSpeechCommand('linux')).toEqual({ command: 'espeak', args: ['--stdin'] })
  })

  it('speaks through standard input', async () => {
    vi.mocked(runWithInput).mockClear()
    const speech = new SystemSpeechSynthesizer('linux', 1000, silentLogger())

    await speech.speak('read this aloud')

    expect(runWithInput).toHaveBeenCalledWith({ command: 'espeak', args: ['--stdin'] }, 'read this aloud', 1000)
  })
})

describe('dependencies', () => {
  it('always requires the recorder', () => {
    for (const platform of ['darwin', 'win32', 'linux'] as const) {
      expect(getRequiredCommands(platform)[0]).toEqual({ name: 'sox', purpose: 'recording' })
    }
    expect(getRequiredCommands('linux').map(command => command.name)).toEqual(['sox', 'xclip', 'aplay', 'espeak'])
  })
})

describe('SoxAudioCapture', () => {
  it('records 16-bit PCM with the configured format', () => {
    const capture = new SoxAudioCapture({ sampleRate: 16000, channels: 1 }, 'sox', silentLogger())

    expect(capture.buildArgs('/tmp/clip.wav')).toEqual([
      '-q', '-d', '-r', '16000', '-c', '1', '-b', '16', '-e', 'signed-integer', '/tmp/clip.wav',
    ])

    capture.updateConfig({ sampleRate: 44100, channels: 2 })
    expect(capture.buildArgs('/tmp/clip.wav').slice(2, 6)).toEqual(['-r', '44100', '-c', '2'])
  })

  it('rejects stopping when nothing is recording', async () => {
    const capture = new SoxAudioCapture({ sampleRate: 16000, channels: 1 }, 'sox', silentLogger())

    expect(capture.isRecording()).toBe(false)
    await expect(capture.stopRecording()).rejects.toThrow('当前没有进行中的录音')
  })
})
