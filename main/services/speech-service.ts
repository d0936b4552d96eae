/**
 * 系统朗读
 *
 * macOS say，Windows System.Speech，Linux espeak
 */

import type { SpeechSynthesizer } from '../core/capabilities'
import { runWithInput, type CommandSpec } from '../utils/process'
import { createModuleLogger, type Logger } from '../utils/logger'

export function getSpeechCommand(platform: NodeJS.Platform = process.platform): CommandSpec {
  switch (platform) {
    case 'darwin':
      return { command: 'say', args: ['-f', '-'] }
    case 'win32':
      return {
        command: 'powershell',
        args: [
          '-NoProfile',
          '-Command',
          'Add-Type -AssemblyName System.Speech; (New-Object System.Speech.Synthesis.SpeechSynthesizer).Speak([Console]::In.ReadToEnd())',
        ],
      }
    default:
      return { command: 'espeak', args: ['--stdin'] }
  }
}

export class SystemSpeechSynthesizer implements SpeechSynthesizer {
  private readonly command: CommandSpec

  constructor(
    platform: NodeJS.Platform = process.platform,
    private readonly timeoutMs = 5 * 60 * 1000,
    private readonly logger: Logger = createModuleLogger('speech')
  ) {
    this.command = getSpeechCommand(platform)
  }

  async speak(text: string): Promise<void> {
    this.logger.info('开始朗读', { length: text.length })
    // 文本走标准输入，避免命令行长度与转义问题
    await runWithInput(this.command, text, this.timeoutMs)
  }
}
