/**
 * 系统剪贴板
 *
 * 通过平台自带命令读写：macOS pbcopy/pbpaste，Windows PowerShell，Linux xclip
 */

import type { ClipboardSink } from '../core/capabilities'
import { runForOutput, runWithInput, type CommandSpec } from '../utils/process'
import { createModuleLogger, type Logger } from '../utils/logger'

interface ClipboardCommands {
  read: CommandSpec
  write: CommandSpec
}

export function getClipboardCommands(platform: NodeJS.Platform = process.platform): ClipboardCommands {
  switch (platform) {
    case 'darwin':
      return {
        read: { command: 'pbpaste', args: [] },
        write: { command: 'pbcopy', args: [] },
      }
    case 'win32':
      return {
        read: { command: 'powershell', args: ['-NoProfile', '-Command', 'Get-Clipboard -Raw'] },
        write: { command: 'powershell', args: ['-NoProfile', '-Command', '[Console]::In.ReadToEnd() | Set-Clipboard'] },
      }
    default:
      return {
        read: { command: 'xclip', args: ['-selection', 'clipboard', '-o'] },
        write: { command: 'xclip', args: ['-selection', 'clipboard'] },
      }
  }
}

export class ClipboardService implements ClipboardSink {
  private readonly commands: ClipboardCommands

  constructor(
    platform: NodeJS.Platform = process.platform,
    private readonly logger: Logger = createModuleLogger('clipboard')
  ) {
    this.commands = getClipboardCommands(platform)
  }

  async setText(text: string): Promise<void> {
    await runWithInput(this.commands.write, text)
    this.logger.debug('剪贴板已写入', { length: text.length })
  }

  async getText(): Promise<string> {
    const output = await runForOutput(this.commands.read)
    // PowerShell 会在末尾追加换行
    return this.commands.read.command === 'powershell' ? output.replace(/\r?\n$/, '') : output
  }
}
