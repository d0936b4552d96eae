/**
 * 提示音播放
 *
 * 读取当前通知设置，通过平台命令播放配置的音频文件
 */

import type { NotificationConfig, NotificationKind } from '../../shared/app-state'
import type { NotificationPlayer, SettingsSource } from '../core/capabilities'
import { execFileAsync, type CommandSpec } from '../utils/process'
import { createModuleLogger, type Logger } from '../utils/logger'

export function buildPlayCommand(file: string, volume: number, platform: NodeJS.Platform = process.platform): CommandSpec {
  switch (platform) {
    case 'darwin':
      return { command: 'afplay', args: ['-v', volume.toFixed(2), file] }
    case 'win32':
      return {
        command: 'powershell',
        args: ['-NoProfile', '-Command', `(New-Object Media.SoundPlayer '${file.replace(/'/g, "''")}').PlaySync()`],
      }
    default:
      return { command: 'aplay', args: ['-q', file] }
  }
}

export class SoundNotificationPlayer implements NotificationPlayer {
  private config: NotificationConfig
  private readonly unsubscribe: () => void

  constructor(
    settings: SettingsSource,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly logger: Logger = createModuleLogger('notification')
  ) {
    this.config = settings.current().notification
    this.unsubscribe = settings.subscribe(next => {
      this.config = next.notification
    })
  }

  async play(kind: NotificationKind): Promise<void> {
    const { soundFile, volume } = this.config
    if (!soundFile) return

    const { command, args } = buildPlayCommand(soundFile, volume, this.platform)
    await execFileAsync(command, args, { timeout: 10000 })
    this.logger.debug('提示音已播放', { kind })
  }

  destroy(): void {
    this.unsubscribe()
  }
}
