/**
 * 基于 settings.json 的设置源
 *
 * 缓存一份只读快照，变更时按注册顺序通知订阅者
 */

import type { AppSettings, AppSettingsPatch } from '../../shared/app-state'
import type { SettingsListener, SettingsSource } from '../core/capabilities'
import { loadAppSettings, saveAppSettings, type ConfigLocation } from './index'
import { createModuleLogger, type Logger } from '../utils/logger'
import { toError } from '../utils/errors'

function freeze(settings: AppSettings): AppSettings {
  for (const value of Object.values(settings)) {
    Object.freeze(value)
  }
  Object.freeze(settings.llm.openRouter)
  Object.freeze(settings.llm.ollama)
  return Object.freeze(settings)
}

export class FileSettingsSource implements SettingsSource {
  private snapshot: AppSettings
  private listeners: SettingsListener[] = []

  constructor(
    private readonly location: ConfigLocation = {},
    private readonly logger: Logger = createModuleLogger('settings')
  ) {
    this.snapshot = freeze(loadAppSettings(location))
  }

  current(): AppSettings {
    return this.snapshot
  }

  subscribe(listener: SettingsListener): () => void {
    this.listeners.push(listener)
    return () => {
      const index = this.listeners.indexOf(listener)
      if (index > -1) {
        this.listeners.splice(index, 1)
      }
    }
  }

  /**
   * 写入补丁并广播新快照
   */
  update(patch: AppSettingsPatch): AppSettings {
    this.snapshot = freeze(saveAppSettings(patch, this.location))
    this.notifyListeners()
    return this.snapshot
  }

  /**
   * 重新从磁盘读取（外部修改了 settings.json 时使用）
   */
  reload(): AppSettings {
    this.snapshot = freeze(loadAppSettings(this.location))
    this.notifyListeners()
    return this.snapshot
  }

  private notifyListeners(): void {
    const snapshot = this.snapshot
    this.listeners.slice().forEach(listener => {
      try {
        listener(snapshot)
      } catch (error) {
        this.logger.error(toError(error), { context: 'settings-listener' })
      }
    })
  }
}
