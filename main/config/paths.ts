/**
 * KeyTalk 路径配置模块
 *
 * 所有持久化目录都位于用户数据目录下，可通过 KEYTALK_HOME 覆盖
 */

import path from 'node:path'
import os from 'node:os'

const APP_DIR_NAME = 'KeyTalk'

/**
 * 获取项目根目录（内置配置模板所在位置）
 */
export function getAppRoot(): string {
  return process.env.APP_ROOT ?? path.resolve(__dirname, '..', '..')
}

/**
 * 获取用户数据目录
 * - macOS: ~/Library/Application Support/KeyTalk/
 * - Windows: %APPDATA%/KeyTalk/
 * - Linux: ~/.config/KeyTalk/
 */
export function getUserDataPath(): string {
  if (process.env.KEYTALK_HOME) {
    return process.env.KEYTALK_HOME
  }

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR_NAME)
  }
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA ?? path.join(os.homedir(), 'AppData', 'Roaming'), APP_DIR_NAME)
  }
  return path.join(process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config'), APP_DIR_NAME)
}

/**
 * 获取配置目录（用户配置）
 */
export function getConfigDir(): string {
  return path.join(getUserDataPath(), 'config')
}

/**
 * 获取项目内置配置目录（默认配置模板）
 */
export function getBundledConfigDir(): string {
  return path.join(getAppRoot(), 'config')
}

export function getLogsDir(): string {
  return path.join(getUserDataPath(), 'logs')
}

/**
 * 获取历史记录目录
 */
export function getHistoryDir(): string {
  return path.join(getUserDataPath(), 'history')
}

/**
 * 获取录音目录，开启保留录音时文件随历史记录一起清理
 */
export function getRecordingsDir(): string {
  return path.join(getUserDataPath(), 'recordings')
}
