/**
 * 依赖检测服务
 *
 * 检测录音、剪贴板、提示音与朗读依赖的系统命令是否可用
 */

import { execFileAsync } from '../utils/process'

export interface DependencyStatus {
  name: string
  purpose: string
  installed: boolean
}

interface RequiredCommand {
  name: string
  purpose: string
}

/**
 * 当前平台需要的外部命令
 */
export function getRequiredCommands(platform: NodeJS.Platform = process.platform): RequiredCommand[] {
  const recorder = { name: 'sox', purpose: 'recording' }
  switch (platform) {
    case 'darwin':
      return [recorder, { name: 'pbcopy', purpose: 'clipboard' }, { name: 'afplay', purpose: 'notification' }, { name: 'say', purpose: 'speech' }]
    case 'win32':
      return [recorder, { name: 'powershell', purpose: 'clipboard' }]
    default:
      return [recorder, { name: 'xclip', purpose: 'clipboard' }, { name: 'aplay', purpose: 'notification' }, { name: 'espeak', purpose: 'speech' }]
  }
}

/**
 * 检测单个命令是否在 PATH 中
 */
export async function checkCommand(name: string): Promise<boolean> {
  const locator = process.platform === 'win32' ? 'where' : 'which'
  try {
    await execFileAsync(locator, [name], { timeout: 5000 })
    return true
  } catch {
    return false
  }
}

/**
 * 检测所有依赖
 */
export async function checkAllDependencies(): Promise<{ allInstalled: boolean; dependencies: DependencyStatus[] }> {
  const dependencies = await Promise.all(
    getRequiredCommands().map(async command => ({
      ...command,
      installed: await checkCommand(command.name),
    }))
  )
  return {
    allInstalled: dependencies.every(dep => dep.installed),
    dependencies,
  }
}
