/**
 * 子进程工具
 */

import { execFile, spawn } from 'node:child_process'
import { promisify } from 'node:util'

export const execFileAsync = promisify(execFile)

export interface CommandSpec {
  command: string
  args: string[]
}

/**
 * 运行命令并把 input 写入其标准输入，非零退出码视为失败
 */
export function runWithInput(spec: CommandSpec, input: string, timeoutMs = 5000): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, { stdio: ['pipe', 'ignore', 'pipe'] })
    let stderr = ''
    const timer = setTimeout(() => {
      child.kill('SIGKILL')
      reject(new Error(`${spec.command} 执行超时`))
    }, timeoutMs)

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })
    child.on('error', error => {
      clearTimeout(timer)
      reject(error)
    })
    // 进程提前退出时写入标准输入会触发 EPIPE
    child.stdin.on('error', error => {
      clearTimeout(timer)
      reject(error)
    })
    child.on('close', code => {
      clearTimeout(timer)
      if (code === 0) {
        resolve()
      } else {
        reject(new Error(`${spec.command} 退出码 ${code ?? 'null'}${stderr ? `: ${stderr.trim()}` : ''}`))
      }
    })

    child.stdin.end(input, 'utf-8')
  })
}

/**
 * 运行命令并返回标准输出
 */
export async function runForOutput(spec: CommandSpec, timeoutMs = 5000): Promise<string> {
  const { stdout } = await execFileAsync(spec.command, spec.args, {
    timeout: timeoutMs,
    encoding: 'utf-8',
    maxBuffer: 10 * 1024 * 1024,
  })
  return stdout
}
