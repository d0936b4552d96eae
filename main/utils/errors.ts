/**
 * 错误工具
 */

export type KeyTalkErrorCode =
  | 'RECORDING_FAILED'
  | 'ARTIFACT_MISSING'
  | 'TRANSCRIPTION_FAILED'
  | 'NO_SPEECH'
  | 'LLM_NOT_CONFIGURED'
  | 'LLM_FAILED'
  | 'CLIPBOARD_FAILED'
  | 'TTS_FAILED'
  | 'VISION_FAILED'
  | 'LISTENER_FATAL'
  | 'CONFIG_INVALID'

export class KeyTalkError extends Error {
  readonly code: KeyTalkErrorCode

  constructor(code: KeyTalkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'KeyTalkError'
    this.code = code
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * 判断是否为 Node 文件系统错误，可选匹配错误码
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) return false
  return code === undefined || error.code === code
}
