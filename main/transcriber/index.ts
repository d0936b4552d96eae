import type { TranscriptionConfig } from '../../shared/app-state'
import type { Transcriber } from '../core/capabilities'
import { OpenAITranscriber } from './openai-transcriber'

export type { Transcriber, TranscriptionResult } from '../core/capabilities'
export { OpenAITranscriber, parseSegments } from './openai-transcriber'

export function createTranscriber(config: TranscriptionConfig): Transcriber & { updateConfig(config: TranscriptionConfig): void } {
  return new OpenAITranscriber(config)
}
