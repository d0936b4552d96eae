export * from './shared/hotkeys'
export type * from './shared/app-state'
export type * from './shared/history'
export type * from './main/core/capabilities'

export { EventBus } from './main/core/event-bus'
export type { EventMap, EventListener } from './main/core/event-bus'
export { HotkeyStateMachine } from './main/core/hotkey-state-machine'
export type { HotkeyEvents, HotkeyStateMachineOptions } from './main/core/hotkey-state-machine'
export { HotkeyListener } from './main/core/hotkey-listener'
export type { KeyEventHandlers, KeyEventSource, ListenerEvents, ListenerStatus } from './main/core/hotkey-listener'
export { BackgroundWorkPool, SerialDispatcher } from './main/core/background-pool'
export { PipelineOrchestrator, combinePrompt, formatHistoryText } from './main/core/pipeline-orchestrator'
export type { PipelineDeps, PipelineEvents, PipelineOptions } from './main/core/pipeline-orchestrator'
export { AppController } from './main/core/app-controller'
export type { AppControllerDeps, AppControllerOptions, AppEvents, AppStatus } from './main/core/app-controller'

export { DEFAULT_APP_SETTINGS, loadAppSettings, saveAppSettings, mergeAppSettings, normalizeAppSettings } from './main/config'
export { FileSettingsSource } from './main/config/settings-source'
export * as constants from './main/config/constants'

export { UiohookKeyEventSource } from './main/services/keyboard-hook-service'
export { OpenRouterClient } from './main/services/llm/openrouter-client'
export { OllamaClient } from './main/services/llm/ollama-client'
export { ClipboardService } from './main/services/clipboard-service'
export { SoundNotificationPlayer } from './main/services/notification-player'
export { SystemSpeechSynthesizer } from './main/services/speech-service'
export { SoxAudioCapture } from './main/audio/audio-recorder'
export { OpenAITranscriber, createTranscriber } from './main/transcriber'
export { FileHistoryLog, parseHistoryEntry } from './main/storage/history-log'

export { Logger, createModuleLogger } from './main/utils/logger'
export { KeyTalkError } from './main/utils/errors'
export type { KeyTalkErrorCode } from './main/utils/errors'
