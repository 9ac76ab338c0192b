/**
 * Event system for structured logging throughout the compile and export pipeline.
 * Library code emits these instead of writing to the console.
 */

export type EventLevel = 'info' | 'warn' | 'error' | 'debug'

export interface BaseEvent {
  type: string
  timestamp: Date
  level: EventLevel
}

// Compile lifecycle events
export interface CompileStartedEvent extends BaseEvent {
  type: 'compile_started'
  level: 'info'
  data: {
    target: string
  }
}

export interface PlatformDetectedEvent extends BaseEvent {
  type: 'platform_detected'
  level: 'info'
  data: {
    target: string
    platform: string
  }
}

export interface PlatformProbeFailedEvent extends BaseEvent {
  type: 'platform_probe_failed'
  level: 'debug'
  data: {
    platform: string
    error: string
  }
}

export interface CompileCompletedEvent extends BaseEvent {
  type: 'compile_completed'
  level: 'info'
  data: {
    target: string
    unitCount: number
    contractCount: number
  }
}

export interface CompileFailedEvent extends BaseEvent {
  type: 'compile_failed'
  level: 'error'
  data: {
    target: string
    error: string
  }
}

// External tool events
export interface ToolInvocationEvent extends BaseEvent {
  type: 'tool_invocation'
  level: 'info'
  data: {
    command: string
    cwd: string
  }
}

export interface ToolOutputEvent extends BaseEvent {
  type: 'tool_output'
  level: 'debug' | 'warn'
  data: {
    command: string
    stream: 'stdout' | 'stderr'
    output: string
  }
}

export interface TemporaryFileEvent extends BaseEvent {
  type: 'temporary_file_created'
  level: 'debug'
  data: {
    path: string
  }
}

// Compilation unit events
export interface CompilationUnitLoadedEvent extends BaseEvent {
  type: 'compilation_unit_loaded'
  level: 'debug'
  data: {
    key: string
    contractCount: number
    compiler: string
    version: string
  }
}

// Export / import events
export interface ExportWrittenEvent extends BaseEvent {
  type: 'export_written'
  level: 'info'
  data: {
    path: string
    unitCount: number
  }
}

export interface ArtifactImportedEvent extends BaseEvent {
  type: 'artifact_imported'
  level: 'info'
  data: {
    unitCount: number
    platformType: number
    legacy: boolean
  }
}

export interface UnknownPlatformWarningEvent extends BaseEvent {
  type: 'unknown_platform_warning'
  level: 'warn'
  data: {
    platformType: number
  }
}

export interface ConfigLoadedEvent extends BaseEvent {
  type: 'config_loaded'
  level: 'debug'
  data: {
    path: string
    ignoredKeys: string[]
  }
}

// Process-level failures
export interface UnhandledRejectionEvent extends BaseEvent {
  type: 'unhandled_rejection'
  level: 'error'
  data: {
    reason: unknown
  }
}

export interface UncaughtExceptionEvent extends BaseEvent {
  type: 'uncaught_exception'
  level: 'error'
  data: {
    error: unknown
  }
}

export interface CLIErrorEvent extends BaseEvent {
  type: 'cli_error'
  level: 'error'
  data: {
    message: string
  }
}

// Union type of all events
export type CompilationEvent =
  | CompileStartedEvent
  | PlatformDetectedEvent
  | PlatformProbeFailedEvent
  | CompileCompletedEvent
  | CompileFailedEvent
  | ToolInvocationEvent
  | ToolOutputEvent
  | TemporaryFileEvent
  | CompilationUnitLoadedEvent
  | ExportWrittenEvent
  | ArtifactImportedEvent
  | UnknownPlatformWarningEvent
  | ConfigLoadedEvent
  | UnhandledRejectionEvent
  | UncaughtExceptionEvent
  | CLIErrorEvent

type WithoutTimestamp<T> = T extends CompilationEvent ? Omit<T, 'timestamp'> : never

/**
 * What callers hand to `emitEvent`; the emitter fills in the timestamp.
 */
export type CompilationEventInput = WithoutTimestamp<CompilationEvent>
