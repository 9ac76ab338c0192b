import { EventEmitter } from 'events'
import { CompilationEvent, CompilationEventInput } from '../types/events'

/**
 * Type-safe event emitter for compilation events.
 * Extends Node.js EventEmitter with typed event methods.
 */
export class CompilationEventEmitter extends EventEmitter {
  /**
   * Emits a compilation event with automatic timestamp injection.
   */
  public emitEvent(event: CompilationEventInput): void {
    const fullEvent = {
      ...event,
      timestamp: new Date()
    }

    // Emit on both the specific event type and a general 'event' channel
    this.emit(event.type, fullEvent)
    this.emit('event', fullEvent)
  }

  public onEvent<T extends CompilationEvent>(
    eventType: T['type'],
    listener: (event: T) => void
  ): this {
    return this.on(eventType, listener)
  }

  /**
   * Listen to all events.
   */
  public onAnyEvent(listener: (event: CompilationEvent) => void): this {
    return this.on('event', listener)
  }

  public onceEvent<T extends CompilationEvent>(
    eventType: T['type'],
    listener: (event: T) => void
  ): this {
    return this.once(eventType, listener)
  }

  public offEvent<T extends CompilationEvent>(
    eventType: T['type'],
    listener: (event: T) => void
  ): this {
    return this.off(eventType, listener)
  }

  public offAnyEvent(listener: (event: CompilationEvent) => void): this {
    return this.off('event', listener)
  }
}

// Singleton instance for global access
export const compilationEvents = new CompilationEventEmitter()
