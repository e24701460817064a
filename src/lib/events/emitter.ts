import { EventEmitter } from 'events'
import { DeploymentEvent, DeploymentEventInput } from './types'

type EventOfType<T extends DeploymentEvent['type']> = Extract<DeploymentEvent, { type: T }>

/**
 * Type-safe event emitter for deployment events.
 * Extends Node.js EventEmitter with typed event methods.
 */
export class DeploymentEventEmitter extends EventEmitter {
  /**
   * Emits a deployment event with automatic timestamp injection.
   */
  public emitEvent(event: DeploymentEventInput): void {
    const fullEvent = {
      ...event,
      timestamp: new Date()
    }

    // Emit on both the specific event type and a general 'event' channel
    this.emit(event.type, fullEvent)
    this.emit('event', fullEvent)
  }

  public onEvent<T extends DeploymentEvent['type']>(
    eventType: T,
    listener: (event: EventOfType<T>) => void
  ): this {
    return this.on(eventType, listener)
  }

  /**
   * Listen to all events.
   */
  public onAnyEvent(listener: (event: DeploymentEvent) => void): this {
    return this.on('event', listener)
  }

  public onceEvent<T extends DeploymentEvent['type']>(
    eventType: T,
    listener: (event: EventOfType<T>) => void
  ): this {
    return this.once(eventType, listener)
  }

  public offEvent<T extends DeploymentEvent['type']>(
    eventType: T,
    listener: (event: EventOfType<T>) => void
  ): this {
    return this.off(eventType, listener)
  }
}

// Singleton instance for global access
export const deploymentEvents = new DeploymentEventEmitter()
