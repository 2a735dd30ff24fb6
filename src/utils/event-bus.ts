/**
 * Engine Event Bus
 *
 * Lifecycle signals between the session, the token refresh coordinator and
 * the host application. Record changes do not travel here; they go through
 * the ChangeNotifier funnel.
 */

import { EventEmitter } from 'events';

export const EngineEvents = {
  /** Session started at login; dispatcher running */
  SESSION_STARTED: 'session:started',
  /** Session ended by an explicit logout */
  SESSION_ENDED: 'session:ended',
  /**
   * Session torn down because authentication can no longer be recovered
   * (refresh token rejected, or a 401 after a successful refresh).
   * The host must send the user back through login.
   */
  SESSION_TERMINATED: 'session:terminated',
} as const;

export type SessionTerminationReason = 'REFRESH_REJECTED' | 'AUTH_REJECTED_AFTER_REFRESH';

export interface EngineEventPayloads {
  [EngineEvents.SESSION_STARTED]: { userId: string };
  [EngineEvents.SESSION_ENDED]: { userId: string };
  [EngineEvents.SESSION_TERMINATED]: { userId: string; reason: SessionTerminationReason };
}

export type EngineEventName = keyof EngineEventPayloads;

export class EngineEventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(20);
  }

  on<E extends EngineEventName>(event: E, listener: (payload: EngineEventPayloads[E]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  once<E extends EngineEventName>(event: E, listener: (payload: EngineEventPayloads[E]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<E extends EngineEventName>(event: E, payload: EngineEventPayloads[E]): void {
    this.emitter.emit(event, payload);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
