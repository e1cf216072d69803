import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { InventoryMessage } from '@fleetmon/shared';

export interface UpsertedEvent {
  nodeName: string;
  ip: string;
  socId: string;
  boardId: string;
  timestamp: Date;
}

export interface RejectedEvent {
  nodeName: string;
  code: string;
  reason: string;
  timestamp: Date;
}

export interface PersistenceErrorEvent {
  nodeName: string;
  error: string;
  timestamp: Date;
}

export type EventMap = {
  'telemetry:upserted': UpsertedEvent;
  'telemetry:rejected': RejectedEvent;
  'inventory:received': InventoryMessage;
  'persistence:error': PersistenceErrorEvent;
  'gateway:stopped': undefined;
};

export type EventName = keyof EventMap;

/** What `onAny` subscribers and the websocket feed receive for each emitted event. */
export interface EventEnvelope<K extends EventName = EventName> {
  id: string;
  type: K;
  source: 'gateway';
  timestamp: Date;
  data: EventMap[K];
}

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for subscribers that want everything
    const message: EventEnvelope<K> = {
      id: nanoid(),
      type: event,
      source: 'gateway',
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler as (...args: unknown[]) => void);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler as (...args: unknown[]) => void);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler as (...args: unknown[]) => void);
  }

  onAny(handler: (message: EventEnvelope) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventEnvelope) => void): void {
    this.emitter.off('*', handler);
  }

  listenerCount(event: EventName | '*'): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
