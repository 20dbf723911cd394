/**
 * Desk event bus — publishing side effects (sheet export, audit logs) subscribe here
 * instead of being called inline from the workflow.
 */

import { EventEmitter } from 'events';
import type { SignalRecord } from '../types/signal';

export interface DeskEvents {
  published: [record: SignalRecord];
  deleted: [record: SignalRecord];
}

type DeskEventName = keyof DeskEvents;

export class DeskEventBus extends EventEmitter {
  private send<K extends DeskEventName>(event: K, ...args: DeskEvents[K]): void {
    this.emit(event, ...args);
  }

  private subscribe<K extends DeskEventName>(event: K, handler: (...args: DeskEvents[K]) => void): void {
    this.on(event, handler);
  }

  emitPublished(record: SignalRecord): void {
    this.send('published', record);
  }

  emitDeleted(record: SignalRecord): void {
    this.send('deleted', record);
  }

  onPublished(handler: (record: SignalRecord) => void): void {
    this.subscribe('published', handler);
  }

  onDeleted(handler: (record: SignalRecord) => void): void {
    this.subscribe('deleted', handler);
  }
}
