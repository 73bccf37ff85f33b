import { EventEmitter } from 'events';
import type { BootstrapState } from '../bootstrap/types.js';

export interface BootstrapLogEvent {
  timestamp: Date;
  message: string;
  level: 'info' | 'error' | 'warn';
  step?: string;
}

export interface BootstrapStatusEvent {
  state: BootstrapState;
  timestamp: Date;
  step?: string;
  error?: string;
}

class BootstrapEventEmitter extends EventEmitter {
  emitLog(event: BootstrapLogEvent) {
    this.emit('log', event);
  }

  emitStatus(event: BootstrapStatusEvent) {
    this.emit('status', event);
  }

  onLog(handler: (event: BootstrapLogEvent) => void) {
    this.on('log', handler);
  }

  onStatus(handler: (event: BootstrapStatusEvent) => void) {
    this.on('status', handler);
  }

  removeLogListener(handler: (event: BootstrapLogEvent) => void) {
    this.off('log', handler);
  }

  removeStatusListener(handler: (event: BootstrapStatusEvent) => void) {
    this.off('status', handler);
  }
}

export type { BootstrapEventEmitter };

// Singleton instance
export const bootstrapEvents = new BootstrapEventEmitter();
