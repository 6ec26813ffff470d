import { EventEmitter } from 'eventemitter3';
import type { BagcheckEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof BagcheckEvents>(event: K, listener: (data: BagcheckEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof BagcheckEvents>(event: K, listener: (data: BagcheckEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof BagcheckEvents>(event: K, listener: (data: BagcheckEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof BagcheckEvents>(event: K, data: BagcheckEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
