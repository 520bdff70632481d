import { EventEmitter } from "node:events";

/** Maps each event name to the tuple of arguments its listeners receive. */
export type EventArgs<T> = { [K in keyof T]: unknown[] };

export class TypedEventEmitter<T extends EventArgs<T>> {
  private readonly emitter = new EventEmitter();

  on<K extends string & keyof T>(event: K, listener: (...args: T[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: (...args: T[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: (...args: T[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  emit<K extends string & keyof T>(event: K, ...args: T[K]): boolean {
    return this.emitter.emit(event, ...args);
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
