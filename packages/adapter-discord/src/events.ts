import { EventEmitter } from "node:events";
import type { AdapterSnapshot, InboundMessage, SendResult } from "./types.js";

export type AdapterEvents = {
  message: [msg: InboundMessage];
  reply: [msg: InboundMessage, result: SendResult];
  connected: [snapshot: AdapterSnapshot];
  disconnected: [snapshot: AdapterSnapshot, reason?: string];
  error: [error: Error, context?: string];
  status: [snapshot: AdapterSnapshot];
};

export class TypedEventEmitter extends EventEmitter {
  override emit<K extends keyof AdapterEvents>(event: K, ...args: AdapterEvents[K]): boolean {
    return super.emit(event, ...args);
  }

  override on<K extends keyof AdapterEvents>(event: K, listener: (...args: AdapterEvents[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }
}
