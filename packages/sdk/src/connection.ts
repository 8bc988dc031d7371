/**
 * TCP connection to an ESMP listener — newline-delimited JSON in both directions.
 *
 * The listener answers every line with exactly one reply line, in order, so
 * replies are matched to sends first-in first-out.
 */

import { EventEmitter } from 'node:events';
import { connect, type Socket } from 'node:net';
import { isRecord } from './wire.js';
import { PROTOCOL_ERROR_KINDS } from './types.js';
import type { DispatchReply, ThreadPosition } from './types.js';

interface Waiter {
  resolve: (reply: DispatchReply) => void;
  reject: (err: Error) => void;
}

function isThreadPosition(value: unknown): value is ThreadPosition {
  return isRecord(value) && typeof value.threadKey === 'string' && typeof value.seq === 'number';
}

/** Narrow one parsed reply line. Returns null when it is not a reply. */
export function parseReply(value: unknown): DispatchReply | null {
  if (!isRecord(value)) return null;
  if (value.ok === true) {
    const threads = value.threads;
    if (!Array.isArray(threads) || !threads.every(isThreadPosition)) return null;
    return { ok: true, threads };
  }
  const { error, message, field } = value;
  if (value.ok !== false || typeof message !== 'string') return null;
  const kind = error === 'InternalError' ? error : PROTOCOL_ERROR_KINDS.find((k) => k === error);
  if (!kind) return null;
  return { ok: false, error: kind, message, ...(typeof field === 'string' ? { field } : {}) };
}

export class EsmpConnection extends EventEmitter {
  private buffer = '';
  private pending: Waiter[] = [];
  private closed = false;

  private constructor(private socket: Socket) {
    super();
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (err) => this.failPending(err));
    socket.on('close', () => {
      this.closed = true;
      this.failPending(new Error('Connection closed'));
      this.emit('close');
    });
  }

  /** Open a connection to a listener. */
  static connect(port: number, host = '127.0.0.1'): Promise<EsmpConnection> {
    return new Promise((resolve, reject) => {
      const socket = connect({ port, host });
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        resolve(new EsmpConnection(socket));
      });
    });
  }

  /** Send one signed envelope and wait for its reply. */
  send(envelope: object): Promise<DispatchReply> {
    return this.sendLine(JSON.stringify(envelope));
  }

  /**
   * Send one raw line. The newline is added here. Blank lines are refused:
   * the listener skips them without a reply.
   */
  sendLine(line: string): Promise<DispatchReply> {
    if (this.closed) return Promise.reject(new Error('Connection closed'));
    if (line.trim() === '') return Promise.reject(new Error('Cannot send a blank line'));
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
      this.socket.write(`${line}\n`);
    });
  }

  /** Close the connection; resolves once the socket is closed. */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.end();
    });
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let idx: number;
    while ((idx = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + 1);
      if (line) this.onLine(line);
    }
  }

  private onLine(line: string): void {
    const waiter = this.pending.shift();
    let reply: DispatchReply | null = null;
    try {
      reply = parseReply(JSON.parse(line));
    } catch {
      reply = null;
    }
    if (!reply) {
      waiter?.reject(new Error(`Unreadable reply: ${line.slice(0, 80)}`));
      return;
    }
    if (waiter) {
      waiter.resolve(reply);
    } else {
      this.emit('reply', reply);
    }
  }

  private failPending(err: Error): void {
    const waiters = this.pending;
    this.pending = [];
    for (const waiter of waiters) waiter.reject(err);
  }
}
