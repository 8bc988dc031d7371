/**
 * TCP envelope listener — newline-delimited JSON, one reply line per line.
 *
 * Each connection is read as a byte stream split on '\n'. A line longer than
 * the configured limit is answered with MalformedInput and skipped up to the
 * next newline; the connection stays open. Lines are processed synchronously
 * in arrival order, so replies come back in the order lines were sent.
 */

import { createServer, type Server, type Socket } from 'node:net';
import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type { DispatchReply, Rejection } from 'esmp-sdk';
import { acceptEnvelope, parseLine, type Acceptance, type ServerContext } from './pipeline.js';

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

function rejectionReply(rejection: Rejection): DispatchReply {
  const { error, message, field } = rejection;
  return field === undefined ? { ok: false, error, message } : { ok: false, error, message, field };
}

/**
 * Emits 'accepted' with the pipeline result and 'rejected' with the Rejection.
 */
export class EsmpListener extends EventEmitter {
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();

  constructor(private readonly ctx: ServerContext) {
    super();
    this.server = createServer((socket) => this.onConnection(socket));
  }

  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number, host = '127.0.0.1'): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        resolve(typeof address === 'object' && address !== null ? address.port : port);
      });
    });
  }

  /** Stop accepting connections and drop the open ones. */
  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Process one line (without its newline) and build the reply.
   */
  handleLine(line: Uint8Array): DispatchReply {
    const parsed = parseLine(line);
    if (!parsed.ok) {
      this.emit('rejected', parsed);
      return rejectionReply(parsed);
    }

    let result: Acceptance;
    try {
      result = acceptEnvelope(this.ctx, parsed.value);
    } catch (err) {
      const requestId = randomUUID();
      console.error(`[esmp] Envelope ${requestId} error:`, err);
      return { ok: false, error: 'InternalError', message: `Internal server error (${requestId})` };
    }

    if (!result.ok) {
      this.emit('rejected', result);
      return rejectionReply(result);
    }
    this.emit('accepted', result);
    return { ok: true, threads: result.threads };
  }

  private onConnection(socket: Socket): void {
    this.sockets.add(socket);
    const maxLineBytes = this.ctx.config.maxLineBytes;

    let pending: Buffer[] = [];
    let pendingBytes = 0;
    // Set while skipping the rest of an over-long line
    let discarding = false;

    const reply = (message: DispatchReply) => {
      if (!socket.destroyed) socket.write(`${JSON.stringify(message)}\n`);
    };
    const overflow = () => {
      const rejection: Rejection = {
        ok: false,
        error: 'MalformedInput',
        message: `Line exceeds ${maxLineBytes} bytes`,
      };
      this.emit('rejected', rejection);
      reply(rejectionReply(rejection));
    };

    socket.on('data', (chunk: Buffer) => {
      let start = 0;
      for (;;) {
        const idx = chunk.indexOf(NEWLINE, start);
        if (idx === -1) {
          if (!discarding && start < chunk.length) {
            pending.push(chunk.subarray(start));
            pendingBytes += chunk.length - start;
            if (pendingBytes > maxLineBytes) {
              pending = [];
              pendingBytes = 0;
              discarding = true;
              overflow();
            }
          }
          return;
        }

        const piece = chunk.subarray(start, idx);
        start = idx + 1;
        if (discarding) {
          discarding = false;
          continue;
        }

        let line = pending.length > 0 ? Buffer.concat([...pending, piece]) : piece;
        pending = [];
        pendingBytes = 0;
        if (line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN) {
          line = line.subarray(0, line.length - 1);
        }
        if (line.length === 0) continue;
        if (line.length > maxLineBytes) {
          overflow();
          continue;
        }
        reply(this.handleLine(line));
      }
    });

    socket.on('error', (err) => {
      console.error(`[esmp] Connection error from ${socket.remoteAddress ?? 'unknown'}:`, err.message);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }
}
