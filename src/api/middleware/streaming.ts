// API layer: Streaming response utilities

import type { Response } from 'express';
import type { SessionChannel, SyncEvent } from '@/domain/session/types.js';

export interface StreamOptions {
  keepAlive?: boolean;
  keepAliveInterval?: number;
}

/**
 * Setup response for Server-Sent Events
 */
export function setupStreaming(res: Response, options: StreamOptions = {}): void {
  const { keepAlive = true, keepAliveInterval = 30000 } = options;

  res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
  res.setHeader('Cache-Control', 'no-cache, no-transform');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
  res.flushHeaders();

  if (keepAlive) {
    const keepAliveTimer = setInterval(() => {
      if (res.writableEnded) {
        clearInterval(keepAliveTimer);
        return;
      }
      res.write(':keep-alive\n\n');
    }, keepAliveInterval);

    res.on('close', () => clearInterval(keepAliveTimer));
  }
}

/**
 * Write one named event. Returns false once the stream has ended.
 */
export function writeEvent(res: Response, event: string, data: unknown): boolean {
  if (res.writableEnded || res.destroyed) return false;
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
  return true;
}

/**
 * A session's outbound channel over an SSE response
 */
export class SseChannel implements SessionChannel {
  constructor(private res: Response) {}

  send(event: SyncEvent): boolean {
    return writeEvent(this.res, event.event, event.data);
  }

  close(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }
}
