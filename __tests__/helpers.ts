import { Writable } from 'stream';
import { silentLogger } from '../lib/logger';

export const logger = silentLogger();

export function textResponse(body: string, init?: ResponseInit): Response {
  return new Response(body, init);
}

/** Writable that keeps everything written to it. */
export function captureStream(): { stream: Writable; text(): string } {
  let text = '';
  const stream = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      text += chunk.toString();
      cb();
    },
  });
  return { stream, text: () => text };
}

export function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}
