import type { IncomingMessage, ServerResponse } from 'node:http';
import { PayloadTooLargeError, ValidationError } from '../errors';

export const DEFAULT_MAX_BODY_BYTES = 2 * 1024 * 1024;

export function readJsonBody(req: IncomingMessage, maxBytes: number = DEFAULT_MAX_BODY_BYTES): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let data = '';
    let received = 0;
    let rejected = false;
    req.setEncoding('utf8');

    req.on('data', (chunk: string) => {
      if (rejected) return;
      received += Buffer.byteLength(chunk);
      if (received > maxBytes) {
        rejected = true;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      data += chunk;
    });

    req.on('end', () => {
      if (rejected) return;
      if (!data.trim()) {
        resolve({});
        return;
      }
      try {
        const parsed: unknown = JSON.parse(data);
        resolve(parsed);
      } catch {
        reject(new ValidationError('Request body is not valid JSON.'));
      }
    });

    req.on('error', reject);
  });
}

export function setCors(res: ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-POS-User-Id');
}

export function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  setCors(res);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}
