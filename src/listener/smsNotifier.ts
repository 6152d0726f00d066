/**
 * SMS Notifier
 * Relays a detection to the SMS gateway over HTTP
 */

import { NotificationError, describeError } from '../errors';
import type { NotificationRequest, Notifier } from './types';

export interface HttpNotifierConfig {
  baseUrl: string;
  apiToken: string;
  timeoutMs: number;
}

export class HttpNotifier implements Notifier {
  private readonly url: string;

  constructor(private readonly config: HttpNotifierConfig) {
    this.url = `${config.baseUrl.replace(/\/+$/, '')}/send`;
  }

  async notify(request: NotificationRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({ to: request.to, message: request.message }),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new NotificationError(`SMS gateway did not answer within ${this.config.timeoutMs}ms`);
      }
      throw new NotificationError(`SMS gateway unreachable: ${describeError(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    const body = await readJson(response);

    if (!response.ok) {
      const detail = isRecord(body) && typeof body.detail === 'string' ? body.detail : response.statusText;
      throw new NotificationError(`SMS gateway responded ${response.status}: ${detail}`, response.status);
    }

    if (!isRecord(body) || typeof body.sid !== 'string') {
      throw new NotificationError('SMS gateway response did not include a message sid', response.status);
    }
    return body.sid;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// Non-JSON or unreadable bodies count as missing
async function readJson(response: Response): Promise<unknown> {
  try {
    const text = await response.text();
    return text ? JSON.parse(text) : null;
  } catch {
    return null;
  }
}
