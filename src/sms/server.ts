/**
 * SMS Gateway API
 *
 * HTTP front for the Twilio sender. The keyword listener posts its
 * notifications here.
 */

import express, { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { ConfigurationError, SmsDeliveryError, describeError } from '../errors';
import type { SmsSender } from './twilioSender';

export type SmsAppOptions = {
  // Unset means every request is refused with 503
  apiToken?: string;
  // Resolved per request so missing Twilio settings surface as 500s
  resolveSender: () => SmsSender;
};

export type SendRequest = {
  to: string;
  message: string;
};

const E164 = /^\+[1-9]\d{1,14}$/;
const MAX_MESSAGE_LENGTH = 1600;

export function validateSendRequest(body: unknown): SendRequest | string {
  if (typeof body !== 'object' || body === null) {
    return 'Request body must be a JSON object';
  }

  const to = 'to' in body ? body.to : undefined;
  const message = 'message' in body ? body.message : undefined;

  if (typeof to !== 'string' || !E164.test(to)) {
    return 'to must be a destination number in E.164 format, e.g. +15551234567';
  }
  if (typeof message !== 'string' || message.length < 1 || message.length > MAX_MESSAGE_LENGTH) {
    return `message must be a string of 1 to ${MAX_MESSAGE_LENGTH} characters`;
  }

  return { to, message };
}

function requireBearer(expected: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) {
      res.status(503).json({ detail: 'API not configured' });
      return;
    }

    const header = req.header('authorization') ?? '';
    const [scheme, token] = header.split(' ', 2);
    if (scheme !== 'Bearer' || !token) {
      res.status(401).json({ detail: 'Missing bearer token' });
      return;
    }
    if (token !== expected) {
      res.status(403).json({ detail: 'Invalid token' });
      return;
    }
    next();
  };
}

export function createSmsApp(options: SmsAppOptions) {
  const app = express();

  /**
   * POST /send
   * Body: { to: string, message: string }
   */
  app.post('/send', requireBearer(options.apiToken), express.json(), async (req: Request, res: Response) => {
    const parsed = validateSendRequest(req.body);
    if (typeof parsed === 'string') {
      res.status(422).json({ detail: parsed });
      return;
    }

    let sender: SmsSender;
    try {
      sender = options.resolveSender();
    } catch (error) {
      const detail = error instanceof ConfigurationError ? error.message : 'Internal server error';
      console.error('[SmsServer] ✗ Twilio not configured:', describeError(error));
      res.status(500).json({ detail });
      return;
    }

    try {
      const sid = await sender.send(parsed.to, parsed.message);
      console.log(`[SmsServer] ✓ Message sent. SID: ${sid}`);
      res.json({ sid });
    } catch (error) {
      console.error('[SmsServer] ✗ Twilio error:', describeError(error));
      if (error instanceof SmsDeliveryError) {
        res.status(502).json({ detail: error.message });
        return;
      }
      res.status(500).json({ detail: 'Internal server error' });
    }
  });

  /**
   * Health check
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // Malformed JSON and other middleware errors
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(422).json({ detail: 'Request body must be valid JSON' });
      return;
    }
    console.error('[SmsServer] Unhandled error:', error);
    res.status(500).json({ detail: 'Internal server error' });
  });

  return app;
}

export function startSmsServer(app: ReturnType<typeof createSmsApp>, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      console.log(`[SmsServer] 📨 SMS API listening on http://${host}:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
