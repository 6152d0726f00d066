/**
 * One-shot SMS: read the destination and body from the environment
 */

import { Env, loadTwilioConfig } from '../config';
import { ConfigurationError } from '../errors';
import { SmsSender, TwilioSmsSender } from './twilioSender';

export const DEFAULT_MESSAGE = 'Hello from Twilio via Docker!';

export async function sendOnce(env: Env, sender?: SmsSender): Promise<string> {
  const config = loadTwilioConfig(env);

  const to = env.TO_NUMBER?.trim();
  if (!to) {
    throw new ConfigurationError('TO_NUMBER', 'is required. Set it in your .env.');
  }
  const body = env.MESSAGE?.trim() || DEFAULT_MESSAGE;

  const sid = await (sender ?? new TwilioSmsSender(config)).send(to, body);
  console.log(`Message sent. SID: ${sid}`);
  return sid;
}
