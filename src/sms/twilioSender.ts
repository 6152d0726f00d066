/**
 * Twilio SMS sender
 */

import twilio from 'twilio';
import type { TwilioConfig } from '../config';
import { SmsDeliveryError } from '../errors';

export interface SmsSender {
  send(to: string, body: string): Promise<string>;
}

type CreateMessageOptions = {
  to: string;
  body: string;
  from?: string;
  messagingServiceSid?: string;
};

// The slice of the Twilio client used here
export interface MessagesClient {
  messages: {
    create(options: CreateMessageOptions): Promise<{ sid: string }>;
  };
}

export function createTwilioClient(config: TwilioConfig): MessagesClient {
  const { credentials } = config;
  if (credentials.kind === 'apiKey') {
    return twilio(credentials.apiKey, credentials.apiSecret, { accountSid: config.accountSid });
  }
  return twilio(config.accountSid, credentials.authToken);
}

export function messageOptions(config: TwilioConfig, to: string, body: string): CreateMessageOptions {
  // A messaging service takes precedence over a fixed sender number
  return config.sender.kind === 'messagingService'
    ? { to, body, messagingServiceSid: config.sender.messagingServiceSid }
    : { to, body, from: config.sender.from };
}

export class TwilioSmsSender implements SmsSender {
  private readonly client: MessagesClient;

  constructor(private readonly config: TwilioConfig, client?: MessagesClient) {
    this.client = client ?? createTwilioClient(config);
  }

  async send(to: string, body: string): Promise<string> {
    try {
      const message = await this.client.messages.create(messageOptions(this.config, to, body));
      return message.sid;
    } catch (error) {
      throw new SmsDeliveryError(error);
    }
  }
}
