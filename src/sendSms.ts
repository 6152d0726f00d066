/**
 * Send a single SMS and print its SID
 */

import { loadEnvFile } from './config';
import { describeError } from './errors';
import { sendOnce } from './sms/sendOnce';

loadEnvFile();

sendOnce(process.env).catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
