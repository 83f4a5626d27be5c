import 'dotenv/config';

import { signSessionToken } from '../auth/token';

// Prints a session token for local dashboard testing:
//   tsx server/tools/issue_token.ts <user> [ttlSeconds]
const subject = process.argv[2] || 'local-dev';
const ttlSeconds = Number(process.argv[3] || 12 * 60 * 60);
const secret = String(process.env.SESSION_TOKEN_SECRET || '').trim();

if (!secret) {
  console.error('SESSION_TOKEN_SECRET is not set');
  process.exit(1);
}

console.log(signSessionToken(subject, secret, ttlSeconds));
