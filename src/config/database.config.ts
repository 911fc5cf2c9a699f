import { registerAs } from '@nestjs/config';

export default registerAs('database', () => ({
  path: process.env.DATABASE_PATH || 'data/voters.db',
  busyTimeoutMs: parseInt(process.env.DATABASE_BUSY_TIMEOUT_MS || '5000', 10),
}));
