import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const brokerEnvSchema = z.object({
  TS_BASE_URL: z.string().url().default('https://sim-api.tradestation.com/v3'),
  TS_CLIENT_ID: z.string().min(1, 'TS_CLIENT_ID is required'),
  TS_CLIENT_SECRET: z.string().min(1, 'TS_CLIENT_SECRET is required'),
  TS_REFRESH_TOKEN: z.string().min(1, 'TS_REFRESH_TOKEN is required'),
  TS_ACCOUNT_KEY: z.string().min(1, 'TS_ACCOUNT_KEY is required'),
  TS_REDIRECT_URI: z.string().url().optional(),
  TS_TOKEN_URL: z.string().url().optional(),
  TS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000)
});

export type BrokerEnv = z.infer<typeof brokerEnvSchema>;

export function loadBrokerEnv(env: NodeJS.ProcessEnv = process.env): BrokerEnv {
  const parsed = brokerEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`Invalid broker environment configuration: ${parsed.error.message}`);
  }

  return parsed.data;
}
