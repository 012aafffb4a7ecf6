import configSchema from './schema';
import { ValidationError } from '../errors';

export type EnvConfig = {
  botToken: string;
  initialAdminId?: number;
  configFile: string;
  port: number;
  host: string;
  logLevel: string;
  pollingIntervalMs: number;
  nodeEnv: 'development' | 'production' | 'test';
};

type RawEnv = {
  TELEGRAM_BOT_TOKEN: string;
  INITIAL_ADMIN_ID?: number;
  CONFIG_FILE: string;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  POLLING_INTERVAL_MS: number;
  NODE_ENV: EnvConfig['nodeEnv'];
};

/**
 * Validates the process environment. A missing bot token is a startup error.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const { error, value } = configSchema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    const problems = error.details.map(d => d.message).join('; ');
    throw new ValidationError(`invalid environment: ${problems}`);
  }
  const raw: RawEnv = value;
  return {
    botToken: raw.TELEGRAM_BOT_TOKEN,
    initialAdminId: raw.INITIAL_ADMIN_ID,
    configFile: raw.CONFIG_FILE,
    port: raw.PORT,
    host: raw.HOST,
    logLevel: raw.LOG_LEVEL,
    pollingIntervalMs: raw.POLLING_INTERVAL_MS,
    nodeEnv: raw.NODE_ENV,
  };
}
