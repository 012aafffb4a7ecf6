import * as Joi from 'joi';

const configSchema = Joi.object({
  TELEGRAM_BOT_TOKEN: Joi.string().trim().required(),
  INITIAL_ADMIN_ID: Joi.number().integer().positive(),
  CONFIG_FILE: Joi.string().default('spoiler_config.json'),
  PORT: Joi.number().port().default(8080),
  HOST: Joi.string().default('0.0.0.0'),
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').default('info'),
  LOG_DIR: Joi.string(),
  POLLING_INTERVAL_MS: Joi.number().integer().min(0).default(300),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
}).unknown(true);

export default configSchema;
