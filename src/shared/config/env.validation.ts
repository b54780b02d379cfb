import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(8000),

  // Proxy pool. No PROXIES_URL means every attempt connects directly.
  PROXIES_URL: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  PROXY_REFRESH_INTERVAL_MINUTES: Joi.number().min(0).default(0),
  PROXY_WINDOW_MS: Joi.number().min(1000).default(60_000),
  PROXY_MAX_REQUESTS_PER_WINDOW: Joi.number().min(1).default(10),

  // Fetch provider
  INSTAGRAM_SESSION_ID: Joi.string().optional(),
  INSTAGRAM_APP_ID: Joi.string().default('936619743392459'),
  FETCH_TIMEOUT_MS: Joi.number().min(1000).max(120_000).default(15_000),

  // Retrieval loop
  RETRIEVAL_MAX_ATTEMPTS: Joi.number().min(1).max(100).default(20),
  RETRIEVAL_BACKOFF_MIN_MS: Joi.number().min(0).default(1000),
  RETRIEVAL_BACKOFF_MAX_MS: Joi.number()
    .min(Joi.ref('RETRIEVAL_BACKOFF_MIN_MS'))
    .default(3000),

  // Artifacts
  ARTIFACT_ROOT: Joi.string().default('downloads'),
  ARTIFACT_TTL_MINUTES: Joi.number().min(1).default(60),
  PUBLIC_BASE_URL: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  FFMPEG_PATH: Joi.string().default('ffmpeg'),
});
