import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { Logger } from '@nestjs/common';

const logger = new Logger('Env');

function defaultEnvFile(nodeEnv: string): string {
  switch (nodeEnv) {
    case 'production':
      return '.env.prod';
    case 'development':
      return '.env.local';
    default:
      return '.env';
  }
}

/**
 * Loads variables from ENV_FILE, or the per-environment file, falling back to
 * `.env`. Values already present in process.env win.
 */
export function loadEnv(cwd: string = process.cwd()): string | undefined {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const envFile = process.env.ENV_FILE || defaultEnvFile(nodeEnv);

  for (const candidate of [envFile, '.env']) {
    const envPath = path.resolve(cwd, candidate);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      logger.log(`Loaded environment from ${candidate}`);
      return envPath;
    }
  }

  logger.warn(
    `Environment file ${envFile} not found and no .env fallback available; using process environment only`,
  );
  return undefined;
}
