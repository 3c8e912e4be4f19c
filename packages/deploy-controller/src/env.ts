import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { parse } from 'dotenv';

import { ENV_FILE } from './core/constants';
import { ConfigService } from './core/services/config.service';

/**
 * Load `<projectDir>/.env` into `env` unless running under NODE_ENV=production.
 * Values already present in `env` win. Returns the loaded file, if any.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (env.NODE_ENV?.toLowerCase() === 'production') return undefined;

  const file = path.join(ConfigService.projectDirFrom(env), ENV_FILE);
  if (!existsSync(file)) return undefined;

  for (const [key, value] of Object.entries(parse(readFileSync(file)))) {
    if (env[key] === undefined) env[key] = value;
  }
  return file;
}
