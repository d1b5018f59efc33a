import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const configSchema = z.object({
  server: z.object({
    port: z.number().default(8080),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  storage: z.object({
    dataDir: z.string(),
    statePath: z.string(),
    settingsPath: z.string(),
    capturePath: z.string(),
    cookiesPath: z.string(),
    browserProfileDir: z.string(),
  }),
  remote: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive().default(20000),
  }),
  music: z.object({
    rootPath: z.string(),
  }),
});

type Config = z.infer<typeof configSchema>;

function parseNodeEnv(value: string | undefined): 'development' | 'production' | 'test' {
  return value === 'production' || value === 'test' ? value : 'development';
}

function loadConfig(): Config {
  const nodeEnv = parseNodeEnv(process.env.NODE_ENV);
  const dataDir = process.env.DATA_DIR || './data';

  const rawConfig = {
    server: {
      port: parseInt(process.env.PORT || '8080', 10),
      host: process.env.HOST || '0.0.0.0',
      nodeEnv,
    },
    logging: {
      level: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    },
    storage: {
      dataDir,
      statePath: process.env.STATE_PATH || path.join(dataDir, 'sync-state.json'),
      settingsPath: process.env.SETTINGS_PATH || path.join(dataDir, 'settings.json'),
      capturePath: process.env.CAPTURE_PATH || path.join(dataDir, 'captures.json'),
      cookiesPath: process.env.COOKIES_PATH || path.join(dataDir, 'cookies.json'),
      browserProfileDir: process.env.BROWSER_PROFILE_DIR || path.join(dataDir, 'browser-profile'),
    },
    remote: {
      baseUrl: process.env.REMOTE_BASE_URL || 'https://soundeo.com',
      timeoutMs: parseInt(process.env.REMOTE_TIMEOUT_MS || '20000', 10),
    },
    music: {
      rootPath: process.env.MUSIC_ROOT_PATH || './music',
    },
  };

  return configSchema.parse(rawConfig);
}

export const config = loadConfig();
export type { Config };
