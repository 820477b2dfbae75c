import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  // Empty URL keeps every store in memory
  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'relay:'),
  },

  engine: {
    configPath: optional('ENGINE_CONFIG_PATH', path.join(projectRoot, 'config', 'engine.yaml')),
    templatesPath: optional('TEMPLATES_PATH', path.join(projectRoot, 'config', 'templates.yaml')),
    messagesPath: optional('MESSAGES_PATH', path.join(projectRoot, 'config', 'messages.yaml')),
    knowledgeDir: optional('KNOWLEDGE_DIR', path.join(projectRoot, 'knowledge')),
  },

  scheduler: {
    enabled: optionalBool('SCHEDULER_ENABLED', true),
    intervalSeconds: optionalInt('SCHEDULER_INTERVAL_SECONDS', 60),
  },

  channel: {
    // Transport relay that owns provider payload formats; unset logs payloads instead
    relayUrl: optional('CHANNEL_RELAY_URL', ''),
    relayToken: optional('CHANNEL_RELAY_TOKEN', ''),
  },

  security: {
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
};
