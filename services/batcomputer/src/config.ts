import 'dotenv/config';
import path from 'node:path';

const DEFAULT_CORS_ORIGINS = [
  'http://localhost',
  'http://localhost:8080',
  'http://127.0.0.1',
  'http://127.0.0.1:8080',
  'null', // browsers send a literal "null" origin for pages opened from file://
];

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export const config = {
  port: parseInt(process.env.PORT || '8000', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  title: process.env.API_TITLE || 'Batcomputer API Interface',
  version: process.env.API_VERSION || '1.0.0',
  apiKeySecret: process.env.API_KEY_SECRET || 'gcpd-secret-key-789',
  adminUsername: process.env.ADMIN_USERNAME || 'batman',
  corsOrigins: parseList(process.env.CORS_ORIGINS, DEFAULT_CORS_ORIGINS),
  templatesDir: process.env.TEMPLATES_DIR || path.resolve(__dirname, '../templates'),
  staticDir: process.env.STATIC_DIR || path.resolve(__dirname, '../static'),
  activityLogDir: process.env.ACTIVITY_LOG_DIR || path.resolve(process.cwd(), 'batcomputer_logs'),
  intelFeed: {
    baseUrl: process.env.INTEL_FEED_URL || 'https://jsonplaceholder.typicode.com',
    timeoutMs: parseInt(process.env.INTEL_FEED_TIMEOUT_MS || '5000', 10),
  },
  tasks: {
    capacity: parseInt(process.env.TASK_QUEUE_CAPACITY || '100', 10),
    // simulated I/O pause inside Alfred's jobs
    delayMs: parseInt(process.env.TASK_DELAY_MS || '500', 10),
  },
};

export type AppConfig = typeof config;
