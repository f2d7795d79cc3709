import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectEnvPath = path.resolve(__dirname, '../../.env');

/**
 * Load the project .env file without overriding variables already set by the service manager.
 */
export const loadEnv = (envPath: string = projectEnvPath): void => {
  if (!fs.existsSync(envPath)) return;
  const parsed = dotenv.parse(fs.readFileSync(envPath));
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
};

// Modules importing this one read process.env once it holds the .env values
loadEnv();

// Set when packaging a release
export const getServerVersion = (): string => process.env.WOPI_SERVER_VERSION || 'git';
