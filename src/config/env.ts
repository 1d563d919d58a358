import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from repository root
dotenv.config({ path: resolve(__dirname, '../../.env') });

interface Config {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  httpTimeoutMs: number;
  authorityHost: string;
  logAnalyticsBaseUrl: string;
  managedIdentityEndpoint: string;
  userAgent: string;
  shutdownTimeoutMs: number;
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
  httpTimeoutMs: parseInt(process.env.HTTP_TIMEOUT_MS || '30000', 10),
  authorityHost: process.env.AZURE_AUTHORITY_HOST || 'https://login.microsoftonline.com',
  logAnalyticsBaseUrl: process.env.LOG_ANALYTICS_BASE_URL || 'https://api.loganalytics.io',
  managedIdentityEndpoint:
    process.env.MANAGED_IDENTITY_ENDPOINT || 'http://169.254.169.254/metadata/identity/oauth2/token',
  userAgent: process.env.SCALER_USER_AGENT || 'log-analytics-scaler/1.0.0',
  shutdownTimeoutMs: parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '10000', 10), // 10 seconds
};
