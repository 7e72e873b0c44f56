import { registerAs } from '@nestjs/config';
import { EnvironmentVariables, validateEnv } from './env.validation';

export const DEFAULT_PORT = 5001;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_LINE_API_BASE = 'https://api.line.me';
export const DEFAULT_WEATHER_BASE_URL = 'https://tgftp.nws.noaa.gov/data';
export const DEFAULT_WEATHER_TIMEOUT_MS = 10_000;
export const WEATHER_USER_AGENT = 'AviationWeatherBot (Node.js axios)';

/**
 * Read-only settings resolved once at boot and injected where needed
 * via `@Inject(appConfig.KEY)`.
 */
export interface AppConfig {
  channelAccessToken: string;
  channelSecret: string;
  port: number;
  host: string;
  lineApiBase: string;
  weatherBaseUrl: string;
  weatherTimeoutMs: number;
  userAgent: string;
}

export function toAppConfig(env: EnvironmentVariables): AppConfig {
  return {
    channelAccessToken: env.LINE_CHANNEL_ACCESS_TOKEN,
    channelSecret: env.LINE_CHANNEL_SECRET,
    port: env.PORT ?? DEFAULT_PORT,
    host: env.HOST ?? DEFAULT_HOST,
    lineApiBase: stripTrailingSlash(env.LINE_API_BASE ?? DEFAULT_LINE_API_BASE),
    weatherBaseUrl: stripTrailingSlash(
      env.WEATHER_BASE_URL ?? DEFAULT_WEATHER_BASE_URL,
    ),
    weatherTimeoutMs: env.WEATHER_TIMEOUT_MS ?? DEFAULT_WEATHER_TIMEOUT_MS,
    userAgent: WEATHER_USER_AGENT,
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export const appConfig = registerAs('app', (): AppConfig =>
  toAppConfig(validateEnv(process.env)),
);
