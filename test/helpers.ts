import { createHmac } from 'crypto';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { AppConfig } from '../src/config/app.config';

export const testConfig: AppConfig = {
  channelAccessToken: 'test-access-token',
  channelSecret: 'test-secret',
  port: 5001,
  host: '127.0.0.1',
  lineApiBase: 'https://line.test',
  weatherBaseUrl: 'https://weather.test/data',
  weatherTimeoutMs: 10_000,
  userAgent: 'AviationWeatherBot (test)',
};

export const METAR_LINE =
  'RCTP 221000Z 05012KT 9999 FEW020 BKN040 27/21 Q1012 NOSIG';
export const TAF_LINE =
  'TAF RCTP 220500Z 2206/2312 05010KT 9999 FEW020 BKN040';

export const METAR_BODY = `2025/09/22 10:00\n${METAR_LINE}\n`;
export const TAF_BODY = `2025/09/22 05:00\n${TAF_LINE}\n      TEMPO 2206/2210 SHRA\n`;

export function signBody(body: string, secret = testConfig.channelSecret): string {
  return createHmac('sha256', secret).update(body).digest('base64');
}

function response<T>(data: T, status: number, statusText: string): AxiosResponse<T> {
  return {
    data,
    status,
    statusText,
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function textResponse(body: string): AxiosResponse<string> {
  return response(body, 200, 'OK');
}

export function httpError<T>(status: number, data: T): AxiosError<T> {
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    undefined,
    undefined,
    response(data, status, 'Error'),
  );
}

export function timeoutError(): AxiosError {
  return new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED);
}
