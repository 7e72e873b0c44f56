import { Inject, Injectable } from '@nestjs/common';
import axios from 'axios';
import { AppConfig, appConfig } from '../config/app.config';
import { debugLog } from '../common/utils/debug-logger';
import {
  BulletinOutcome,
  BulletinType,
  WeatherError,
  WeatherResult,
} from './weather.contracts';

const BULLETIN_PATHS: Record<BulletinType, string> = {
  metar: 'observations/metar/stations',
  taf: 'forecasts/taf/stations',
};

/**
 * Returns the data line of a mirror file. The first line is always the
 * issue timestamp; the report itself starts on the second.
 */
export function extractBulletinLine(body: string): string {
  const lines = body.trim().split(/\r?\n/);
  if (lines.length < 2) return '';
  return lines[1].trim();
}

/**
 * Client for the NOAA plain-text METAR/TAF mirror.
 *
 * The two bulletins are fetched one after the other. The first one that
 * fails decides the outcome and the second request is skipped.
 */
@Injectable()
export class WeatherClient {
  private readonly log = debugLog.weather;

  constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}

  bulletinUrl(type: BulletinType, code: string): string {
    return `${this.config.weatherBaseUrl}/${BULLETIN_PATHS[type]}/${code}.TXT`;
  }

  async fetch(code: string, cid?: string): Promise<WeatherResult> {
    const metar = await this.fetchBulletin('metar', code, cid);
    if (metar.kind !== 'ok') return { ok: false, error: this.toError(code, metar) };

    const taf = await this.fetchBulletin('taf', code, cid);
    if (taf.kind !== 'ok') return { ok: false, error: this.toError(code, taf) };

    if (!metar.line && !taf.line) {
      this.log.warn('Both bulletins empty', { code }, cid);
      return {
        ok: false,
        error: {
          kind: 'BOTH_BULLETINS_EMPTY',
          message: `找不到 ${code} 的 METAR/TAF 資料。請確認代碼是否正確。`,
        },
      };
    }

    this.log.ok('Bulletins fetched', { code, metar: !!metar.line, taf: !!taf.line }, cid);
    return { ok: true, metar: metar.line || null, taf: taf.line || null };
  }

  private async fetchBulletin(
    type: BulletinType,
    code: string,
    cid?: string,
  ): Promise<BulletinOutcome> {
    const url = this.bulletinUrl(type, code);
    this.log.link(`GET ${type.toUpperCase()}`, { url }, cid);

    try {
      const { data } = await axios.get<string>(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/plain',
        },
        responseType: 'text',
        timeout: this.config.weatherTimeoutMs,
      });
      return { kind: 'ok', line: extractBulletinLine(typeof data === 'string' ? data : '') };
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        const status = err.response.status;
        if (status === 404) {
          this.log.warn(`${type.toUpperCase()} not published`, { code }, cid);
          return { kind: 'not_found' };
        }
        this.log.err(`${type.toUpperCase()} HTTP error`, { code, status }, cid);
        return { kind: 'http_error', status };
      }

      const category = axios.isAxiosError(err)
        ? (err.code ?? err.name)
        : err instanceof Error
          ? err.name
          : 'UnknownError';
      this.log.err(`${type.toUpperCase()} request failed`, { code, category, error: String(err) }, cid);
      return { kind: 'transport', category };
    }
  }

  private toError(
    code: string,
    outcome: Exclude<BulletinOutcome, { kind: 'ok' }>,
  ): WeatherError {
    switch (outcome.kind) {
      case 'not_found':
        return {
          kind: 'UPSTREAM_NOT_FOUND',
          message: `找不到 ${code} 的氣象報告。該 ICAO 代碼可能沒有提供 METAR/TAF 報告。`,
        };
      case 'http_error':
        return {
          kind: 'UPSTREAM_HTTP_ERROR',
          message: `氣象 API 回應異常：HTTP ${outcome.status}`,
        };
      case 'transport':
        return {
          kind: 'UPSTREAM_TRANSPORT_ERROR',
          message: `連線至氣象 API 時發生錯誤：${outcome.category}`,
        };
    }
  }
}
