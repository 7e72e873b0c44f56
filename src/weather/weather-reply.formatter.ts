import { WeatherResult } from './weather.contracts';

export const FORMAT_ERROR_REPLY = [
  '⚠️ 格式錯誤！',
  '請輸入一個 4 碼 ICAO 機場代碼（例如：RCTP、RJAA、KLAX）。',
].join('\n');

export function formatWeatherReply(
  code: string,
  metar: string | null,
  taf: string | null,
): string {
  return [
    `✈️ ${code} 航空氣象報告 (Aviation Weather Report)`,
    '',
    '--- 觀測報告 (METAR) ---',
    metar || `❌ 找不到 ${code} 的最新 METAR 資料。`,
    '',
    '--- 預報 (TAF) ---',
    taf || `❌ 找不到 ${code} 的最新 TAF 資料。`,
  ].join('\n');
}

export function formatFailureReply(message: string): string {
  return `🚨 查詢失敗：\n${message}`;
}

export function formatReply(code: string, result: WeatherResult): string {
  if (!result.ok) return formatFailureReply(result.error.message);
  return formatWeatherReply(code, result.metar, result.taf);
}
