export type BulletinType = 'metar' | 'taf';

/**
 * Outcome of fetching one bulletin from the text mirror.
 * `line` is the data line, or '' when the file carried only its header.
 */
export type BulletinOutcome =
  | { kind: 'ok'; line: string }
  | { kind: 'not_found' }
  | { kind: 'http_error'; status: number }
  | { kind: 'transport'; category: string };

export type WeatherErrorKind =
  | 'UPSTREAM_NOT_FOUND'
  | 'UPSTREAM_HTTP_ERROR'
  | 'UPSTREAM_TRANSPORT_ERROR'
  | 'BOTH_BULLETINS_EMPTY';

export interface WeatherError {
  kind: WeatherErrorKind;
  /** User-facing explanation, wrapped by the reply formatter. */
  message: string;
}

/**
 * Either at least one bulletin (the other may be null) or a single failure.
 */
export type WeatherResult =
  | { ok: true; metar: string | null; taf: string | null }
  | { ok: false; error: WeatherError };
