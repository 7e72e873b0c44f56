/**
 * Flow logger for the webhook pipeline.
 *
 * One line per step, tagged and color-coded so a single request can be
 * followed through the console by its correlation id.
 *
 *   📥 RECV  - Incoming LINE event
 *   📤 SEND  - Reply handed to LINE
 *   🔗 LINK  - Outbound HTTP call
 *   ⚡ PERF  - Timing
 *   ✅ OK    - Success
 *   ❌ ERR   - Error
 *   ⚠️  WARN  - Warning
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface DebugConfig {
  enabled: boolean;
  minLevel: LogLevel;
  showTimestamp: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return (
    value !== undefined &&
    Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
  );
}

const envLevel = process.env.DEBUG_LEVEL;

const config: DebugConfig = {
  enabled: process.env.DEBUG_LOGS !== '0',
  minLevel: isLogLevel(envLevel) ? envLevel : 'debug',
  showTimestamp: process.env.DEBUG_TIMESTAMP !== '0',
};

/**
 * Format a value for display (truncate if too long)
 */
function formatValue(value: unknown, maxLen = 80): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') {
    const clean = value.replace(/\n/g, '↵').trim();
    return clean.length > maxLen ? clean.substring(0, maxLen) + '…' : clean;
  }
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > maxLen ? str.substring(0, maxLen) + '…' : str;
  }
  return String(value);
}

function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

function formatCid(cid?: string): string {
  if (!cid) return '';
  return `${colors.dim}[${cid}]${colors.reset} `;
}

const tagColors: Record<string, string> = {
  RECV: colors.cyan,
  SEND: colors.green,
  LINK: colors.cyan,
  PERF: colors.bright,
  OK: colors.green,
  ERR: colors.red,
  WARN: colors.yellow,
};

class DebugLogger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private log(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: Record<string, unknown>,
    cid?: string,
  ) {
    if (!this.shouldLog(level)) return;

    const tagColor = tagColors[tag] || colors.white;
    const paddedTag = tag.padEnd(5);

    let line = `${timestamp()}${formatCid(cid)}${emoji} ${tagColor}${paddedTag}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ');
      line += ` ${dataStr}`;
    }

    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  /** Incoming event received */
  recv(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📥', 'RECV', message, data, cid);
  }

  /** Outgoing reply */
  send(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📤', 'SEND', message, data, cid);
  }

  /** External service call */
  link(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('debug', '🔗', 'LINK', message, data, cid);
  }

  perf(message: string, ms: number, cid?: string) {
    const formatted = formatMs(ms);
    const color = ms < 1000 ? colors.green : ms < 5000 ? colors.yellow : colors.red;
    this.log('info', '⚡', 'PERF', message, { time: `${color}${formatted}${colors.reset}` }, cid);
  }

  ok(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '✅', 'OK', message, data, cid);
  }

  err(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('error', '❌', 'ERR', message, data, cid);
  }

  warn(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('warn', '⚠️ ', 'WARN', message, data, cid);
  }

  /** Separator line for visual grouping */
  separator(cid?: string) {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${timestamp()}${formatCid(cid)}${colors.dim}${'─'.repeat(60)}${colors.reset}`,
    );
  }

  /** Start a timer and return a function to log the elapsed time */
  timer(label: string, cid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, cid);
    };
  }
}

export function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

export const debugLog = {
  bot: createDebugLogger('bot'),
  webhook: createDebugLogger('webhook'),
  weather: createDebugLogger('weather'),
};

export { DebugLogger };
