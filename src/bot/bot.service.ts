import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { InboundEvent } from './contracts';
import { WeatherClient } from '../weather/weather.client';
import { parseIcaoCode } from '../weather/icao';
import {
  FORMAT_ERROR_REPLY,
  formatReply,
} from '../weather/weather-reply.formatter';
import { debugLog } from '../common/utils/debug-logger';

@Injectable()
export class BotService {
  private readonly log = debugLog.bot;

  constructor(private readonly weather: WeatherClient) {}

  /**
   * Turns one text message into the reply text. Never throws for upstream
   * weather failures: those become a chat message.
   */
  async handle(event: InboundEvent, cid = this.generateCorrelationId()): Promise<string> {
    this.log.separator(cid);
    this.log.recv('LINE text message', { text: event.text.substring(0, 50), from: event.userId }, cid);

    const query = parseIcaoCode(event.text);
    if (!query.ok) {
      this.log.warn('Not an ICAO code', { text: event.text.substring(0, 20) }, cid);
      return FORMAT_ERROR_REPLY;
    }

    const done = this.log.timer(`Weather ${query.code}`, cid);
    const result = await this.weather.fetch(query.code, cid);
    done();

    const reply = formatReply(query.code, result);
    this.log.send('Reply ready', {
      code: query.code,
      ok: result.ok,
      ...(result.ok ? {} : { error: result.error.kind }),
    }, cid);
    return reply;
  }

  generateCorrelationId(): string {
    return randomUUID().substring(0, 8);
  }
}
