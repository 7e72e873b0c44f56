import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import axios from 'axios';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { AppConfig, appConfig } from '../../config/app.config';
import { InboundEvent, ReplyDeliveryError } from '../contracts';
import { LineEventDto, LineWebhookDto } from '../dto/line-webhook.dto';

// Messaging API hard limit for a text message
export const LINE_TEXT_LIMIT = 5000;

interface LineErrorBody {
  message?: string;
}

// Counts code points so an emoji is never split into a lone surrogate.
function truncate(text: string, limit: number): string {
  const chars = Array.from(text);
  return chars.length > limit ? chars.slice(0, limit).join('') : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((e) => {
    const path = parent ? `${parent}.${e.property}` : e.property;
    const own = Object.values(e.constraints ?? {}).map((c) => `${path}: ${c}`);
    return [...own, ...describeErrors(e.children ?? [], path)];
  });
}

@Injectable()
export class LineAdapter {
  private readonly log = new Logger(LineAdapter.name);

  constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}

  /**
   * Parses a verified webhook body and keeps only text message events.
   * Throws 400 when the envelope itself is unusable.
   */
  fromIncoming(rawBody: Buffer | undefined): InboundEvent[] {
    if (!rawBody) throw new BadRequestException('Missing request body');

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString('utf8'));
    } catch {
      throw new BadRequestException('Malformed webhook payload');
    }
    if (!isRecord(parsed)) {
      throw new BadRequestException('Webhook payload must be a JSON object');
    }

    const envelope = plainToInstance(LineWebhookDto, parsed);
    const errors = validateSync(envelope);
    if (errors.length > 0) {
      const details = describeErrors(errors);
      this.log.warn(`Invalid webhook envelope: ${details.join('; ')}`);
      throw new BadRequestException(details);
    }

    const events = envelope.events
      .map((e) => this.toInboundEvent(e))
      .filter((e): e is InboundEvent => e !== null);

    this.log.debug(
      `[fromIncoming] ${envelope.events.length} event(s), ${events.length} text message(s)`,
    );
    return events;
  }

  private toInboundEvent(e: LineEventDto): InboundEvent | null {
    if (e.type !== 'message' || e.message?.type !== 'text') return null;
    if (e.replyToken === undefined || e.message.text === undefined) return null;

    return {
      replyToken: e.replyToken,
      text: e.message.text,
      userId: e.source?.userId,
      webhookEventId: e.webhookEventId,
    };
  }

  /**
   * Sends one text reply. The reply token is single-use, so a failure is
   * reported to the caller and never retried.
   */
  async sendReply(replyToken: string, text: string): Promise<void> {
    const url = `${this.config.lineApiBase}/v2/bot/message/reply`;
    const payload = {
      replyToken,
      messages: [{ type: 'text', text: truncate(text, LINE_TEXT_LIMIT) }],
    };

    try {
      await axios.post(url, payload, {
        headers: {
          Authorization: `Bearer ${this.config.channelAccessToken}`,
          'Content-Type': 'application/json',
        },
        timeout: 10_000,
      });
      this.log.log('LINE reply sent');
    } catch (err) {
      if (axios.isAxiosError<LineErrorBody>(err)) {
        const status = err.response?.status;
        const detail = err.response?.data?.message ?? err.code ?? err.message;
        this.log.error(`LINE reply failed (${status ?? 'no response'}): ${detail}`);
        throw new ReplyDeliveryError(
          `LINE reply failed (${status ?? 'no response'}): ${detail}`,
          status,
        );
      }
      throw new ReplyDeliveryError(`LINE reply failed: ${String(err)}`);
    }
  }
}
