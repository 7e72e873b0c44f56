import {
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  RawBodyRequest,
  Req,
  UseGuards,
} from '@nestjs/common';
import type { Request } from 'express';
import { BotService } from './bot.service';
import { LineAdapter } from './adapters/line.adapter';
import { LineSignatureGuard } from './guards/line-signature.guard';
import { InboundEvent } from './contracts';
import { debugLog } from '../common/utils/debug-logger';

@Controller()
export class BotController {
  private readonly log = debugLog.webhook;

  constructor(
    private readonly bot: BotService,
    private readonly line: LineAdapter,
  ) {}

  @Post('callback')
  @HttpCode(HttpStatus.OK)
  @UseGuards(LineSignatureGuard)
  async callback(@Req() req: RawBodyRequest<Request>): Promise<string> {
    const events = this.line.fromIncoming(req.rawBody);
    if (events.length === 0) {
      this.log.ok('No text messages in webhook');
      return 'OK';
    }

    for (const event of events) {
      await this.handleEvent(event);
    }
    return 'OK';
  }

  // One failed reply must not keep the remaining events from being answered.
  private async handleEvent(event: InboundEvent): Promise<void> {
    const cid = this.bot.generateCorrelationId();
    try {
      const reply = await this.bot.handle(event, cid);
      await this.line.sendReply(event.replyToken, reply);
      this.log.ok('Replied', { event: event.webhookEventId }, cid);
    } catch (err) {
      this.log.err('Event not answered', {
        event: event.webhookEventId,
        error: err instanceof Error ? err.message : String(err),
      }, cid);
    }
  }
}
