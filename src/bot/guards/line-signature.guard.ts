import {
  BadRequestException,
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  RawBodyRequest,
} from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'crypto';
import type { Request } from 'express';
import { AppConfig, appConfig } from '../../config/app.config';
import { debugLog } from '../../common/utils/debug-logger';

const LINE_SIGNATURE_HEADER = 'x-line-signature';

/**
 * LINE signs the raw body with HMAC-SHA256 keyed by the channel secret and
 * sends the base64 digest in `x-line-signature`.
 */
export function verifyLineSignature(
  channelSecret: string,
  body: Buffer | string,
  signature: string | undefined,
): boolean {
  if (!signature) return false;

  const expected = Buffer.from(
    createHmac('sha256', channelSecret).update(body).digest('base64'),
    'utf8',
  );
  const provided = Buffer.from(signature, 'utf8');

  if (provided.length !== expected.length) return false;
  return timingSafeEqual(provided, expected);
}

@Injectable()
export class LineSignatureGuard implements CanActivate {
  private readonly log = debugLog.webhook;

  constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}

  canActivate(ctx: ExecutionContext): boolean {
    const req = ctx.switchToHttp().getRequest<RawBodyRequest<Request>>();
    const header = req.headers[LINE_SIGNATURE_HEADER];
    const signature = typeof header === 'string' ? header : undefined;

    if (!req.rawBody || !verifyLineSignature(this.config.channelSecret, req.rawBody, signature)) {
      this.log.warn('Rejected webhook: invalid signature', {
        hasSignature: signature !== undefined,
        bytes: req.rawBody?.length ?? 0,
      });
      throw new BadRequestException('Invalid signature');
    }

    return true;
  }
}
