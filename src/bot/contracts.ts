/**
 * A LINE text message, reduced to what the bot needs to answer it.
 * The reply token is single-use and expires shortly after delivery.
 */
export interface InboundEvent {
  replyToken: string;
  text: string;
  userId?: string;
  webhookEventId?: string;
}

export class ReplyDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'ReplyDeliveryError';
  }
}
