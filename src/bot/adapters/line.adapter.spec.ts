import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import axios from 'axios';
import { appConfig } from '../../config/app.config';
import { ReplyDeliveryError } from '../contracts';
import { LINE_TEXT_LIMIT, LineAdapter } from './line.adapter';
import { httpError, testConfig, textResponse, timeoutError } from '../../../test/helpers';

const body = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8');

describe('LineAdapter', () => {
  let adapter: LineAdapter;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [LineAdapter, { provide: appConfig.KEY, useValue: testConfig }],
    }).compile();
    adapter = moduleRef.get(LineAdapter);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fromIncoming', () => {
    it('keeps only text message events', () => {
      const events = adapter.fromIncoming(
        body({
          destination: 'U0',
          events: [
            {
              type: 'message',
              replyToken: 'token-1',
              webhookEventId: 'evt-1',
              source: { type: 'user', userId: 'U1' },
              message: { type: 'text', id: '1', text: 'rctp' },
              timestamp: 1700000000000,
            },
            {
              type: 'message',
              replyToken: 'token-2',
              message: { type: 'sticker', id: '2', packageId: '1', stickerId: '1' },
            },
            { type: 'follow', replyToken: 'token-3', source: { type: 'user', userId: 'U2' } },
            { type: 'message', message: { type: 'text', id: '4', text: 'no token' } },
          ],
        }),
      );

      expect(events).toEqual([
        { replyToken: 'token-1', text: 'rctp', userId: 'U1', webhookEventId: 'evt-1' },
      ]);
    });

    it('returns nothing for the verification request', () => {
      expect(adapter.fromIncoming(body({ destination: 'U0', events: [] }))).toEqual([]);
    });

    it.each([
      ['invalid JSON', Buffer.from('{"events": [', 'utf8')],
      ['a JSON array', body([])],
      ['missing events', body({ destination: 'U0' })],
      ['events that are not a list', body({ events: 'nope' })],
      ['an event without a type', body({ events: [{ replyToken: 't' }] })],
    ])('rejects %s', (_label, raw) => {
      expect(() => adapter.fromIncoming(raw)).toThrow(BadRequestException);
    });

    it('rejects an absent body', () => {
      expect(() => adapter.fromIncoming(undefined)).toThrow(BadRequestException);
    });
  });

  describe('sendReply', () => {
    it('posts a single text message with the reply token', async () => {
      const post = jest.spyOn(axios, 'post').mockResolvedValueOnce(textResponse('{}'));

      await adapter.sendReply('token-1', 'hello');

      expect(post).toHaveBeenCalledTimes(1);
      expect(post).toHaveBeenCalledWith(
        'https://line.test/v2/bot/message/reply',
        { replyToken: 'token-1', messages: [{ type: 'text', text: 'hello' }] },
        expect.objectContaining({
          headers: {
            Authorization: 'Bearer test-access-token',
            'Content-Type': 'application/json',
          },
        }),
      );
    });

    it('truncates text to the platform limit', async () => {
      const post = jest.spyOn(axios, 'post').mockResolvedValueOnce(textResponse('{}'));

      await adapter.sendReply('token-1', 'x'.repeat(LINE_TEXT_LIMIT + 10));

      expect(post.mock.calls[0][1]).toEqual({
        replyToken: 'token-1',
        messages: [{ type: 'text', text: 'x'.repeat(LINE_TEXT_LIMIT) }],
      });
    });

    it('never splits an emoji at the limit', async () => {
      const post = jest.spyOn(axios, 'post').mockResolvedValueOnce(textResponse('{}'));
      const head = 'x'.repeat(LINE_TEXT_LIMIT - 1);

      await adapter.sendReply('token-1', `${head}🚨 tail`);

      expect(post.mock.calls[0][1]).toEqual({
        replyToken: 'token-1',
        messages: [{ type: 'text', text: `${head}🚨` }],
      });
    });

    it('surfaces an expired token without retrying', async () => {
      const post = jest
        .spyOn(axios, 'post')
        .mockRejectedValueOnce(httpError(400, { message: 'Invalid reply token' }));

      const sent = adapter.sendReply('expired', 'hello');

      await expect(sent).rejects.toBeInstanceOf(ReplyDeliveryError);
      await expect(sent).rejects.toMatchObject({
        message: 'LINE reply failed (400): Invalid reply token',
        status: 400,
      });
      expect(post).toHaveBeenCalledTimes(1);
    });

    it('surfaces network failures', async () => {
      jest.spyOn(axios, 'post').mockRejectedValueOnce(timeoutError());

      await expect(adapter.sendReply('token-1', 'hello')).rejects.toMatchObject({
        message: 'LINE reply failed (no response): ECONNABORTED',
        status: undefined,
      });
    });
  });
});
