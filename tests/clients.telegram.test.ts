import { describe, it, expect, vi, beforeEach } from 'vitest';

const hoisted = vi.hoisted(() => ({
  postMock: vi.fn(),
}));
vi.mock('../src/lib/http', () => ({ http: { post: hoisted.postMock } }));

import { createTelegramDispatcher, TelegramError } from '../src/clients/telegram';
import { AlertDriver } from '../src/queues/scheduler';
import { makeSnapshot } from './fixtures';

describe('telegram dispatcher', () => {
  const dispatcher = createTelegramDispatcher({ botToken: 'test-token', chatId: '42' });

  beforeEach(() => {
    hoisted.postMock.mockReset();
  });

  it('posts the text to sendMessage for the operator chat', async () => {
    hoisted.postMock.mockImplementationOnce(() => ({ json: async () => ({ ok: true, result: { message_id: 1 } }) }));

    await dispatcher.send('line one\nline two');

    expect(hoisted.postMock).toHaveBeenCalledWith('https://api.telegram.org/bottest-token/sendMessage', {
      json: { chat_id: '42', text: 'line one\nline two', disable_web_page_preview: true },
      throwHttpErrors: false,
    });
  });

  it('throws the api description when telegram rejects the message', async () => {
    hoisted.postMock.mockImplementationOnce(() => ({
      json: async () => ({ ok: false, description: 'Bad Request: chat not found' }),
    }));

    const sent = dispatcher.send('hi');
    await expect(sent).rejects.toThrow(TelegramError);
    await expect(sent).rejects.toThrow('Bad Request: chat not found');
  });

  it('throws on a body that is not a sendMessage response', async () => {
    hoisted.postMock.mockImplementationOnce(() => ({ json: async () => 'nope' }));

    await expect(dispatcher.send('hi')).rejects.toThrow('Unexpected sendMessage response');
  });
});

describe('telegram dispatcher errors', () => {
  const dispatcher = createTelegramDispatcher({ botToken: 'test-token', chatId: '42' });

  beforeEach(() => {
    hoisted.postMock.mockReset();
  });

  it('keeps the bot token out of errors from an unparseable body', async () => {
    hoisted.postMock.mockImplementationOnce(() => ({
      json: async () => {
        throw new Error(
          `Unexpected token '<', "<html>Bad "... is not valid JSON in "https://api.telegram.org/bottest-token/sendMessage"`
        );
      },
    }));

    const sent = dispatcher.send('hi');
    await expect(sent).rejects.toThrow(TelegramError);
    await expect(sent).rejects.toThrow(
      `sendMessage failed: Unexpected token '<', "<html>Bad "... is not valid JSON in "https://api.telegram.org/bot<redacted>/sendMessage"`
    );
  });

  it('does not log the bot token when an alert cycle fails to dispatch', async () => {
    hoisted.postMock.mockImplementationOnce(() => ({
      json: async () => {
        throw new Error('Response code 502 (Bad Gateway) for https://api.telegram.org/bottest-token/sendMessage');
      },
    }));
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const driver = new AlertDriver({
      loadSnapshot: async () => makeSnapshot(),
      evaluate: () => ['alert'],
      dispatcher,
    });

    await expect(driver.runCycle()).resolves.toEqual({ alerts: ['alert'], dispatched: false });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const logged = errorSpy.mock.calls[0]
      .map((arg) => (arg instanceof Error ? `${arg.message} ${arg.stack ?? ''}` : String(arg)))
      .join(' ');
    expect(logged).not.toContain('test-token');
    expect(logged).toContain('bot<redacted>/sendMessage');
  });
});
