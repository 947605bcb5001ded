import { parseClientMessage, tokenFromUrl, INVALID_JSON } from '../src/modules/chat/index.js';

describe('parseClientMessage', () => {
  it('parses and trims a chat message', () => {
    expect(parseClientMessage('{"type":"message","roomId":"room-1","content":"  hi  ","replyTo":"msg-1"}')).toEqual({
      ok: true,
      message: { type: 'message', roomId: 'room-1', content: 'hi', replyTo: 'msg-1' },
    });
  });

  it('parses typing indicators', () => {
    expect(parseClientMessage('{"type":"typing","roomId":"room-1","isTyping":false}')).toEqual({
      ok: true,
      message: { type: 'typing', roomId: 'room-1', isTyping: false },
    });
  });

  it('reports invalid JSON', () => {
    expect(parseClientMessage('{oops')).toEqual({ ok: false, error: INVALID_JSON });
  });

  it('prefixes errors with the field path', () => {
    expect(parseClientMessage('{"type":"edit_message","messageId":"m1","content":" "}')).toEqual({
      ok: false,
      error: 'content: content is required',
    });
    expect(parseClientMessage('{"type":"typing","roomId":"room-1","isTyping":"yes"}')).toEqual({
      ok: false,
      error: 'isTyping: Expected boolean, received string',
    });
  });

  it('rejects unknown message types', () => {
    const result = parseClientMessage('{"type":"shout","roomId":"room-1"}');
    expect(result.ok).toBe(false);
    expect(result.ok ? '' : result.error).toMatch(/^type: Invalid discriminator value/);
  });
});

describe('tokenFromUrl', () => {
  it('reads the token query parameter', () => {
    expect(tokenFromUrl('/ws/chat?token=test-token&x=1')).toBe('test-token');
  });

  it('returns undefined without a token', () => {
    expect(tokenFromUrl('/ws/chat')).toBeUndefined();
    expect(tokenFromUrl('/ws/chat?token=')).toBeUndefined();
    expect(tokenFromUrl(undefined)).toBeUndefined();
  });
});
