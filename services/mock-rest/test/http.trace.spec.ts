import { describe, expect, it } from 'vitest';
import { buildTraceMessage, decrementMaxForwards } from '../src/http/trace';

describe('decrementMaxForwards', () => {
  it('decrements positive hop counts and floors at zero', () => {
    expect(decrementMaxForwards('10')).toBe('9');
    expect(decrementMaxForwards(' 1 ')).toBe('0');
    expect(decrementMaxForwards('0')).toBe('0');
  });

  it('leaves non-numeric values alone', () => {
    expect(decrementMaxForwards('many')).toBe('many');
    expect(decrementMaxForwards('-2')).toBe('-2');
  });
});

describe('buildTraceMessage', () => {
  it('renders the request line and lower-cased headers', () => {
    const message = buildTraceMessage({
      method: 'TRACE',
      url: '/api/items?x=1',
      httpVersion: '1.1',
      headers: { Host: 'localhost', 'Max-Forwards': '3', accept: ['text/plain', 'message/http'], skipped: undefined },
    });
    expect(message).toBe(
      'TRACE /api/items?x=1 HTTP/1.1\r\n' +
        'host: localhost\r\n' +
        'max-forwards: 2\r\n' +
        'accept: text/plain, message/http\r\n\r\n',
    );
  });
});
