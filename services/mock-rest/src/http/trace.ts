type HeaderValue = string | string[] | undefined;

export interface TraceSource {
  method: string;
  url: string;
  httpVersion: string;
  headers: Record<string, HeaderValue>;
}

export const TRACE_CONTENT_TYPE = 'message/http';

/**
 * This server is always the final recipient, so nothing is forwarded; the
 * echoed Max-Forwards is what the next hop would have received.
 */
export function decrementMaxForwards(value: string): string {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return value;
  const hops = Number(trimmed);
  return String(hops > 0 ? hops - 1 : 0);
}

function headerLine(name: string, value: string | string[]): string {
  const joined = Array.isArray(value) ? value.join(', ') : value;
  return `${name}: ${name === 'max-forwards' ? decrementMaxForwards(joined) : joined}`;
}

/** Request line plus headers, formatted as a `message/http` body. */
export function buildTraceMessage(source: TraceSource): string {
  const lines = [`${source.method} ${source.url} HTTP/${source.httpVersion}`];
  for (const [name, value] of Object.entries(source.headers)) {
    if (value === undefined) continue;
    lines.push(headerLine(name.toLowerCase(), value));
  }
  return `${lines.join('\r\n')}\r\n\r\n`;
}
