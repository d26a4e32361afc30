export interface RequestLogEntry {
  timestamp: number;
  method: string;
  path: string;
  client_address?: string;
}

export interface RequestSample {
  method: string;
  route: string;          // route template, e.g. /api/items/:id
  path: string;           // path as received
  clientAddress?: string;
}

export const UNMATCHED_ROUTE = '(unmatched)';
const MAX_LOG_ENTRIES = 100;

/**
 * Process-wide request counters keyed by "<METHOD> <route>", plus a bounded
 * log of the most recent requests. Counts only ever grow.
 */
export class RequestStats {
  private readonly counts = new Map<string, number>();
  private readonly log: RequestLogEntry[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  record(sample: RequestSample): void {
    const key = `${sample.method} ${sample.route}`;
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);

    this.log.push({
      timestamp: this.now(),
      method: sample.method,
      path: sample.path,
      ...(sample.clientAddress ? { client_address: sample.clientAddress } : {}),
    });
    if (this.log.length > MAX_LOG_ENTRIES) this.log.shift();
  }

  count(method: string, route: string): number {
    return this.counts.get(`${method} ${route}`) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  recent(limit = 5): RequestLogEntry[] {
    return this.log.slice(-limit).map((entry) => ({ ...entry }));
  }
}
