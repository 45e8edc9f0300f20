export const SAMPLE_MESSAGES = [
  "Application started",
  "Processing request",
  "Database query executed",
  "Cache miss",
  "Cache hit",
  "Request completed",
  "Connection established",
  "Authentication successful",
  "File processed",
  "Task completed",
] as const;

export const SAMPLE_LEVELS = ["INFO", "WARN", "ERROR", "DEBUG"] as const;

export const DEFAULT_SAMPLE_COUNT = 1000;

export type SampleOptions = {
  count?: number;
  /** Uniform in [0, 1). */
  random?: () => number;
  /** Epoch milliseconds. */
  now?: () => number;
};

function pick<T>(items: readonly [T, ...T[]], random: () => number): T {
  return items[Math.floor(random() * items.length)] ?? items[0];
}

function randomInt(random: () => number, min: number, maxExclusive: number): number {
  return min + Math.floor(random() * (maxExclusive - min));
}

/**
 * Synthetic log lines for trying the renderer: mostly JSON records with a few
 * optional fields, and roughly one plain text line in twenty.
 */
export function* generateSampleLines(opts: SampleOptions = {}): Generator<string> {
  const count = opts.count ?? DEFAULT_SAMPLE_COUNT;
  const random = opts.random ?? Math.random;
  const now = opts.now ?? Date.now;

  for (let i = 0; i < count; i += 1) {
    const message = pick(SAMPLE_MESSAGES, random);
    const level = pick(SAMPLE_LEVELS, random);

    if (random() < 1 / 20) {
      yield `Plain text log message: ${message}`;
      continue;
    }

    const record: Record<string, string | number> = {
      timestamp: now(),
      level,
      message,
      request_id: `req-${randomInt(random, 1000, 9999)}`,
    };
    if (random() < 1 / 2) {
      record.duration_ms = randomInt(random, 1, 1000);
    }
    if (random() < 1 / 3) {
      record.user_id = `user-${randomInt(random, 1, 100)}`;
    }
    yield JSON.stringify(record);
  }
}
