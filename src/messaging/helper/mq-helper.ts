import type { ConsumeMessage } from "amqplib";

export function parseAmqpUrls(env?: string | null): string[] | null {
  if (!env) return null;
  const urls = env.includes(",") ? env.split(",").map((s) => s.trim()) : [env];
  const filtered = urls.filter(Boolean);
  return filtered.length ? filtered : null;
}

/** Broken JSON comes back as the raw string. */
export function safeJsonParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return s;
  }
}

export function isObj(x: unknown): x is Record<string, unknown> {
  return x !== null && typeof x === "object";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function deadLetterQueueName(queue: string, suffix: string): string {
  return `${queue}${suffix}`;
}

function headerCount(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  return null;
}

/**
 * Quorum queues report `x-delivery-count`; publishers that retry by
 * republishing set `x-retries`. Classic queues only flag `redelivered`.
 */
export function readRedeliveryCount(msg: ConsumeMessage): number {
  const headers = msg.properties.headers ?? {};
  return (
    headerCount(headers["x-delivery-count"]) ??
    headerCount(headers["x-retries"]) ??
    (msg.fields.redelivered ? 1 : 0)
  );
}
