const INVALID_NAME_CHARS = /[^a-z0-9-]/g;

export function sanitizeName(value: string): string {
  return value.toLowerCase().replace(INVALID_NAME_CHARS, '');
}

const pad = (n: number) => n.toString().padStart(2, '0');

/** UTC timestamp as yyMMddHHmmss. */
export function timestampSuffix(date: Date): string {
  return [
    date.getUTCFullYear() % 100,
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ].map(pad).join('');
}

export function containerName(userId: string, plan: string, now: Date = new Date()): string {
  return `${sanitizeName(`user${userId}-${plan}`)}-${timestampSuffix(now)}`;
}
