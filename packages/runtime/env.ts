export type Env = Record<string, string | undefined>;

const truthy = new Set(['1', 'true', 'yes', 'on']);

export function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return truthy.has(value.toLowerCase());
}

export function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const list = value
    .split(',')
    .map(v => v.trim())
    .filter(Boolean);
  return list.length > 0 ? list : undefined;
}
