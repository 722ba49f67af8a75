export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 3x-ui отдаёт settings / streamSettings строкой с JSON, но некоторые версии — уже объектом.
 * Пустая строка и null считаются пустым объектом; всё остальное, что не парсится в объект, — ошибка.
 */
export function parseJsonObject(value: unknown, field: string): JsonObject {
  if (value == null || value === '') return {};
  if (isJsonObject(value)) return value;
  if (typeof value !== 'string') throw new SyntaxError(`${field}: expected JSON object, got ${typeof value}`);
  const parsed: unknown = JSON.parse(value);
  if (!isJsonObject(parsed)) throw new SyntaxError(`${field}: expected JSON object`);
  return parsed;
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

export function asObject(value: unknown): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Структурное сравнение JSON-значений (порядок ключей не важен). */
export function jsonEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => jsonEqual(v, b[i]));
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((k) => Object.prototype.hasOwnProperty.call(b, k) && jsonEqual(a[k], b[k]));
  }
  return false;
}
