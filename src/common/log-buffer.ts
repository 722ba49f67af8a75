/**
 * Кольцевой буфер логов в памяти: последние строки доступны через GET /logs.
 * Заполняется BufferLogger ещё до инициализации DI.
 */
const CAPACITY = 5000;

export type LogLine = { ts: string; level: string; context?: string; message: string };

const lines: LogLine[] = [];

export const LogBuffer = {
  append(level: string, message: string, context?: string): void {
    lines.push({ ts: new Date().toISOString(), level, context, message });
    if (lines.length > CAPACITY) lines.splice(0, lines.length - CAPACITY);
  },

  /** Последние `limit` строк (все, если limit не задан). */
  tail(limit?: number): string[] {
    const slice = limit != null && limit > 0 ? lines.slice(-limit) : lines;
    return slice.map((l) => `${l.ts} ${l.level}${l.context ? ` [${l.context}]` : ''} ${l.message}`);
  },

  size(): number {
    return lines.length;
  },

  clear(): void {
    lines.length = 0;
  },
};
