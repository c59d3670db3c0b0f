import { z } from "zod";

const MessageItem = z.union([z.string(), z.object({ text: z.string() })]);
const MessagesPayload = z.union([
  z.array(z.unknown()),
  z.object({ messages: z.array(z.unknown()) }),
]);

function itemText(item: unknown): string | null {
  const parsed = MessageItem.safeParse(item);
  if (!parsed.success) return null;
  return typeof parsed.data === "string" ? parsed.data : parsed.data.text;
}

function clean(texts: Array<string | null>): string[] {
  return texts
    .map((t) => (t ?? "").replace(/\r\n/g, "\n").trim())
    .filter(Boolean);
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined; // не JSON, пробуем следующий формат
  }
}

// Колонки с текстом телеграммы по приоритету; иначе первая
const CSV_TEXT_COLUMNS = ["messages", "message", "msg", "text"];

/** One CSV line into fields; double quotes escape delimiters and `""` a quote. */
function parseCsvLine(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inQuotes) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      fields.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Telegram column of a CSV table. The first row is the header; the column is
 * picked by name, else the first one.
 */
export function csvMessages(text: string): string[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim());
  if (lines.length < 2) return [];

  const delimiter = lines[0].includes("\t") ? "\t" : lines[0].includes(";") ? ";" : ",";
  const headers = parseCsvLine(lines[0], delimiter).map((h) => h.trim().toLowerCase());
  const named = CSV_TEXT_COLUMNS.map((c) => headers.indexOf(c)).find((i) => i >= 0);
  const col = named ?? 0;

  return clean(lines.slice(1).map((l) => parseCsvLine(l, delimiter)[col] ?? null));
}

/**
 * Splits an uploaded payload into raw telegram lines.
 * CSV when the MIME type says so; otherwise JSON (array, or `{messages: [...]}`),
 * then NDJSON, then plain text by line.
 */
export function splitMessages(payload: string, mimeType?: string): string[] {
  const text = payload.replace(/^\uFEFF/, "").trim();
  if (!text) return [];

  if (mimeType && mimeType.includes("csv")) return csvMessages(text);

  // JSON
  if ((mimeType && mimeType.includes("json")) || text.startsWith("[") || text.startsWith("{")) {
    const body = MessagesPayload.safeParse(tryJson(text));
    if (body.success) {
      const items = Array.isArray(body.data) ? body.data : body.data.messages;
      const msgs = clean(items.map(itemText));
      if (msgs.length > 0) return msgs;
    }
  }

  const lines = text.split(/\r?\n/);

  // NDJSON: строка-объект {text}, строка-JSON-строка, иначе как есть
  if (lines.some((l) => l.trim().startsWith("{"))) {
    const msgs = clean(
      lines.map((line) => {
        const l = line.trim();
        if (!l) return null;
        const obj = tryJson(l);
        return obj === undefined ? l : itemText(obj);
      })
    );
    if (msgs.length > 0) return msgs;
  }

  // Plain: по строкам
  return clean(lines);
}
