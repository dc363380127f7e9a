function safeJson(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    const text = JSON.stringify(
      value,
      (_key, v: unknown) => {
        if (!v || typeof v !== "object") return v;
        if (seen.has(v)) return "[circular]";
        seen.add(v);
        return v;
      },
      2,
    );
    return text ?? String(value);
  } catch {
    return String(value);
  }
}

function readString(obj: object, key: string): string {
  const v: unknown = Reflect.get(obj, key);
  return typeof v === "string" ? v.trim() : "";
}

function nestedErrors(obj: object): string[] {
  const errors: unknown = Reflect.get(obj, "errors");
  if (!Array.isArray(errors)) return [];
  return errors.map((e: unknown) => formatError(e)).filter((x) => x.length > 0);
}

/**
 * Turns anything thrown into a single line. Driver errors (pg) often carry the
 * useful part in `code` or in an `errors` array (AggregateError on connect), so
 * both are consulted when the message is empty.
 */
export function formatError(err: unknown): string {
  if (typeof err === "string") {
    const s = err.trim();
    return s.length > 0 ? s : "unknown_error";
  }

  if (err instanceof Error) {
    const msg = err.message.trim();
    if (msg.length > 0) return msg;
    const nested = nestedErrors(err);
    if (nested.length > 0) return nested.join(" | ");
    const code = readString(err, "code");
    if (code.length > 0) return code;
    return err.name || "unknown_error";
  }

  if (err && typeof err === "object") {
    const nested = nestedErrors(err);
    if (nested.length > 0) return nested.join(" | ");
    const code = readString(err, "code");
    if (code.length > 0) {
      const msg = readString(err, "message");
      if (msg.length > 0) return `${code}: ${msg}`;
      return code;
    }
    const json = safeJson(err);
    return json.trim().length > 0 ? json : "unknown_error";
  }

  const s = String(err ?? "").trim();
  return s.length > 0 ? s : "unknown_error";
}
