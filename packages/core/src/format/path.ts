const QUOTE_TRIGGERS_AT_EDGES = Object.freeze([" ", '"', "'"]);

function isControlCode(code: number): boolean {
  return code <= 0x1f || (code >= 0x7f && code <= 0x9f);
}

function escapeControl(ch: string): string {
  if (ch === "\t") return "\\t";
  if (ch === "\n") return "\\n";
  if (ch === "\r") return "\\r";
  return `\\x${ch.charCodeAt(0).toString(16).padStart(2, "0")}`;
}

function hasControlCode(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (isControlCode(text.charCodeAt(i))) return true;
  }
  return false;
}

/**
 * Make a file name safe to print on one terminal line.
 *
 * Names with leading/trailing spaces or quotes, or with control characters,
 * are quoted ("'" unless the name holds one, then '"'), with "\" and the
 * quote escaped. Control characters become visible escapes either way.
 */
export function quotePath(path: string): string {
  let needsQuote = hasControlCode(path);
  for (const edge of QUOTE_TRIGGERS_AT_EDGES) {
    if (path.startsWith(edge) || path.endsWith(edge)) needsQuote = true;
  }

  let out = path;
  if (needsQuote) {
    const quote = path.includes("'") ? '"' : "'";
    out = out.replaceAll("\\", "\\\\").replaceAll(quote, `\\${quote}`);
    out = `${quote}${out}${quote}`;
  }

  let escaped = "";
  for (const ch of out) {
    escaped += isControlCode(ch.charCodeAt(0)) ? escapeControl(ch) : ch;
  }
  return escaped;
}

export function isQuotedPath(text: string): boolean {
  const first = text[0];
  return text.length >= 2 && (first === "'" || first === '"') && text.endsWith(first);
}
