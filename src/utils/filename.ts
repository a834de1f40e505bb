import { TITLE_MAX_LENGTH } from "../constants.js";

// Letters, digits, combining marks (covers CJK ideographs), underscore, hyphen, dot
const UNSAFE_FILENAME_CHARS = /[^\p{L}\p{N}\p{M}_.-]/gu;
const MAX_EXTENSION_LENGTH = 16;
const H1_TITLE = /^#\s+(.+)$/;

function splitExtension(name: string): [string, string] {
  let leadingDots = 0;
  while (leadingDots < name.length && name[leadingDots] === ".") leadingDots++;
  const dot = name.lastIndexOf(".");
  if (dot < leadingDots) return [name, ""];
  return [name.slice(0, dot), name.slice(dot)];
}

function truncate(value: string, maxLength: number): string {
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, maxLength).join("") : value;
}

/**
 * Turns an untrusted name into a single safe path segment.
 *
 * Path components are dropped, unsafe characters become `_`, dot runs are
 * collapsed, and the base is cut to `maxBaseLength` characters (`file` when
 * nothing is left). Never throws.
 */
export function sanitizeFilename(name: string, maxBaseLength = 50): string {
  const raw = typeof name === "string" ? name.replace(/\0/g, "") : "";
  const segments = raw.split(/[\\/]/);
  const finalSegment = segments[segments.length - 1] ?? "";

  const [rawBase, rawExt] = splitExtension(finalSegment);

  let base = rawBase.replace(UNSAFE_FILENAME_CHARS, "_").replace(/\.{2,}/g, ".");
  base = truncate(base, Math.max(1, Math.floor(maxBaseLength))).replace(/\.+$/, "");
  if (!base) base = "file";

  let ext = "";
  if (rawExt.length > 1) {
    const body = rawExt.slice(1).replace(UNSAFE_FILENAME_CHARS, "_");
    ext = `.${truncate(body, MAX_EXTENSION_LENGTH - 1)}`;
  }

  return base + ext;
}

export function fileExtension(name: string): string {
  return splitExtension(sanitizeFilename(name))[1].toLowerCase();
}

/** Text of the first level-1 heading, or null when the document has none. */
export function extractTitle(markdown: string): string | null {
  for (const line of markdown.split(/\r?\n/)) {
    const match = H1_TITLE.exec(line);
    if (match) {
      const title = match[1].trim();
      if (title) return title;
    }
  }
  return null;
}

export function formatDateStamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}${m}${d}`;
}

/**
 * Output filename (without extension) for a finished transcript:
 * `<title>_<YYYYMMDD>`, falling back to `fallback` when there is no heading.
 */
export function deriveOutputName(markdown: string, fallback: string, date: Date): string {
  const title = extractTitle(markdown);
  const safeTitle = title ? sanitizeFilename(title, TITLE_MAX_LENGTH) : sanitizeFilename(fallback);
  return `${safeTitle}_${formatDateStamp(date)}`;
}
