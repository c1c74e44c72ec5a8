const MAX_NAME_LENGTH = 100;

/**
 * Turns a client-supplied filename into something safe to embed in a blob
 * file name on disk.
 * - basename only (both / and \ separators)
 * - whitespace collapsed to underscore
 * - only A-Z, a-z, 0-9, dot, underscore, hyphen survive
 * - no leading dots
 * - truncated to `maxLength`, keeping the extension when it fits
 * - "upload" when nothing is left
 */
export function sanitizeFilename(
  name: string | undefined | null,
  maxLength: number = MAX_NAME_LENGTH,
): string {
  if (!name) return "upload";

  const base = name.split(/[\\/]/).pop() || "";

  let s = base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^\.+/, "");

  if (s.length > maxLength) {
    const dot = s.lastIndexOf(".");
    const ext = dot > 0 ? s.slice(dot) : "";
    s =
      ext.length > 0 && ext.length < maxLength
        ? s.slice(0, maxLength - ext.length) + ext
        : s.slice(0, maxLength);
  }

  return s || "upload";
}
