// Printable ASCII minus the quote and backslash, which would need escaping.
const PLAIN_FILENAME = /^[\x20-\x21\x23-\x5b\x5d-\x7e]+$/;

/** RFC 5987 ext-value: percent-encode everything outside attr-char. */
function encodeExtValue(value: string) {
  return encodeURIComponent(value).replace(/['()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * `Content-Disposition` for a download. Names that are not plain ASCII get an
 * ASCII `filename` fallback plus a UTF-8 `filename*`.
 */
export function attachmentDisposition(fileName: string) {
  if (PLAIN_FILENAME.test(fileName)) {
    return `attachment; filename="${fileName}"`;
  }

  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeExtValue(fileName)}`;
}
