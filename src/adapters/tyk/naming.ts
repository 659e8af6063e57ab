// naming helpers for per-API artifacts

/** Turn an API title into a file-name-safe key, keeping it readable. */
export function unitKey(title: string) {
  const key = title
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/(^[-.]+|-+$)/g, "");
  return key || "api";
}

export function unitFileName(key: string) {
  return `oas-${key}.json`;
}

// keys that differ only by case land on the same file on some filesystems
export function keyIdentity(key: string) {
  return key.toLowerCase();
}
