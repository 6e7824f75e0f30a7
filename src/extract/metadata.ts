function formatLabel(key: string): string {
  return key
    .split(/[_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Collapses whatever a strategy produced for `metadata` (string, list, nested object) into
 * the persisted `"Label: value; Label: value"` form.
 */
export function flattenMetadata(value: unknown, depth = 0): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value.replace(/\s+/g, " ").trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value
      .map((item) => flattenMetadata(item, depth + 1))
      .filter((item) => item.length > 0)
      .join(depth === 0 ? "; " : ", ");
  }
  if (typeof value === "object") {
    return Object.entries(value)
      .map(([key, nested]) => {
        const flattened = flattenMetadata(nested, depth + 1);
        return flattened ? `${formatLabel(key)}: ${flattened}` : "";
      })
      .filter((part) => part.length > 0)
      .join("; ");
  }
  return "";
}

export function joinMetadata(parts: Array<[label: string, value: string]>): string {
  return parts
    .filter(([, value]) => value.trim().length > 0)
    .map(([label, value]) => `${label}: ${value.trim()}`)
    .join("; ");
}
