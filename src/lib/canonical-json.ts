function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortValue);
  }

  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    const keys = Object.keys(value).sort((a, b) => a.localeCompare(b));
    for (const key of keys) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        out[key] = sortValue(child);
      }
    }
    return out;
  }

  return value;
}

/** Key-sorted JSON, so equal records always hash the same. */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(sortValue(value));
}
