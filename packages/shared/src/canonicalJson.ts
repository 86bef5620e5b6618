const sortValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((entry) => sortValue(entry));
  }
  if (value && typeof value === "object") {
    return Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .reduce<Record<string, unknown>>((acc, [key, entry]) => {
        acc[key] = sortValue(entry);
        return acc;
      }, {});
  }
  return value;
};

// Keys sorted at every depth; undefined members are dropped.
export const canonicalizeJson = (value: unknown) => JSON.stringify(sortValue(value));
