export type TextValue = string | null | undefined;

export const normalizeWhitespace = (value: TextValue): string =>
  (value ?? "").replace(/\s+/g, " ").trim();

export const firstNonEmpty = (...values: TextValue[]): string => {
  for (const value of values) {
    const normalized = normalizeWhitespace(value);
    if (normalized) {
      return normalized;
    }
  }
  return "";
};

export const clampText = (value: TextValue, maxLength: number): string => {
  const normalized = normalizeWhitespace(value);
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return `${normalized.slice(0, maxLength)}...`;
};

const asText = (value: unknown): string =>
  value === null || value === undefined ? "" : normalizeWhitespace(String(value));

/**
 * Merge `patch` into `base` without clobbering: keys missing from base are
 * adopted, keys whose base value is blank take the patch value when that is
 * non-blank, and every other base value is kept.
 */
export const mergeFillEmpty = <T extends object>(base: T, patch: Partial<T>): T => {
  const merged: T = { ...base };

  for (const key in patch) {
    if (!Object.prototype.hasOwnProperty.call(patch, key)) {
      continue;
    }

    const patchValue: T[typeof key] | undefined = patch[key];
    if (patchValue === undefined) {
      continue;
    }

    if (!(key in merged)) {
      merged[key] = patchValue;
      continue;
    }

    if (asText(merged[key]) === "" && asText(patchValue) !== "") {
      merged[key] = patchValue;
    }
  }

  return merged;
};

/**
 * Apply extraction layers in priority order (highest first). Each later layer
 * only fills what the earlier ones left blank.
 */
export const fuseLayers = <T extends object>(base: T, layers: ReadonlyArray<Partial<T>>): T =>
  layers.reduce<T>((current, layer) => mergeFillEmpty(current, layer), base);

export const canonicalizeUrl = (href: TextValue, baseUrl: string): string => {
  const trimmed = (href ?? "").trim();
  if (!trimmed) {
    return "";
  }

  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return "";
  }
};

export const isHttpUrl = (value: string): boolean => {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && Boolean(parsed.hostname);
  } catch {
    return false;
  }
};

export const dedupeByUrl = <T extends { url: string }>(rows: ReadonlyArray<T>): T[] => {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const row of rows) {
    const url = row.url.trim();
    if (!url || seen.has(url)) {
      continue;
    }
    seen.add(url);
    unique.push(row);
  }

  return unique;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
