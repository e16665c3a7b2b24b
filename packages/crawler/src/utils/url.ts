export const isValidUrl = (url: string): boolean => {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
};

/**
 * Resolves `target` against `base` the way a browser resolves a link.
 * Returns `target` untouched when either side cannot be parsed.
 */
export const resolveUrl = (base: string, target: string): string => {
  try {
    return new URL(target, base).toString();
  } catch {
    return target;
  }
};
