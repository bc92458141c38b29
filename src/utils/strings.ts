/**
 * Returns the value when it has non-whitespace content, otherwise undefined.
 */
export function nonBlank(value: string | null | undefined): string | undefined {
  if (value === undefined || value === null || value.trim() === '') {
    return undefined;
  }
  return value;
}

export function isBlank(value: string | null | undefined): boolean {
  return nonBlank(value) === undefined;
}
