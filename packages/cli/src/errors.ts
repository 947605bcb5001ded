/**
 * fs errors may come from another realm (vm contexts, test sandboxes), so no instanceof
 */
export function isErrnoError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
