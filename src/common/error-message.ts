export function getErrorMessage(e: unknown): string {
  if (e && typeof e === 'object' && 'message' in e) {
    const m = e.message;
    if (typeof m === 'string') return m;
  }
  // eslint-disable-next-line @typescript-eslint/no-base-to-string
  return String(e);
}
