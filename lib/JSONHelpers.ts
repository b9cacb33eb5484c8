export function safeJsonParse(s: string): unknown | null {
  try {
    return JSON.parse(s);
  } catch (e) {
    return null;
  }
}
