/** One JSON document on a single line, for `--json` output. */
export function formatJson(value: unknown): string {
  return JSON.stringify(value);
}
