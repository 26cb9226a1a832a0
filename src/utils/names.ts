/** File-system safe: path separators and reserved characters become "_". */
export function safeName(text: string | null | undefined): string {
  if (text === null || text === undefined) return "unknown";
  return text.replace(/[\\/|:*?"<>]/g, "_").trim();
}

const SHEET_NAME_MAX = 31;

/** Spreadsheet tab title: no []:*?/\, no surrounding quotes, at most 31 chars. */
export function safeSheetName(text: string | null | undefined): string {
  const cleaned = String(text ?? "Sheet")
    .replace(/[[\]:*?/\\]/g, "_")
    .replace(/^'+|'+$/g, "");
  return cleaned.slice(0, SHEET_NAME_MAX);
}
