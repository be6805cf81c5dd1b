/**
 * Turn a label into a stable, filesystem-safe base name
 *
 * Output only contains [a-z0-9._-], never starts or ends with a hyphen,
 * and is "icon" when nothing usable is left.
 *
 * @example
 * safeFilename("E.Guitar") // "e-guitar"
 * safeFilename("Choir&Vocals") // "choirandvocals"
 * safeFilename("???") // "icon"
 */
export function safeFilename(text: string): string {
  const name = text
    .trim()
    .toLowerCase()
    .replace(/&/g, "and")
    .replace(/[./]+/g, "-")
    .replace(/[^a-z0-9._ -]+/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  return name || "icon";
}
