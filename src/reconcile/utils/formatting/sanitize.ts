/**
 * Turn an input file name into a results folder name.
 *
 * Every run of characters other than word characters (`\w`), dots and
 * hyphens becomes a single underscore.
 * @param name - Raw name string.
 */
export function sanitize(name: string): string {
  return name.replaceAll(/[^\w.-]+/g, '_');
}
