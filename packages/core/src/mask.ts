/**
 * Mask an account identifier for logs: keep the first three characters.
 */
export function maskIdentifier(identifier: string): string {
  return `${identifier.slice(0, 3)}***`;
}
