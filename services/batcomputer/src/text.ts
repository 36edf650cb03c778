/** "arkham ASYLUM" -> "Arkham Asylum"; every letter after a non-letter is capitalised. */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) => before + letter.toUpperCase());
}
