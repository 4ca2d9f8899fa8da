/** Case handling for searches: only ASCII letters have a case. */

export function containsUppercase(text: string): boolean {
  return /[A-Z]/.test(text);
}

export function asciiLowercase(text: string): string {
  return text.replace(/[A-Z]/g, (character) => character.toLowerCase());
}
