const KEEP_ENDINGS = ['ss', 'us', 'is']

/**
 * Basic singular forms of a lower-case word, so "tomatoes" also finds "tomato".
 * Words that naturally end in s ("hummus", "couscous") give none. A "-ves"
 * word gives both readings: "halves" is "half", "cloves" is "clove".
 */
export function singularForms(word: string): string[] {
  if (word.length <= 3 || !word.endsWith('s') || KEEP_ENDINGS.some((e) => word.endsWith(e))) {
    return []
  }

  if (word.endsWith('ies')) return [word.slice(0, -3) + 'y']
  if (word.endsWith('ves')) return [word.slice(0, -3) + 'f', word.slice(0, -1)]
  if (word.endsWith('oes')) return [word.slice(0, -2)]
  if (/(?:ch|sh|x|z)es$/.test(word)) return [word.slice(0, -2)]
  return [word.slice(0, -1)]
}
