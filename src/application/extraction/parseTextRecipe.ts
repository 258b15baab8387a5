import { UNTITLED_RECIPE, type RecipeDraft } from '@domain/models/Recipe.ts'
import { parsePrepTime } from './parsePrepTime.ts'

type Section = 'preamble' | 'ingredients' | 'instructions'

/** A header alone on its line, tolerating OCR debris around it ("= Ingredients:", "DIRECTIONS ."). */
const HEADER_LINE = /^[^a-z0-9]*(ingredients|instructions|directions|method|steps)\s*:?[^a-z0-9]*$/i

/** A header followed by a colon somewhere inside a line ("Chicken Soup Ingredients: Chicken"). */
const INLINE_HEADER = /\b(ingredients|instructions|directions|method|steps)\s*:/i

/**
 * A line that opens with a header word and annotates it ("Ingredients (serves 4)",
 * "INGREDIENTS for the dough: flour"). Anything after a later colon is content.
 */
const LEADING_HEADER = /^[^a-z0-9]*(ingredients|instructions|directions|method|steps)\b(?!\s*:)[^:]*(?::(.*))?$/i

/** Labelled lines the recipe log writes ahead of the ingredients block. */
const LABELLED_LINE = /^(recipe|cuisine|prep(?:aration)?\s*time|difficulty|taste|source)\s*:\s*(.*)$/i

/** Scan artifacts and list markers that OCR leaves in front of a title. */
const NOISE_PREFIX = /^[<>®=\-[\]*•#|~_]+\s*/

/**
 * Segment raw OCR text into a recipe draft.
 *
 * Lines between an "Ingredients" header and the next header become the
 * ingredients list; lines after an "Instructions" (or "Directions", "Method",
 * "Steps") header become the instructions; lines before the first header make
 * up the name. Text without any header is kept whole as instructions under a
 * placeholder name. Never throws.
 */
export function parseTextRecipe(text: string): RecipeDraft {
  const sections: Record<Section, string[]> = { preamble: [], ingredients: [], instructions: [] }
  let section: Section = 'preamble'
  let anchored = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    const header = HEADER_LINE.exec(line)
    if (header) {
      section = sectionFor(header[1])
      anchored = true
      continue
    }

    let rest = line
    const leading = LEADING_HEADER.exec(line)
    if (leading) {
      section = sectionFor(leading[1])
      anchored = true
      rest = (leading[2] ?? '').trim()
    }

    let inline = INLINE_HEADER.exec(rest)
    while (inline) {
      const before = rest.slice(0, inline.index).trim()
      if (before) sections[section].push(before)
      section = sectionFor(inline[1])
      anchored = true
      rest = rest.slice(inline.index + inline[0].length).trim()
      inline = INLINE_HEADER.exec(rest)
    }
    if (rest) sections[section].push(rest)
  }

  if (!anchored) {
    return { name: UNTITLED_RECIPE, ingredientsList: '', instructions: text.trim() }
  }

  return {
    ...readPreamble(sections.preamble),
    ingredientsList: sections.ingredients.join('\n'),
    instructions: sections.instructions.join('\n'),
  }
}

function sectionFor(keyword: string): Section {
  return keyword.toLowerCase() === 'ingredients' ? 'ingredients' : 'instructions'
}

function readPreamble(lines: string[]): Omit<RecipeDraft, 'ingredientsList' | 'instructions'> {
  const nameParts: string[] = []
  const draft: Omit<RecipeDraft, 'name' | 'ingredientsList' | 'instructions'> = {}

  for (const line of lines) {
    const labelled = LABELLED_LINE.exec(line)
    if (!labelled) {
      const cleaned = line.replace(NOISE_PREFIX, '').trim()
      if (cleaned) nameParts.push(cleaned)
      continue
    }

    const label = labelled[1].toLowerCase()
    const value = labelled[2].trim()
    if (!value) continue

    if (label === 'recipe') {
      nameParts.push(value)
    } else if (label === 'cuisine') {
      draft.cuisineType = value
    } else if (label === 'difficulty') {
      draft.difficultyLevel = value
    } else if (label === 'taste') {
      draft.tasteProfile = value
    } else if (label !== 'source') {
      const minutes = parsePrepTime(value)
      if (minutes !== null) draft.preparationTime = minutes
    }
  }

  return { name: nameParts.join(' ') || UNTITLED_RECIPE, ...draft }
}
