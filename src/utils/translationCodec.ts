import { ValidationError } from '../lib/errors'
import { normalizeForMatch } from './similarity'

/**
 * `plain`: numbered lines, one per cue. `html`: each line wrapped in its own <Ln>…</Ln> element, which keeps
 * models from merging or reflowing lines.
 */
export type TranslationMode = 'plain' | 'html'

/** Returns a rejection reason, or null when the translated line is acceptable. */
export type ResponseCheck = (source: string, translated: string) => string | null

const NUMBERED_LINE = /^\s*(\d+)\s*[.)\-:]\s*(.*)$/

function flatten(line: string): string {
  return line.replace(/\s*\n\s*/g, ' ').trim()
}

export function encodeLines(lines: readonly string[], mode: TranslationMode): string {
  if (mode === 'html') {
    return lines.map((line, i) => `<L${i + 1}>${flatten(line)}</L${i + 1}>`).join('\n')
  }
  return lines.map((line, i) => `${i + 1}. ${flatten(line)}`).join('\n')
}

function decodePlain(reply: string, expected: number): string[] {
  const cleaned = reply
    .replace(/```[a-z]*\n?/gi, '')
    .replace(/^Translation:?\s*/i, '')
    .trim()
  const lines = cleaned.split('\n').filter((line) => line.trim().length > 0)
  if (lines.length !== expected) {
    throw new ValidationError(`expected ${expected} lines, got ${lines.length}`)
  }
  return lines.map((line, i) => {
    const m = line.match(NUMBERED_LINE)
    if (!m) return line.trim()
    if (parseInt(m[1], 10) !== i + 1) {
      throw new ValidationError(`line ${i + 1} is numbered ${m[1]}`)
    }
    return m[2].trim()
  })
}

function decodeHtml(reply: string, expected: number): string[] {
  const opening = reply.match(/<L\d+>/g)?.length ?? 0
  const closing = reply.match(/<\/L\d+>/g)?.length ?? 0
  if (opening !== expected || closing !== expected) {
    throw new ValidationError(`expected ${expected} tagged lines, got ${opening} opening and ${closing} closing tags`)
  }
  const lines: string[] = []
  for (let i = 1; i <= expected; i++) {
    const open = `<L${i}>`
    const start = reply.indexOf(open)
    const end = reply.indexOf(`</L${i}>`)
    if (start === -1 || end === -1 || end < start + open.length) {
      throw new ValidationError(`tag L${i} missing or malformed`)
    }
    const text = reply.slice(start + open.length, end)
    if (/<\/?L\d+>/.test(text)) {
      throw new ValidationError(`tag L${i} contains nested tags`)
    }
    lines.push(text.trim())
  }
  return lines
}

/** Decode a translation reply into exactly `expected` strings or throw ValidationError. */
export function decodeReply(reply: string, mode: TranslationMode, expected: number): string[] {
  return mode === 'html' ? decodeHtml(reply, expected) : decodePlain(reply, expected)
}

export function stripTrailingEllipsis(text: string): string {
  return text.replace(/(?:\.{3}|…+)\s*$/u, '').trimEnd()
}

export const rejectEmpty: ResponseCheck = (source, translated) =>
  source.trim().length > 0 && translated.trim().length === 0 ? 'empty translation for non-empty line' : null

/** Rejects lines returned unchanged. Lines without letters (numbers, symbols) may pass through. */
export const rejectPassthrough: ResponseCheck = (source, translated) => {
  const normalized = normalizeForMatch(source)
  if (!/\p{L}/u.test(normalized)) return null
  return normalized === normalizeForMatch(translated) ? 'line left untranslated' : null
}

/**
 * Requires at least `minShare` of the letters in a translated line to belong to the given Unicode script
 * (e.g. "Han", "Cyrillic", "Latin").
 */
export function requireScript(script: string, minShare = 0.5): ResponseCheck {
  const inScript = new RegExp(`\\p{Script=${script}}`, 'gu')
  return (_source, translated) => {
    const letters = translated.match(/\p{L}/gu)?.length ?? 0
    if (letters === 0) return null
    const matching = translated.match(inScript)?.length ?? 0
    return matching / letters >= minShare ? null : `expected ${script} script`
  }
}

/** True when the name is a Unicode script the regex engine knows. */
export function isKnownScript(script: string): boolean {
  try {
    new RegExp(`\\p{Script=${script}}`, 'u')
    return true
  } catch {
    return false
  }
}
