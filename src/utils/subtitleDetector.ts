const VTT_HEADER = 'WEBVTT'
/** SRT/VTT timestamp pattern: HH:MM:SS,mmm or HH:MM:SS.mmm followed by --> */
const TIMESTAMP_PATTERN = /\d\d:\d\d:\d\d[.,]\d\d\d\s+-->/

export type DetectedFormat = 'srt' | 'vtt' | 'unknown'

/**
 * Detect subtitle format from content only. Ignores filename/extension.
 */
export function detectSubtitleFormat(content: string): DetectedFormat {
  // BOM-prefixed files are common from Windows editors
  const trimmed = content.replace(/^\uFEFF/, '').trimStart()
  if (trimmed.startsWith(VTT_HEADER)) return 'vtt'
  if (TIMESTAMP_PATTERN.test(trimmed)) return 'srt'
  return 'unknown'
}
