import { CueSetError } from '../lib/errors'

/** One time-coded subtitle line. Times are in seconds. */
export interface Cue {
  readonly index: number
  readonly start: number
  readonly end: number
  readonly sourceText: string
  /** Written only through CueSet.setTranslation. */
  readonly translatedText: string
}

export type CueInput = Pick<Cue, 'index' | 'start' | 'end' | 'sourceText'> & { translatedText?: string }

type StoredCue = Omit<Cue, 'translatedText'> & { translatedText: string }

/**
 * Ordered, time-coded subtitle lines. Insertion order is timeline order and never changes;
 * `index` is the join key every stage uses.
 */
export class CueSet implements Iterable<Cue> {
  private readonly cues: StoredCue[]
  private readonly byIndex = new Map<number, StoredCue>()

  constructor(inputs: CueInput[]) {
    this.cues = inputs.map((input) => ({
      index: input.index,
      start: input.start,
      end: input.end,
      sourceText: input.sourceText,
      translatedText: input.translatedText ?? '',
    }))
    let previousStart = -Infinity
    for (const cue of this.cues) {
      if (!(cue.end > cue.start)) {
        throw new CueSetError(`cue ${cue.index}: end (${cue.end}) must be after start (${cue.start})`)
      }
      if (cue.start < previousStart) {
        throw new CueSetError(`cue ${cue.index} starts before the cue preceding it`)
      }
      if (this.byIndex.has(cue.index)) {
        throw new CueSetError(`duplicate cue index ${cue.index}`)
      }
      previousStart = cue.start
      this.byIndex.set(cue.index, cue)
    }
  }

  get size(): number {
    return this.cues.length
  }

  [Symbol.iterator](): Iterator<Cue> {
    return this.cues[Symbol.iterator]()
  }

  toArray(): readonly Cue[] {
    return this.cues
  }

  at(position: number): Cue | undefined {
    return this.cues[position]
  }

  get(index: number): Cue {
    return this.stored(index)
  }

  setTranslation(index: number, text: string): void {
    this.stored(index).translatedText = text
  }

  private stored(index: number): StoredCue {
    const cue = this.byIndex.get(index)
    if (!cue) throw new CueSetError(`no cue with index ${index}`)
    return cue
  }

  /** Cues that will be voiced: translated text if present, otherwise nothing. */
  voiced(): Cue[] {
    return this.cues.filter((cue) => cue.translatedText.trim().length > 0)
  }

  /** Independent copy, so a re-run never observes a previous run's translations. */
  clone(): CueSet {
    return new CueSet(this.cues.map((cue) => ({ ...cue })))
  }
}
