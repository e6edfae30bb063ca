import { parseArgs } from 'util'
import { ConfigError, errorMessage } from '../lib/errors'
import type { DubbingTask } from '../services/dubbing'

export const USAGE = `
Usage: dub --subtitles <file> [--subtitles <file> ...] [options]

Options:
  -s, --subtitles <file>       SRT or VTT file to dub (repeatable)
  -v, --video <file>           Video for the matching subtitle file (repeatable, same count as --subtitles)
  -c, --config <file>          JSON settings file (overrides env, overridden by flags)
  -o, --output-dir <dir>       Where outputs go (default: next to each subtitle file)
  -l, --target-language <lang> Language to translate into
      --mode <plain|html>      Translation payload format
      --merge <none|sentences|length|auto>
                               Join subtitle fragments before translating
      --voice <name>           Voice for speech synthesis
      --strict                 Fail a file on an untranslatable cue or desynced speech
      --skip-translation       Speak the source text as is
      --skip-synthesis         Only write translated subtitles
  -h, --help                   Show this help
`

export interface CliOptions {
  help: boolean
  tasks: DubbingTask[]
  configFile?: string
  /** Settings overrides from flags, merged over env and the config file. */
  overrides: Record<string, unknown>
}

/** Subtitles and videos are paired by position. */
export function pairTasks(subtitles: readonly string[], videos: readonly string[], outputDir?: string): DubbingTask[] {
  if (videos.length > 0 && videos.length !== subtitles.length) {
    throw new ConfigError(`got ${subtitles.length} subtitle file(s) but ${videos.length} video(s); pass one video per subtitle file`)
  }
  return subtitles.map((subtitlePath, i) => ({
    subtitlePath,
    videoPath: videos[i],
    outputDir,
  }))
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      subtitles: { type: 'string', short: 's', multiple: true },
      video: { type: 'string', short: 'v', multiple: true },
      config: { type: 'string', short: 'c' },
      'output-dir': { type: 'string', short: 'o' },
      'target-language': { type: 'string', short: 'l' },
      mode: { type: 'string' },
      merge: { type: 'string' },
      voice: { type: 'string' },
      strict: { type: 'boolean', default: false },
      'skip-translation': { type: 'boolean', default: false },
      'skip-synthesis': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof readArgs>
  try {
    parsed = readArgs(argv)
  } catch (err) {
    throw new ConfigError(errorMessage(err))
  }
  const { values } = parsed
  const help = Boolean(values.help)

  const subtitles = values.subtitles ?? []
  if (!help && subtitles.length === 0) {
    throw new ConfigError('at least one --subtitles file is required')
  }

  return {
    help,
    tasks: pairTasks(subtitles, values.video ?? [], values['output-dir']),
    configFile: values.config,
    overrides: {
      translate: values['skip-translation'] ? false : undefined,
      synthesize: values['skip-synthesis'] ? false : undefined,
      translation: {
        targetLanguage: values['target-language'],
        mode: values.mode,
        mergeLines: values.merge,
        onCueFailure: values.strict ? 'abort' : undefined,
      },
      synthesis: {
        voice: values.voice,
        strictSync: values.strict ? true : undefined,
      },
    },
  }
}
