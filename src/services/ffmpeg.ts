import ffmpeg from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import ffprobeInstaller from '@ffprobe-installer/ffprobe'
import path from 'path'
import fs from 'fs'
import type { FfprobeData } from 'fluent-ffmpeg'
import { MuxError, errorMessage } from '../lib/errors'
import { getLogger } from '../lib/logger'
import type { AddTrackRequest, MediaInfo, Muxer } from './dubbing'

// Explicit paths: use env in Docker (e.g. /usr/bin/ffmpeg) if the file exists, else npm installer (works on Windows)
function resolveFfmpegPath(envPath: string | undefined, fallback: string): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return fallback
}
const ffmpegPath = resolveFfmpegPath(process.env.FFMPEG_PATH, ffmpegInstaller.path)
const ffprobePath = resolveFfmpegPath(process.env.FFPROBE_PATH, ffprobeInstaller.path)
ffmpeg.setFfmpegPath(ffmpegPath)
try {
  ffmpeg.setFfprobePath(ffprobePath)
} catch (err) {
  getLogger('worker').warn({ err }, 'could not set ffprobe path')
}

const FFMPEG_THREADS = process.env.FFMPEG_THREADS || '4'

/** Kill the mux if ffmpeg reports no progress for this long. */
export const HUNG_MUX_MS = 90 * 1000

function setupHungProtection(
  cmd: { kill: (signal: string) => unknown },
  reject: (err: Error) => void
): { clear: () => void; reset: () => void } {
  let hungTimer: NodeJS.Timeout
  const reset = () => {
    clearTimeout(hungTimer)
    hungTimer = setTimeout(() => {
      try {
        cmd.kill('SIGKILL')
      } catch (err) {
        getLogger('worker').warn({ err }, 'could not kill hung ffmpeg')
      }
      reject(new MuxError(`no ffmpeg output for ${HUNG_MUX_MS / 1000}s`))
    }, HUNG_MUX_MS)
  }
  const clear = () => clearTimeout(hungTimer)
  reset()
  return { clear, reset }
}

/** Duration and audio stream count of a media file. */
export function getMediaInfo(filePath: string): Promise<MediaInfo> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: unknown, metadata: FfprobeData) => {
      if (err) {
        reject(new MuxError(`ffprobe failed: ${errorMessage(err)}`, { cause: err }))
        return
      }
      const duration = Number(metadata.format.duration)
      resolve({
        duration: Number.isFinite(duration) ? duration : 0,
        audioStreams: metadata.streams.filter((s) => s.codec_type === 'audio').length,
      })
    })
  })
}

/** mov_text is the only soft subtitle codec mp4/mov accept. */
function subtitleCodec(outputPath: string): string {
  const ext = path.extname(outputPath).toLowerCase()
  return ext === '.mkv' ? 'srt' : ext === '.webm' ? 'webvtt' : 'mov_text'
}

/**
 * Copy the video with its original audio, and add the dubbed track (and subtitle files as soft tracks).
 * The dubbed track comes after the original audio streams.
 */
export function addAudioTrack(request: AddTrackRequest): Promise<string> {
  const { videoPath, audioPath, subtitlePaths, outputPath, originalAudioStreams, title } = request
  return new Promise((resolve, reject) => {
    const options = ['-threads', FFMPEG_THREADS, '-map', '0:v', '-map', '0:a?', '-map', '1:a']
    subtitlePaths.forEach((_, i) => options.push('-map', `${i + 2}:s`))
    options.push('-c:v', 'copy', '-c:a', 'aac', '-b:a', '192k')
    if (subtitlePaths.length > 0) options.push('-c:s', subtitleCodec(outputPath))
    if (title) options.push(`-metadata:s:a:${originalAudioStreams}`, `title=${title}`)
    subtitlePaths.forEach((file, i) => {
      options.push(`-metadata:s:s:${i}`, `title=${path.basename(file, path.extname(file))}`)
    })

    let cmd = ffmpeg(videoPath).input(audioPath)
    for (const file of subtitlePaths) cmd = cmd.input(file)
    cmd = cmd
      .outputOptions(options)
      .on('progress', () => {
        hung.reset()
      })
      .on('end', () => {
        hung.clear()
        resolve(outputPath)
      })
      .on('error', (err: Error) => {
        hung.clear()
        reject(new MuxError(`ffmpeg failed: ${err.message}`, { cause: err }))
      })
    const hung = setupHungProtection(cmd, reject)
    cmd.save(outputPath)
  })
}

export const ffmpegMuxer: Muxer = {
  probe: getMediaInfo,
  addAudioTrack,
}
