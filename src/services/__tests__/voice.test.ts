import { describe, expect, it } from 'vitest'
import { OPENAI_VOICES, OpenAIVoiceService } from '../voice'
import { ConfigError } from '../../lib/errors'

describe('OpenAIVoiceService.assertVoice', () => {
  it('accepts the voices the backend offers', () => {
    for (const voice of OPENAI_VOICES) {
      expect(() => OpenAIVoiceService.assertVoice(voice)).not.toThrow()
    }
  })

  it('rejects anything else before a request is made', () => {
    expect(() => OpenAIVoiceService.assertVoice('robot')).toThrow(ConfigError)
  })
})
