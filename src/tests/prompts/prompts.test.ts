import { describe, it, expect } from 'vitest'
import {
  SUPPORTED_CONNECTIONS_NOTICE,
  formatUtcTimestamp,
  generateFullSystemPrompt,
  getAuthkitSystemPrompt,
  getDefaultSystemPrompt,
} from '../../prompts'

const NOW = new Date(Date.UTC(2025, 2, 4, 5, 6, 7))

describe('prompts', () => {
  it('should format timestamps in UTC', () => {
    expect(formatUtcTimestamp(NOW)).toBe('2025-03-04 05:06:07')
  })

  it('should list connections and platforms in the default prompt', () => {
    const prompt = getDefaultSystemPrompt('\t* gmail - Key: k1', 'gmail (Gmail)\n\t* github (GitHub)')

    expect(prompt).toContain('ACTIVE CONNECTIONS:\n\t* gmail - Key: k1\n')
    expect(prompt.endsWith('AVAILABLE PLATFORMS:\n\t* gmail (Gmail)\n\t* github (GitHub)')).toBe(true)
    expect(prompt).toContain(SUPPORTED_CONNECTIONS_NOTICE)
    expect(prompt).not.toContain('prompt_to_connect_platform')
  })

  it('should describe the connect tool in the AuthKit prompt', () => {
    const prompt = getAuthkitSystemPrompt('No connections available')

    expect(prompt).toContain('prompt_to_connect_platform')
    expect(prompt.endsWith('AVAILABLE PLATFORMS:\nNo platforms available')).toBe(true)
  })

  describe('generateFullSystemPrompt', () => {
    it('should build the prompt without a user prompt', () => {
      expect(generateFullSystemPrompt('TOOLS', undefined, NOW)).toBe(
        '=== PICA: INTEGRATION ASSISTANT ===\n' +
          'Everything below is for Pica (picaos.com), your integration assistant that can instantly connect your AI agents to 100+ APIs.\n' +
          '\n' +
          'Current Time: 2025-03-04 05:06:07 (UTC)\n' +
          '\n' +
          '--- Tools Information ---\n' +
          'TOOLS'
      )
    })

    it('should put the user prompt first', () => {
      const prompt = generateFullSystemPrompt('TOOLS', 'You are helpful.', NOW)

      expect(prompt.startsWith('You are helpful.\n=== PICA: INTEGRATION ASSISTANT ===\n')).toBe(true)
      expect(prompt.endsWith('--- Tools Information ---\nTOOLS')).toBe(true)
    })

    it('should move supported connections after the notice', () => {
      const system = getDefaultSystemPrompt('No connections available')
      const user = 'Be brief.\n<SUPPORTED CONNECTIONS>\n  Gmail, Slack\n</SUPPORTED CONNECTIONS>'

      const prompt = generateFullSystemPrompt(system, user, NOW)

      expect(prompt.startsWith('Be brief.\n=== PICA')).toBe(true)
      expect(prompt).not.toContain('<SUPPORTED CONNECTIONS>')
      expect(prompt).toContain(`${SUPPORTED_CONNECTIONS_NOTICE}\n\nGmail, Slack\n\nACTIVE CONNECTIONS:`)
    })

    it('should leave the system prompt alone when it has no notice', () => {
      const prompt = generateFullSystemPrompt(
        'TOOLS',
        '<SUPPORTED CONNECTIONS>Gmail</SUPPORTED CONNECTIONS>',
        NOW
      )

      expect(prompt.startsWith('=== PICA: INTEGRATION ASSISTANT ===')).toBe(true)
      expect(prompt).not.toContain('Gmail')
    })
  })
})
