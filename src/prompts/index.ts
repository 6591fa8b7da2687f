/**
 * System prompts for Pica agents
 */

export { getDefaultSystemPrompt, SUPPORTED_CONNECTIONS_NOTICE } from './default-system'
export { getAuthkitSystemPrompt } from './authkit-system'

const SUPPORTED_CONNECTIONS_TAG = /<SUPPORTED CONNECTIONS>([\s\S]*?)<\/SUPPORTED CONNECTIONS>/
const SUPPORTED_CONNECTIONS_PARAGRAPH =
  /IMPORTANT: When the user asks about "supported connections" or "available connections"[\s\S]*?DO NOT list all possible platforms if they're not in the active connections list\./

/**
 * Format as YYYY-MM-DD HH:MM:SS in UTC
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ')
}

/**
 * Combine a user's system prompt with the Pica system prompt.
 *
 * A <SUPPORTED CONNECTIONS>...</SUPPORTED CONNECTIONS> block in the user prompt is
 * moved into the Pica prompt, right after its supported-connections paragraph.
 */
export function generateFullSystemPrompt(
  systemPrompt: string,
  userSystemPrompt?: string,
  now: Date = new Date()
): string {
  let userPrompt = userSystemPrompt ?? ''
  let picaPrompt = systemPrompt

  const tagged = SUPPORTED_CONNECTIONS_TAG.exec(userPrompt)
  if (tagged) {
    const supportedConnections = tagged[1].trim()
    userPrompt = userPrompt.replace(SUPPORTED_CONNECTIONS_TAG, '').trim()

    if (supportedConnections) {
      picaPrompt = picaPrompt.replace(
        SUPPORTED_CONNECTIONS_PARAGRAPH,
        paragraph => `${paragraph}\n\n${supportedConnections}`
      )
    }
  }

  const prompt = `${userPrompt}
=== PICA: INTEGRATION ASSISTANT ===
Everything below is for Pica (picaos.com), your integration assistant that can instantly connect your AI agents to 100+ APIs.

Current Time: ${formatUtcTimestamp(now)} (UTC)

--- Tools Information ---
${picaPrompt}
`

  return prompt.trim()
}
