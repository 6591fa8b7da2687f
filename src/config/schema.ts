/**
 * Zod schemas for Pica client options
 */

import { z } from 'zod'
import { PicaConfigurationError } from './errors'

export const DEFAULT_SERVER_URL = 'https://api.picaos.com'

export const StdioServerConfigSchema = z.object({
  transport: z.literal('stdio'),
  command: z.string().min(1, 'command is required for stdio transport'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
})

export const SseServerConfigSchema = z.object({
  transport: z.literal('sse'),
  url: z.string().url('url is required for SSE transport'),
  headers: z.record(z.string()).optional(),
})

export const StreamableHttpServerConfigSchema = z.object({
  transport: z.literal('streamable_http'),
  url: z.string().url('url is required for streamable HTTP transport'),
  headers: z.record(z.string()).optional(),
})

/**
 * MCP server connection. A config without `transport` is a stdio server.
 */
export const McpServerConfigSchema = z.preprocess(
  value =>
    typeof value === 'object' && value !== null && !('transport' in value)
      ? { ...value, transport: 'stdio' }
      : value,
  z.discriminatedUnion('transport', [
    StdioServerConfigSchema,
    SseServerConfigSchema,
    StreamableHttpServerConfigSchema,
  ])
)

export type McpServerConfig = z.infer<typeof McpServerConfigSchema>

export type McpServerConfigInput =
  | (Omit<z.input<typeof StdioServerConfigSchema>, 'transport'> & { transport?: 'stdio' })
  | z.input<typeof SseServerConfigSchema>
  | z.input<typeof StreamableHttpServerConfigSchema>

export const IdentityTypeSchema = z.enum(['user', 'team', 'organization', 'project'])

export type IdentityType = z.infer<typeof IdentityTypeSchema>

export const PicaClientOptionsSchema = z.object({
  serverUrl: z
    .string()
    .url()
    .default(DEFAULT_SERVER_URL)
    .transform(url => url.replace(/\/+$/, '')),
  connectors: z.array(z.string()).default([]),
  identity: z.string().optional(),
  identityType: IdentityTypeSchema.optional(),
  authkit: z.boolean().default(false),
  authkitSupportedPlatforms: z.array(z.string()).optional(),
  mcpServers: z.record(McpServerConfigSchema).optional(),
})

export type PicaClientOptions = z.infer<typeof PicaClientOptionsSchema>
export type PicaClientOptionsInput = Omit<z.input<typeof PicaClientOptionsSchema>, 'mcpServers'> & {
  mcpServers?: Record<string, McpServerConfigInput>
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

/**
 * Validate client options and apply defaults
 * @throws PicaConfigurationError listing every issue
 */
export function parseClientOptions(input: PicaClientOptionsInput = {}): PicaClientOptions {
  const result = PicaClientOptionsSchema.safeParse(input)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new PicaConfigurationError(`Invalid Pica client options: ${issues.join('; ')}`, { issues })
  }
  return result.data
}

export function parseMcpServerConfig(input: McpServerConfigInput): McpServerConfig {
  const result = McpServerConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new PicaConfigurationError(`Invalid MCP server config: ${issues.join('; ')}`, { issues })
  }
  return result.data
}
