/**
 * MCP Client
 *
 * Loads tools from Model Context Protocol servers as LangChain tools,
 * so they can sit next to the Pica tools in one agent.
 */

import { MultiServerMCPClient } from '@langchain/mcp-adapters'
import type { StructuredToolInterface } from '@langchain/core/tools'
import { errorMessage } from '../config/errors'
import {
  parseMcpServerConfig,
  type McpServerConfig,
  type McpServerConfigInput,
} from '../config/schema'
import { logger } from '../observability/logger'

export interface MCPClientOptions {
  servers?: Record<string, McpServerConfigInput>
}

/**
 * Map a validated server config to the adapter's connection format
 */
export function toAdapterConnection(config: McpServerConfig) {
  switch (config.transport) {
    case 'stdio':
      return {
        transport: 'stdio' as const,
        command: config.command,
        args: config.args,
        ...(config.env && { env: config.env }),
      }
    case 'sse':
      return {
        transport: 'sse' as const,
        url: config.url,
        ...(config.headers && { headers: config.headers }),
      }
    case 'streamable_http':
      return {
        transport: 'http' as const,
        url: config.url,
        ...(config.headers && { headers: config.headers }),
      }
  }
}

function buildAdapterClient(servers: Record<string, McpServerConfig>): MultiServerMCPClient {
  const mcpServers: Record<string, ReturnType<typeof toAdapterConnection>> = {}
  for (const [name, config] of Object.entries(servers)) {
    mcpServers[name] = toAdapterConnection(config)
  }
  return new MultiServerMCPClient({ mcpServers })
}

export class PicaMCPClient {
  private readonly servers: Record<string, McpServerConfig>
  private client?: MultiServerMCPClient
  private tools: StructuredToolInterface[] = []

  /**
   * @throws PicaConfigurationError when a server config is invalid
   */
  constructor(options: MCPClientOptions = {}) {
    this.servers = {}
    for (const [name, config] of Object.entries(options.servers ?? {})) {
      this.servers[name] = parseMcpServerConfig(config)
    }
  }

  get serverNames(): string[] {
    return Object.keys(this.servers)
  }

  /**
   * Connect to every configured server and load its tools.
   * Failures are logged and yield no tools.
   */
  async initialize(): Promise<StructuredToolInterface[]> {
    if (this.serverNames.length === 0) {
      logger.warn('No MCP servers configured')
      return []
    }

    const client = buildAdapterClient(this.servers)
    this.client = client

    try {
      this.tools = await client.getTools()
      logger.info({ servers: this.serverNames, tools: this.tools.length }, 'Loaded tools from MCP servers')
      return this.tools
    } catch (error) {
      logger.error({ err: error }, `Error initializing MCP client: ${errorMessage(error)}`)
      await this.close()
      return []
    }
  }

  getTools(): StructuredToolInterface[] {
    return this.tools
  }

  async close(): Promise<void> {
    const client = this.client
    if (!client) return

    this.client = undefined
    this.tools = []
    try {
      await client.close()
    } catch (error) {
      logger.warn({ err: error }, `Error closing MCP client: ${errorMessage(error)}`)
    }
  }
}

export interface SingleServerConnection {
  tools: StructuredToolInterface[]
  close: () => Promise<void>
}

/**
 * Connect to one MCP server and load its tools
 * @throws PicaConfigurationError for an invalid config, or the connection error
 */
export async function connectToSingleServer(
  config: McpServerConfigInput,
  name = 'default'
): Promise<SingleServerConnection> {
  const client = buildAdapterClient({ [name]: parseMcpServerConfig(config) })

  try {
    const tools = await client.getTools()
    return { tools, close: () => client.close() }
  } catch (error) {
    await client.close()
    throw error
  }
}
