/**
 * Tests for the MCP client wrapper
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { DynamicStructuredTool } from '@langchain/core/tools'
import { z } from 'zod'
import { PicaConfigurationError } from '../../config/errors'
import { PicaMCPClient, connectToSingleServer, toAdapterConnection } from '../../mcp/mcp-client'

const adapter = vi.hoisted(() => {
  const configs: unknown[] = []
  return { configs, getTools: vi.fn(), close: vi.fn() }
})

vi.mock('@langchain/mcp-adapters', () => ({
  MultiServerMCPClient: class {
    getTools = adapter.getTools
    close = adapter.close

    constructor(config: unknown) {
      adapter.configs.push(config)
    }
  },
}))

const addTool = new DynamicStructuredTool({
  name: 'add',
  description: 'Add two numbers',
  schema: z.object({ a: z.number(), b: z.number() }),
  func: async ({ a, b }) => String(a + b),
})

const { getTools, close } = adapter

beforeEach(() => {
  adapter.configs.length = 0
  getTools.mockReset().mockResolvedValue([addTool])
  close.mockReset().mockResolvedValue(undefined)
})

describe('toAdapterConnection', () => {
  it('should map each transport', () => {
    expect(toAdapterConnection({ transport: 'stdio', command: 'node', args: ['server.js'], env: { A: '1' } })).toEqual({
      transport: 'stdio',
      command: 'node',
      args: ['server.js'],
      env: { A: '1' },
    })
    expect(toAdapterConnection({ transport: 'sse', url: 'http://localhost:8000/sse' })).toEqual({
      transport: 'sse',
      url: 'http://localhost:8000/sse',
    })
    expect(
      toAdapterConnection({ transport: 'streamable_http', url: 'https://mcp.example.test/mcp', headers: { Authorization: 'Bearer test-token' } })
    ).toEqual({
      transport: 'http',
      url: 'https://mcp.example.test/mcp',
      headers: { Authorization: 'Bearer test-token' },
    })
  })
})

describe('PicaMCPClient', () => {
  it('should return no tools without servers', async () => {
    const client = new PicaMCPClient()

    expect(await client.initialize()).toEqual([])
    expect(adapter.configs).toEqual([])
  })

  it('should load tools from every server', async () => {
    const client = new PicaMCPClient({
      servers: {
        math: { command: 'node', args: ['math.js'] },
        weather: { transport: 'sse', url: 'http://localhost:8000/sse' },
      },
    })

    const tools = await client.initialize()

    expect(client.serverNames).toEqual(['math', 'weather'])
    expect(tools.map(tool => tool.name)).toEqual(['add'])
    expect(client.getTools()).toBe(tools)
    expect(adapter.configs).toEqual([{
      mcpServers: {
        math: { transport: 'stdio', command: 'node', args: ['math.js'] },
        weather: { transport: 'sse', url: 'http://localhost:8000/sse' },
      },
    }])
  })

  it('should close and return no tools when loading fails', async () => {
    getTools.mockRejectedValue(new Error('spawn failed'))
    const client = new PicaMCPClient({ servers: { math: { command: 'node' } } })

    expect(await client.initialize()).toEqual([])
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('should not throw when closing fails', async () => {
    close.mockRejectedValue(new Error('already closed'))
    const client = new PicaMCPClient({ servers: { math: { command: 'node' } } })
    await client.initialize()

    await expect(client.close()).resolves.toBeUndefined()
    expect(client.getTools()).toEqual([])
  })

  it('should reject invalid server configs', () => {
    expect(() => new PicaMCPClient({ servers: { broken: { transport: 'sse', url: '' } } })).toThrow(
      PicaConfigurationError
    )
  })
})

describe('connectToSingleServer', () => {
  it('should return the tools and a close function', async () => {
    const connection = await connectToSingleServer({ transport: 'streamable_http', url: 'https://mcp.example.test/mcp' })

    expect(connection.tools).toEqual([addTool])
    expect(adapter.configs).toEqual([
      { mcpServers: { default: { transport: 'http', url: 'https://mcp.example.test/mcp' } } },
    ])

    await connection.close()
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('should close the client and rethrow on failure', async () => {
    getTools.mockRejectedValue(new Error('connection refused'))

    await expect(connectToSingleServer({ command: 'node' }, 'math')).rejects.toThrow('connection refused')
    expect(close).toHaveBeenCalledTimes(1)
  })
})
