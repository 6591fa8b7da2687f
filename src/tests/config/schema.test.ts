/**
 * Tests for client option validation
 */

import { describe, it, expect } from 'vitest'
import { PicaConfigurationError } from '../../config/errors'
import { DEFAULT_SERVER_URL, parseClientOptions, parseMcpServerConfig } from '../../config/schema'

describe('parseClientOptions', () => {
  it('should apply defaults', () => {
    expect(parseClientOptions()).toEqual({
      serverUrl: DEFAULT_SERVER_URL,
      connectors: [],
      authkit: false,
    })
  })

  it('should keep provided values', () => {
    const options = parseClientOptions({
      serverUrl: 'https://pica.example.test//',
      connectors: ['*'],
      identity: 'team-1',
      identityType: 'team',
      authkit: true,
      authkitSupportedPlatforms: ['github'],
    })

    expect(options).toEqual({
      serverUrl: 'https://pica.example.test',
      connectors: ['*'],
      identity: 'team-1',
      identityType: 'team',
      authkit: true,
      authkitSupportedPlatforms: ['github'],
    })
  })

  it('should list every issue', () => {
    let caught: unknown
    try {
      parseClientOptions(JSON.parse('{"serverUrl":"nope","connectors":"gmail"}'))
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(PicaConfigurationError)
    if (caught instanceof PicaConfigurationError) {
      expect(caught.details?.issues).toEqual([
        'serverUrl: Invalid url',
        'connectors: Expected array, received string',
      ])
    }
  })

  it('should validate MCP servers', () => {
    const options = parseClientOptions({
      mcpServers: {
        math: { command: 'node', args: ['math-server.js'] },
        weather: { transport: 'sse', url: 'http://localhost:8000/sse' },
      },
    })

    expect(options.mcpServers).toEqual({
      math: { transport: 'stdio', command: 'node', args: ['math-server.js'] },
      weather: { transport: 'sse', url: 'http://localhost:8000/sse' },
    })
  })
})

describe('parseMcpServerConfig', () => {
  it('should default to stdio with no arguments', () => {
    expect(parseMcpServerConfig({ command: 'node' })).toEqual({ transport: 'stdio', command: 'node', args: [] })
  })

  it('should accept streamable HTTP servers', () => {
    expect(parseMcpServerConfig({ transport: 'streamable_http', url: 'https://mcp.example.test/mcp' })).toEqual({
      transport: 'streamable_http',
      url: 'https://mcp.example.test/mcp',
    })
  })

  it('should require a command for stdio', () => {
    expect(() => parseMcpServerConfig({ command: '' })).toThrow(
      'Invalid MCP server config: command: command is required for stdio transport'
    )
  })

  it('should require a URL for SSE', () => {
    expect(() => parseMcpServerConfig({ transport: 'sse', url: 'localhost' })).toThrow(
      'Invalid MCP server config: url: url is required for SSE transport'
    )
  })
})
