/**
 * Example: MCP servers
 *
 * Loads tools from two MCP servers and gives them to the agent next to
 * the Pica tools. The stdio server is spawned as a child process; the
 * SSE server must already be running.
 */

import 'dotenv/config'
import { ChatOpenAI } from '@langchain/openai'
import { PicaClient, createPicaAgent, requireEnv } from '../src'

async function main() {
  const client = await PicaClient.create(requireEnv('PICA_SECRET'), {
    connectors: ['*'],
    mcpServers: {
      everything: {
        transport: 'stdio',
        command: 'npx',
        args: ['-y', '@modelcontextprotocol/server-everything'],
      },
      weather: {
        transport: 'sse',
        url: 'http://localhost:8000/sse',
      },
    },
  })

  try {
    console.log(`Loaded ${client.mcpToolList.length} MCP tools`)

    const agent = await createPicaAgent({
      client,
      llm: new ChatOpenAI({ model: 'gpt-4o', temperature: 0, apiKey: requireEnv('OPENAI_API_KEY') }),
    })

    const result = await agent.invoke({
      input: 'Add 40 and 2, then email the result to me with Gmail.',
    })
    console.log(result.output)
  } finally {
    await client.close()
  }
}

main().catch(console.error)
