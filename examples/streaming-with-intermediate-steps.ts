/**
 * Example: streaming
 *
 * Streams the agent run and prints each tool call and its observation as
 * it happens, then the final answer.
 */

import 'dotenv/config'
import { ChatOpenAI } from '@langchain/openai'
import { PicaClient, createPicaAgent, requireEnv } from '../src'

async function main() {
  const client = await PicaClient.create(requireEnv('PICA_SECRET'), { connectors: ['*'] })

  const agent = await createPicaAgent({
    client,
    llm: new ChatOpenAI({ model: 'gpt-4o', temperature: 0, apiKey: requireEnv('OPENAI_API_KEY') }),
    systemPrompt: 'Always explain which tool you are about to use and why.',
    returnIntermediateSteps: true,
  })

  const stream = await agent.stream({ input: 'Summarize my last 3 Slack messages in #general.' })

  for await (const chunk of stream) {
    for (const step of chunk.intermediateSteps ?? []) {
      console.log(`\n🔧 ${step.action.tool}`, step.action.toolInput)
      console.log(`   → ${String(step.observation).slice(0, 200)}`)
    }
    if (chunk.output) {
      console.log('\n━━━ Answer ━━━')
      console.log(chunk.output)
    }
  }
}

main().catch(console.error)
