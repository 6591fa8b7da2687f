/**
 * Example: Pica agent with LangChain
 *
 * Lists the active connections and sends a prompt through an OpenAI
 * tool-calling agent with the Pica tools attached.
 *
 * Requires PICA_SECRET and OPENAI_API_KEY.
 */

import 'dotenv/config'
import { ChatOpenAI } from '@langchain/openai'
import { PicaClient, createPicaAgent, requireEnv } from '../src'

async function main() {
  const client = await PicaClient.create(requireEnv('PICA_SECRET'), {
    connectors: ['*'],
  })

  const llm = new ChatOpenAI({
    model: 'gpt-4o',
    temperature: 0,
    apiKey: requireEnv('OPENAI_API_KEY'),
  })

  const agent = await createPicaAgent({ client, llm, verbose: true })

  const result = await agent.invoke({
    input: 'What connections do I have access to? Then list the 5 most recent emails in my Gmail inbox.',
  })

  console.log('\n━━━ Result ━━━')
  console.log(result.output)
}

main().catch(console.error)
