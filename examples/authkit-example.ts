/**
 * Example: AuthKit
 *
 * With AuthKit on, the agent can ask the user to connect a platform that
 * has no active connection yet. The app watches for the
 * prompt_to_connect_platform tool and shows its own connect flow.
 */

import 'dotenv/config'
import { ChatOpenAI } from '@langchain/openai'
import { PicaClient, createPicaAgent, requireEnv } from '../src'

async function main() {
  const client = await PicaClient.create(requireEnv('PICA_SECRET'), {
    connectors: ['*'],
    authkit: true,
    authkitSupportedPlatforms: ['gmail', 'google-calendar', 'slack'],
  })

  const agent = await createPicaAgent({
    client,
    llm: new ChatOpenAI({ model: 'gpt-4o', temperature: 0, apiKey: requireEnv('OPENAI_API_KEY') }),
    returnIntermediateSteps: true,
  })

  const result = await agent.invoke({ input: 'Connect to Slack and post "hello" to #general.' })

  for (const step of result.intermediateSteps ?? []) {
    if (step.action.tool === 'prompt_to_connect_platform') {
      console.log(`🔗 Show the connect flow for: ${JSON.parse(step.observation).response}`)
    }
  }

  console.log(result.output)
}

main().catch(console.error)
