/**
 * Example: confirm before executing
 *
 * A callback handler asks on the terminal before the agent runs any
 * action through the execute tool. Declining aborts the run.
 */

import 'dotenv/config'
import { createInterface } from 'node:readline/promises'
import { BaseCallbackHandler } from '@langchain/core/callbacks/base'
import type { Serialized } from '@langchain/core/load/serializable'
import { ChatOpenAI } from '@langchain/openai'
import { PicaClient, createPicaAgent, requireEnv } from '../src'

class ConfirmExecuteHandler extends BaseCallbackHandler {
  name = 'confirm-execute'
  raiseError = true
  awaitHandlers = true

  async handleToolStart(
    _tool: Serialized,
    input: string,
    _runId: string,
    _parentRunId?: string,
    _tags?: string[],
    _metadata?: Record<string, unknown>,
    runName?: string
  ): Promise<void> {
    if (runName !== 'execute') return

    const rl = createInterface({ input: process.stdin, output: process.stdout })
    try {
      const answer = await rl.question(`\n⚠️  The agent wants to run:\n${input}\nProceed? (y/n) `)
      if (answer.trim().toLowerCase() !== 'y') {
        throw new Error('Execution cancelled by user')
      }
    } finally {
      rl.close()
    }
  }
}

async function main() {
  const client = await PicaClient.create(requireEnv('PICA_SECRET'), { connectors: ['*'] })

  const agent = await createPicaAgent({
    client,
    llm: new ChatOpenAI({ model: 'gpt-4o', temperature: 0, apiKey: requireEnv('OPENAI_API_KEY') }),
    callbacks: [new ConfirmExecuteHandler()],
  })

  const result = await agent.invoke({ input: 'Star the langchain-ai/langchainjs repository on GitHub.' })
  console.log(result.output)
}

main().catch(console.error)
