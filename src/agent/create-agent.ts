/**
 * Pica Agent
 *
 * Builds a LangChain tool-calling agent whose system message carries the
 * Pica connection information.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { Callbacks } from '@langchain/core/callbacks/manager'
import { SystemMessage } from '@langchain/core/messages'
import { ChatPromptTemplate, MessagesPlaceholder } from '@langchain/core/prompts'
import type { StructuredToolInterface } from '@langchain/core/tools'
import { AgentExecutor, createToolCallingAgent } from 'langchain/agents'
import type { PicaClient } from '../client/pica-client'
import { logger } from '../observability/logger'
import { createPicaTools } from '../tools'

export interface PicaAgentOptions {
  client: PicaClient
  llm: BaseChatModel
  /** Custom prompt placed in front of the Pica system prompt */
  systemPrompt?: string
  /** Tools added after the Pica tools */
  tools?: StructuredToolInterface[]
  verbose?: boolean
  returnIntermediateSteps?: boolean
  maxIterations?: number
  callbacks?: Callbacks
}

/**
 * Prompt with the system message as a literal, so braces in it are not
 * read as template variables.
 */
export function createPicaPrompt(systemMessage: string): ChatPromptTemplate {
  return ChatPromptTemplate.fromMessages([
    new SystemMessage(systemMessage),
    new MessagesPlaceholder({ variableName: 'chat_history', optional: true }),
    ['human', '{input}'],
    new MessagesPlaceholder('agent_scratchpad'),
  ])
}

export async function createPicaAgent(options: PicaAgentOptions): Promise<AgentExecutor> {
  const { client, llm } = options

  await client.initialize()
  await client.connectMcpServers()
  const systemMessage = options.systemPrompt
    ? await client.generateSystemPrompt(options.systemPrompt)
    : client.system

  const tools = createPicaTools(client, options.tools)
  logger.debug({ tools: tools.map(tool => tool.name) }, 'Creating Pica agent')

  const agent = createToolCallingAgent({
    llm,
    tools,
    prompt: createPicaPrompt(systemMessage),
  })

  return new AgentExecutor({
    agent,
    tools,
    verbose: options.verbose ?? false,
    returnIntermediateSteps: options.returnIntermediateSteps ?? false,
    ...(options.maxIterations !== undefined && { maxIterations: options.maxIterations }),
    ...(options.callbacks && { callbacks: options.callbacks }),
  })
}
