/**
 * LangChain tools backed by a Pica client
 */

import type { StructuredToolInterface } from '@langchain/core/tools'
import type { PicaClient } from '../client/pica-client'
import { ExecuteTool } from './execute'
import { GetActionKnowledgeTool } from './get-action-knowledge'
import { GetAvailableActionsTool } from './get-available-actions'
import { PromptToConnectPlatformTool } from './prompt-to-connect'

export { ExecuteTool, executeSchema, toExecuteParams, type ExecuteToolInput } from './execute'
export { GetActionKnowledgeTool, getActionKnowledgeSchema } from './get-action-knowledge'
export { GetAvailableActionsTool, getAvailableActionsSchema } from './get-available-actions'
export { PromptToConnectPlatformTool, promptToConnectPlatformSchema } from './prompt-to-connect'

/**
 * Pica tools for an agent: the action tools, the AuthKit connect tool when
 * AuthKit is on, tools loaded from MCP servers, then any extra tools.
 */
export function createPicaTools(
  client: PicaClient,
  extraTools: StructuredToolInterface[] = []
): StructuredToolInterface[] {
  const tools: StructuredToolInterface[] = [
    new GetAvailableActionsTool(client),
    new GetActionKnowledgeTool(client),
    new ExecuteTool(client),
  ]

  if (client.authkit) {
    tools.push(new PromptToConnectPlatformTool())
  }

  return [...tools, ...client.mcpToolList, ...extraTools]
}
