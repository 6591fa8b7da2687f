import { StructuredTool } from '@langchain/core/tools'
import { z } from 'zod'
import type { PicaClient } from '../client/pica-client'

export const getActionKnowledgeSchema = z.object({
  platform: z.string().describe('Platform the action belongs to'),
  action_id: z.string().describe('Action ID returned by get_available_actions'),
})

/**
 * Reads the documentation of one action
 */
export class GetActionKnowledgeTool extends StructuredTool<typeof getActionKnowledgeSchema> {
  static lc_name() {
    return 'GetActionKnowledgeTool'
  }

  name = 'get_action_knowledge'
  description =
    'Get the documentation of an action: its path, path variables, query parameters and request body. Always call this before execute.'
  schema = getActionKnowledgeSchema

  constructor(private readonly client: PicaClient) {
    super()
  }

  protected async _call(input: z.infer<typeof getActionKnowledgeSchema>): Promise<string> {
    const response = await this.client.getActionKnowledge(input.platform, input.action_id)
    return JSON.stringify(response)
  }
}
