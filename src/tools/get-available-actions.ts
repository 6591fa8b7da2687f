import { StructuredTool } from '@langchain/core/tools'
import { z } from 'zod'
import type { PicaClient } from '../client/pica-client'

export const getAvailableActionsSchema = z.object({
  platform: z.string().describe('Platform to list actions for, e.g. gmail or github'),
})

/**
 * Lists the supported actions of a platform
 */
export class GetAvailableActionsTool extends StructuredTool<typeof getAvailableActionsSchema> {
  static lc_name() {
    return 'GetAvailableActionsTool'
  }

  name = 'get_available_actions'
  description =
    'Get the actions available for a platform. Call this first to find the action ID to use with get_action_knowledge and execute.'
  schema = getAvailableActionsSchema

  constructor(private readonly client: PicaClient) {
    super()
  }

  protected async _call(input: z.infer<typeof getAvailableActionsSchema>): Promise<string> {
    const response = await this.client.getAvailableActions(input.platform)
    return JSON.stringify(response)
  }
}
