import { StructuredTool } from '@langchain/core/tools'
import { z } from 'zod'
import type { PicaClient } from '../client/pica-client'
import type { ExecuteParams } from '../client/types'

const scalar = z.union([z.string(), z.number(), z.boolean()])

export const executeSchema = z.object({
  platform: z.string().describe('Platform to run the action on'),
  action_id: z.string().describe('Action ID returned by get_available_actions'),
  action_path: z.string().describe('Action path from get_action_knowledge, with {{variables}} left in place'),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).describe('HTTP method of the action'),
  connection_key: z.string().describe('Key of an active connection for the platform'),
  data: z.record(z.unknown()).optional().describe('Request body'),
  path_variables: z.record(scalar).optional().describe('Values for the {{variables}} in the action path'),
  query_params: z.record(scalar).optional().describe('Query string parameters'),
  headers: z.record(z.string()).optional().describe('Extra request headers'),
  is_form_data: z.boolean().optional().describe('Send the body as multipart/form-data'),
  is_url_encoded: z.boolean().optional().describe('Send the body as application/x-www-form-urlencoded'),
})

export type ExecuteToolInput = z.infer<typeof executeSchema>

export function toExecuteParams(input: ExecuteToolInput): ExecuteParams {
  return {
    platform: input.platform,
    action: { _id: input.action_id, path: input.action_path },
    method: input.method,
    connectionKey: input.connection_key,
    data: input.data,
    pathVariables: input.path_variables,
    queryParams: input.query_params,
    headers: input.headers,
    isFormData: input.is_form_data ?? false,
    isUrlEncoded: input.is_url_encoded ?? false,
  }
}

/**
 * Runs an action through the Pica passthrough API
 */
export class ExecuteTool extends StructuredTool<typeof executeSchema> {
  static lc_name() {
    return 'ExecuteTool'
  }

  name = 'execute'
  description =
    'Execute a platform action through Pica. Requires the action ID and path from get_action_knowledge and the key of an active connection.'
  schema = executeSchema

  constructor(private readonly client: PicaClient) {
    super()
  }

  protected async _call(input: ExecuteToolInput): Promise<string> {
    const response = await this.client.execute(toExecuteParams(input))
    return JSON.stringify(response)
  }
}
