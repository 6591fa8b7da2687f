import { StructuredTool } from '@langchain/core/tools'
import { z } from 'zod'

export const promptToConnectPlatformSchema = z.object({
  platform_name: z.string().describe('Platform the user should connect, exactly as listed in AVAILABLE PLATFORMS'),
})

/**
 * AuthKit only. Signals the application to show the connection flow for a
 * platform; no Pica API call is made.
 */
export class PromptToConnectPlatformTool extends StructuredTool<typeof promptToConnectPlatformSchema> {
  static lc_name() {
    return 'PromptToConnectPlatformTool'
  }

  name = 'prompt_to_connect_platform'
  description =
    'Prompt the user to connect a platform that is available but has no active connection yet.'
  schema = promptToConnectPlatformSchema

  protected async _call(input: z.infer<typeof promptToConnectPlatformSchema>): Promise<string> {
    return JSON.stringify({ response: input.platform_name })
  }
}
