/**
 * Error types raised by the Pica SDK
 */

export class PicaConfigurationError extends Error {
  public readonly details?: {
    key?: string
    issues?: string[]
  }

  constructor(message: string, details?: PicaConfigurationError['details']) {
    super(message)
    this.name = 'PicaConfigurationError'
    this.details = details
  }
}

/**
 * HTTP failure talking to the Pica API
 */
export class PicaApiError extends Error {
  public readonly url: string
  public readonly status?: number
  public readonly body?: string

  constructor(
    message: string,
    details: { url: string; status?: number; body?: string; cause?: unknown }
  ) {
    super(message, { cause: details.cause })
    this.name = 'PicaApiError'
    this.url = details.url
    this.status = details.status
    this.body = details.body
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
