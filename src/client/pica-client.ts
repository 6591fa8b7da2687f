/**
 * Pica Client
 *
 * Talks to the Pica API: loads connections and connection definitions,
 * builds the agent system prompt, looks up actions, and runs actions
 * through the passthrough endpoint.
 */

import type { StructuredToolInterface } from '@langchain/core/tools'
import type { z } from 'zod'
import { PicaApiError, PicaConfigurationError, errorMessage } from '../config/errors'
import { loadPicaEnvironment } from '../config/environment'
import { parseClientOptions, type PicaClientOptions, type PicaClientOptionsInput } from '../config/schema'
import { PicaMCPClient } from '../mcp/mcp-client'
import { logger, logRequestResponse, maskHeaders } from '../observability/logger'
import { generateFullSystemPrompt, getAuthkitSystemPrompt, getDefaultSystemPrompt } from '../prompts'
import { sendRequest } from './http'
import { resolveActionPath } from './path-variables'
import {
  AvailableActionSchema,
  ConnectionDefinitionSchema,
  ConnectionSchema,
  ListResponseSchema,
  type ActionKnowledgeResponse,
  type ActionsResponse,
  type AvailableAction,
  type Connection,
  type ConnectionDefinition,
  type ExecuteParams,
  type ExecuteResponse,
  type ListResponse,
  type QueryValue,
  type RequestConfig,
} from './types'

export const CONNECTIONS_LIMIT = 300
export const CONNECTION_DEFINITIONS_LIMIT = 500
export const ACTIONS_PAGE_LIMIT = 100

const LOADING_CONNECTIONS = 'Loading connections...'
const NO_CONNECTIONS = 'No connections available'

function parseRows<T extends z.ZodTypeAny>(schema: T, list: ListResponse, kind: string): z.infer<T>[] {
  const rows: z.infer<T>[] = []
  for (const row of list.rows) {
    const parsed = schema.safeParse(row)
    if (parsed.success) {
      rows.push(parsed.data)
    } else {
      logger.warn({ issues: parsed.error.issues }, `Skipping invalid ${kind} row`)
    }
  }
  return rows
}

function parseList(data: unknown, url: string): ListResponse {
  const parsed = ListResponseSchema.safeParse(data)
  if (!parsed.success) {
    throw new PicaApiError(`Unexpected response shape from ${url}`, { url, cause: parsed.error })
  }
  return parsed.data
}

function hasBody(data: unknown): boolean {
  if (!data) return false
  if (typeof data === 'object') return Object.keys(data).length > 0
  return true
}

function failure(title: string, error: unknown) {
  const message = errorMessage(error)
  return { success: false as const, title, message, raw: message }
}

export class PicaClient {
  readonly baseUrl: string
  connections: Connection[] = []
  connectionDefinitions: ConnectionDefinition[] = []

  private readonly secret: string
  private readonly options: PicaClientOptions
  private readonly connectionsUrl: string
  private readonly actionsUrl: string
  private readonly connectionDefinitionsUrl: string
  private connectorsFilter: string[]
  private systemPrompt: string
  private initialized = false
  private initializing?: Promise<void>
  private mcpClient?: PicaMCPClient
  private mcpTools: StructuredToolInterface[] = []

  /**
   * @param secret - Pica API secret
   * @param options - server URL, connector / identity filters, AuthKit and MCP settings
   * @throws PicaConfigurationError for an empty secret or invalid options
   */
  constructor(secret: string, options: PicaClientOptionsInput = {}) {
    if (!secret) {
      throw new PicaConfigurationError('Pica API secret is required', { key: 'PICA_SECRET' })
    }

    this.secret = secret
    this.options = parseClientOptions(options)
    this.baseUrl = this.options.serverUrl

    this.connectionsUrl = `${this.baseUrl}/v1/vault/connections`
    this.actionsUrl = `${this.baseUrl}/v1/knowledge`
    this.connectionDefinitionsUrl = `${this.baseUrl}/v1/public/connection-definitions`

    this.connectorsFilter = [...this.options.connectors]
    this.systemPrompt = this.buildSystemPrompt(LOADING_CONNECTIONS)

    logger.info({ baseUrl: this.baseUrl, authkit: this.options.authkit }, 'Created Pica client')
  }

  /**
   * Create a client and load its connections, definitions and MCP tools
   */
  static async create(secret: string, options: PicaClientOptionsInput = {}): Promise<PicaClient> {
    const client = new PicaClient(secret, options)
    await client.initialize()
    await client.connectMcpServers()
    return client
  }

  /**
   * Create a client from PICA_SECRET and PICA_SERVER_URL
   */
  static async fromEnv(options: PicaClientOptionsInput = {}): Promise<PicaClient> {
    const env = loadPicaEnvironment()
    if (!env.secret) {
      throw new PicaConfigurationError('PICA_SECRET environment variable must be set', { key: 'PICA_SECRET' })
    }
    return PicaClient.create(env.secret, env.serverUrl ? { serverUrl: env.serverUrl, ...options } : options)
  }

  get authkit(): boolean {
    return this.options.authkit
  }

  get isInitialized(): boolean {
    return this.initialized
  }

  /**
   * Current system prompt
   */
  get system(): string {
    return this.systemPrompt
  }

  /**
   * Tools loaded from the configured MCP servers
   */
  get mcpToolList(): StructuredToolInterface[] {
    return this.mcpTools
  }

  /**
   * Load connections and connection definitions and rebuild the system prompt.
   * Runs once; concurrent callers share the same run.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      logger.debug('Client already initialized, skipping initialization')
      return
    }
    if (!this.initializing) {
      this.initializing = this.runInitialize().finally(() => {
        this.initializing = undefined
      })
    }
    return this.initializing
  }

  private async runInitialize(): Promise<void> {
    logger.info('Initializing Pica client connections and definitions')

    if (this.connectorsFilter.includes('*')) {
      logger.debug('Initializing all available connections')
      await this.initializeConnections()
      this.connectorsFilter = []
    } else if (this.connectorsFilter.length > 0) {
      logger.debug({ connectors: this.connectorsFilter }, 'Initializing specific connections')
      await this.initializeConnections()
    } else {
      logger.debug('No connections to initialize')
      this.connections = []
    }

    await this.initializeConnectionDefinitions()

    let activeConnections = this.connections.filter(conn => conn.active)
    if (this.connectorsFilter.length > 0) {
      activeConnections = activeConnections.filter(conn => this.connectorsFilter.includes(conn.key))
    }
    logger.debug(`Found ${activeConnections.length} active connections`)

    const connectionsInfo = activeConnections.length > 0
      ? activeConnections.map(conn => `\t* ${conn.platform} - Key: ${conn.key}`).join('\n')
      : NO_CONNECTIONS

    let definitions = this.connectionDefinitions
    const supportedPlatforms = this.options.authkitSupportedPlatforms
    if (this.options.authkit && supportedPlatforms && supportedPlatforms.length > 0) {
      definitions = definitions.filter(def => supportedPlatforms.includes(def.platform))
      logger.debug(
        `Filtered available platforms from ${this.connectionDefinitions.length} to ${definitions.length}`
      )
    }

    const availablePlatformsInfo = definitions
      .map(def => `${def.platform} (${def.frontend?.spec?.title ?? def.name ?? def.platform})`)
      .join('\n\t* ')

    this.systemPrompt = this.buildSystemPrompt(connectionsInfo, availablePlatformsInfo)
    this.initialized = true
    logger.info('Pica client initialization complete')
  }

  private buildSystemPrompt(connectionsInfo: string, availablePlatformsInfo?: string): string {
    return this.options.authkit
      ? getAuthkitSystemPrompt(connectionsInfo, availablePlatformsInfo)
      : getDefaultSystemPrompt(connectionsInfo, availablePlatformsInfo)
  }

  /**
   * Connect the MCP servers named in the options, if any
   */
  async connectMcpServers(): Promise<StructuredToolInterface[]> {
    const servers = this.options.mcpServers
    if (!servers || Object.keys(servers).length === 0) return []

    if (!this.mcpClient) {
      this.mcpClient = new PicaMCPClient({ servers })
      this.mcpTools = await this.mcpClient.initialize()
    }
    return this.mcpTools
  }

  /**
   * Release MCP server connections
   */
  async close(): Promise<void> {
    const mcpClient = this.mcpClient
    this.mcpClient = undefined
    this.mcpTools = []
    if (mcpClient) await mcpClient.close()
  }

  private generateHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-pica-secret': this.secret,
    }
  }

  private async getList(url: string, query: Record<string, QueryValue | undefined>): Promise<ListResponse> {
    logRequestResponse('GET', url, { requestData: query })
    const response = await sendRequest({ method: 'GET', url, headers: this.generateHeaders(), query })
    const list = parseList(response.data, url)
    logRequestResponse('GET', url, {
      responseStatus: response.status,
      responseData: { total: list.rows.length },
    })
    return list
  }

  private async initializeConnections(): Promise<void> {
    try {
      const list = await this.getList(this.connectionsUrl, {
        limit: CONNECTIONS_LIMIT,
        identity: this.options.identity,
        identityType: this.options.identityType,
      })
      this.connections = parseRows(ConnectionSchema, list, 'connection')
      logger.info(`Successfully fetched ${this.connections.length} connections`)
    } catch (error) {
      logger.error({ err: error }, `Failed to initialize connections: ${errorMessage(error)}`)
      this.connections = []
    }
  }

  private async initializeConnectionDefinitions(): Promise<void> {
    try {
      const list = await this.getList(this.connectionDefinitionsUrl, {
        limit: CONNECTION_DEFINITIONS_LIMIT,
        ...(this.options.authkit && { authkit: 'true' }),
      })
      this.connectionDefinitions = parseRows(ConnectionDefinitionSchema, list, 'connection definition')
      logger.info(`Successfully fetched ${this.connectionDefinitions.length} connection definitions`)
    } catch (error) {
      logger.error({ err: error }, `Failed to initialize connection definitions: ${errorMessage(error)}`)
      this.connectionDefinitions = []
    }
  }

  /**
   * System prompt with an optional user prompt in front
   */
  async generateSystemPrompt(userSystemPrompt?: string): Promise<string> {
    await this.initialize()
    return generateFullSystemPrompt(this.systemPrompt, userSystemPrompt)
  }

  /**
   * Read every page of a list endpoint
   */
  private async paginate(url: string, query: Record<string, QueryValue>, limit = ACTIONS_PAGE_LIMIT): Promise<unknown[]> {
    const results: unknown[] = []
    let skip = 0

    while (true) {
      const list = await this.getList(url, { ...query, skip, limit })
      results.push(...list.rows)
      skip += limit

      const total = list.total ?? 0
      if (list.rows.length === 0 || results.length >= total) break
    }

    return results
  }

  /**
   * Every supported action of a platform
   * @throws PicaApiError
   */
  async getAllAvailableActions(platform: string): Promise<AvailableAction[]> {
    const rows = await this.paginate(this.actionsUrl, {
      supported: 'true',
      connectionPlatform: platform,
    })
    return parseRows(AvailableActionSchema, { rows }, 'action')
  }

  /**
   * @throws PicaApiError when the request fails or no action has this ID
   */
  async getSingleAction(actionId: string): Promise<AvailableAction> {
    logger.debug(`Fetching action with ID: ${actionId}`)
    const list = await this.getList(this.actionsUrl, { _id: actionId })

    const [action] = parseRows(AvailableActionSchema, list, 'action')
    if (!action) {
      logger.warn(`Action with ID ${actionId} not found`)
      throw new PicaApiError(`Action with ID ${actionId} not found`, { url: this.actionsUrl, status: 404 })
    }

    logger.debug(`Successfully fetched action: ${action.title}`)
    return action
  }

  async getAvailableActions(platform: string): Promise<ActionsResponse> {
    try {
      logger.info(`Fetching available actions for platform: ${platform}`)
      const actions = (await this.getAllAvailableActions(platform)).map(action => ({
        _id: action._id,
        title: action.title,
        tags: action.tags,
      }))

      const content = `Found ${actions.length} available actions for ${platform}`
      logger.info(content)
      return { success: true, actions, platform, content }
    } catch (error) {
      logger.error({ err: error }, `Error fetching available actions for ${platform}`)
      return failure('Failed to get available actions', error)
    }
  }

  async getActionKnowledge(platform: string, actionId: string): Promise<ActionKnowledgeResponse> {
    try {
      const action = await this.getSingleAction(actionId)
      return {
        success: true,
        action,
        platform,
        content: `Found knowledge for action: ${action.title}`,
      }
    } catch (error) {
      logger.error({ err: error }, `Error getting action knowledge for ${actionId}`)
      return { ...failure('Failed to get action knowledge', error), platform }
    }
  }

  /**
   * Run an action through the passthrough API
   */
  async execute(params: ExecuteParams): Promise<ExecuteResponse> {
    const method = params.method
    try {
      logger.info(`Executing action for platform: ${params.platform}, method: ${method}`)

      await this.initialize()
      if (!this.connections.some(conn => conn.key === params.connectionKey)) {
        throw new Error(`Connection not found. Please add a ${params.platform} connection first.`)
      }

      const fullAction = await this.getSingleAction(params.action._id)
      const resolved = resolveActionPath(params.action.path, params.data, params.pathVariables)
      const path = resolved.path.startsWith('/') ? resolved.path : `/${resolved.path}`
      const url = `${this.baseUrl}/v1/passthrough${path}`

      const headers: Record<string, string> = {
        ...this.generateHeaders(),
        ...params.headers,
        'x-pica-connection-key': params.connectionKey,
        'x-pica-action-id': params.action._id,
      }

      const sendsBody = method !== 'GET' && hasBody(resolved.data)
      const body = sendsBody ? this.encodeBody(resolved.data, params, headers) : undefined

      const requestConfig: RequestConfig = {
        url,
        method,
        headers: maskHeaders(headers),
        ...(params.queryParams && { params: params.queryParams }),
        ...(sendsBody && { data: resolved.data }),
      }
      logRequestResponse(method, url, { requestData: requestConfig })

      const response = await sendRequest({ method, url, headers, query: params.queryParams, body })

      logRequestResponse(method, url, {
        requestData: requestConfig,
        responseStatus: response.status,
        responseData: { success: true },
      })

      const title = fullAction.title ?? fullAction._id
      logger.info(`Successfully executed ${title} via ${params.platform}`)
      return {
        success: true,
        data: response.data,
        connectionKey: params.connectionKey,
        platform: params.platform,
        action: title,
        requestConfig,
        knowledge: fullAction.knowledge,
        content: `Executed ${title} via ${params.platform}`,
      }
    } catch (error) {
      logRequestResponse(method, `${this.baseUrl}/v1/passthrough/...`, { error })
      return failure('Failed to execute action', error)
    }
  }

  /**
   * Encode a request body. Multipart and JSON set their own content type.
   */
  private encodeBody(
    data: unknown,
    params: ExecuteParams,
    headers: Record<string, string>
  ): string | FormData | URLSearchParams {
    const isObject = typeof data === 'object' && data !== null && !Array.isArray(data)

    if (params.isFormData && isObject) {
      const form = new FormData()
      for (const [name, value] of Object.entries(data)) {
        if (typeof value === 'object' && value !== null) {
          form.append(name, new Blob([JSON.stringify(value)], { type: 'application/json' }))
        } else {
          form.append(name, String(value))
        }
      }
      delete headers['Content-Type']
      return form
    }

    if (params.isUrlEncoded && isObject) {
      const form = new URLSearchParams()
      for (const [name, value] of Object.entries(data)) {
        form.append(name, typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value))
      }
      headers['Content-Type'] = 'application/x-www-form-urlencoded'
      return form
    }

    return JSON.stringify(data)
  }
}
