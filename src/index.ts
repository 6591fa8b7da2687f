// Pica tools for LangChain agents

export { PicaClient } from './client/pica-client'
export type {
  Connection,
  ConnectionDefinition,
  AvailableAction,
  ActionToExecute,
  ExecuteParams,
  HttpMethod,
  RequestConfig,
  PicaResponse,
  ActionSummary,
  ActionsResponse,
  ActionKnowledgeResponse,
  ExecuteResponse,
} from './client/types'

export * from './config'
export { logger, createLogger, setLogLevel, maskHeaders, logRequestResponse } from './observability/logger'
export { generateFullSystemPrompt, getDefaultSystemPrompt, getAuthkitSystemPrompt } from './prompts'
export * from './tools'
export { createPicaAgent, createPicaPrompt, type PicaAgentOptions } from './agent/create-agent'
export { PicaMCPClient, connectToSingleServer, type MCPClientOptions, type SingleServerConnection } from './mcp/mcp-client'
