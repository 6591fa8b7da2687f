/**
 * Pica API Types
 *
 * Rows returned by the Pica API are validated with zod.
 * Unknown fields are kept so callers can read them.
 */

import { z } from 'zod'

export const ConnectionSchema = z
  .object({
    _id: z.string(),
    key: z.string(),
    platform: z.string(),
    active: z.boolean().default(false),
    name: z.string().nullish(),
    environment: z.string().optional(),
    platformVersion: z.string().optional(),
    connectionDefinitionId: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    createdAt: z.number().optional(),
    updatedAt: z.number().optional(),
  })
  .passthrough()

export type Connection = z.infer<typeof ConnectionSchema>

export const ConnectionDefinitionSchema = z
  .object({
    platform: z.string(),
    _id: z.string().optional(),
    key: z.string().optional(),
    name: z.string().optional(),
    active: z.boolean().optional(),
    tags: z.array(z.string()).nullish(),
    oauth: z.union([z.boolean(), z.record(z.unknown())]).optional(),
    frontend: z
      .object({
        spec: z
          .object({
            title: z.string().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()

export type ConnectionDefinition = z.infer<typeof ConnectionDefinitionSchema>

export const AvailableActionSchema = z
  .object({
    _id: z.string(),
    title: z.string().optional(),
    connectionPlatform: z.string().optional(),
    knowledge: z.string().optional(),
    path: z.string().optional(),
    baseUrl: z.string().optional(),
    method: z.string().optional(),
    tags: z.array(z.string()).nullish().transform(tags => tags ?? []),
  })
  .passthrough()

export type AvailableAction = z.infer<typeof AvailableActionSchema>

/**
 * Paginated list envelope used by every Pica list endpoint
 */
export const ListResponseSchema = z
  .object({
    rows: z.array(z.unknown()).default([]),
    total: z.number().optional(),
    skip: z.number().optional(),
    limit: z.number().optional(),
  })
  .passthrough()

export type ListResponse = z.infer<typeof ListResponseSchema>

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type QueryValue = string | number | boolean

export interface ActionToExecute {
  _id: string
  path: string
}

export interface ExecuteParams {
  platform: string
  action: ActionToExecute
  method: HttpMethod
  connectionKey: string
  data?: unknown
  pathVariables?: Record<string, QueryValue>
  queryParams?: Record<string, QueryValue>
  headers?: Record<string, string>
  isFormData?: boolean
  isUrlEncoded?: boolean
}

export interface RequestConfig {
  url: string
  method: HttpMethod
  headers: Record<string, string>
  params?: Record<string, QueryValue>
  data?: unknown
}

/**
 * Shape shared by every tool-facing response
 */
export interface PicaResponse {
  success: boolean
  content?: string
  title?: string
  message?: string
  raw?: string
}

export interface ActionSummary {
  _id: string
  title?: string
  tags: string[]
}

export interface ActionsResponse extends PicaResponse {
  actions?: ActionSummary[]
  platform?: string
}

export interface ActionKnowledgeResponse extends PicaResponse {
  platform: string
  action?: AvailableAction
}

export interface ExecuteResponse extends PicaResponse {
  data?: unknown
  connectionKey?: string
  platform?: string
  action?: string
  requestConfig?: RequestConfig
  knowledge?: string
}
