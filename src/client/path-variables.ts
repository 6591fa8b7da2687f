/**
 * Path templates
 *
 * Action paths name their variables as {{name}}, e.g. /repos/{{owner}}/{{repo}}/stargazers
 */

import type { QueryValue } from './types'

const TEMPLATE_VARIABLE = /\{\{([^}]+)\}\}/g

export function findPathVariables(path: string): string[] {
  return Array.from(path.matchAll(TEMPLATE_VARIABLE), match => match[1])
}

/**
 * Replace every {{name}} in a path
 * @throws Error naming the first variable without a value
 */
export function replacePathVariables(path: string, variables: Record<string, QueryValue>): string {
  return path.replace(TEMPLATE_VARIABLE, (_, name: string) => {
    if (!(name in variables)) {
      throw new Error(`Missing value for path variable: ${name}`)
    }
    return String(variables[name])
  })
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isQueryValue(value: unknown): value is QueryValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

export interface ResolvedPath {
  path: string
  data: unknown
}

/**
 * Fill the path's template variables from explicit path variables, then from
 * the request body. Values taken from the body are removed from it.
 * @throws Error listing every variable that has no value
 */
export function resolveActionPath(
  path: string,
  data: unknown,
  pathVariables: Record<string, QueryValue> = {}
): ResolvedPath {
  const required = findPathVariables(path)
  if (required.length === 0) {
    return { path, data }
  }

  const body = isPlainObject(data) ? { ...data } : undefined
  const values: Record<string, QueryValue> = { ...pathVariables }
  const missing: string[] = []

  for (const name of required) {
    if (name in values) continue

    const fromBody = body?.[name]
    if (body && name in body && isQueryValue(fromBody)) {
      values[name] = fromBody
      delete body[name]
    } else if (!missing.includes(name)) {
      missing.push(name)
    }
  }

  if (missing.length > 0) {
    throw new Error(
      `Missing required path variables: ${missing.join(', ')}. Please provide values for these variables.`
    )
  }

  return {
    path: replacePathVariables(path, values),
    data: body ?? data,
  }
}
