/**
 * Jira Cloud ticket provider (REST v3).
 */

import { z } from 'zod'
import { PermanentIntegrationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { TicketRecord } from '../incidents/types.js'
import { parseResponse, raiseForStatus, sendJson } from './http.js'
import type { FetchFn, HttpRequest, HttpResponse } from './http.js'
import type { CallOptions, CreateTicketRequest, TicketProvider, TicketTransitionResult } from './types.js'

const logger = createLogger('integrations:jira')

const PROVIDER = 'jira'

export interface JiraProviderOptions {
  baseUrl: string
  username: string
  apiToken: string
  projectKey: string
  issueType: string
  fetchFn?: FetchFn
}

const CreatedIssueSchema = z.object({ key: z.string().min(1) })

const SearchResultSchema = z.object({
  issues: z.array(
    z.object({
      key: z.string(),
      fields: z.object({ status: z.object({ name: z.string() }).optional() }).optional(),
    }),
  ),
})

const TransitionsSchema = z.object({
  transitions: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      to: z.object({ name: z.string() }).optional(),
    }),
  ),
})

const IssueStatusSchema = z.object({
  fields: z.object({ status: z.object({ name: z.string() }) }),
})

/** Label tying a Jira issue to its incident */
export function incidentLabel(incidentId: string): string {
  return incidentId.toLowerCase()
}

/** Atlassian Document Format wrapper for plain text */
function toAdf(text: string): Record<string, unknown> {
  return {
    type: 'doc',
    version: 1,
    content: [{ type: 'paragraph', content: [{ type: 'text', text: text || 'Automated incident ticket.' }] }],
  }
}

export class JiraTicketProvider implements TicketProvider {
  readonly name = 'jira_api'
  private readonly _options: JiraProviderOptions
  private readonly _baseUrl: string

  constructor(options: JiraProviderOptions) {
    this._options = options
    this._baseUrl = options.baseUrl.replace(/\/+$/, '')
  }

  async createTicket(request: CreateTicketRequest): Promise<TicketRecord> {
    const fields: Record<string, unknown> = {
      project: { key: this._options.projectKey },
      summary: request.summary,
      description: toAdf(request.description),
      issuetype: { name: this._options.issueType },
      priority: { name: request.priority },
      labels: ['patchwarden', 'incident', incidentLabel(request.incidentId)],
    }

    let response = await this._send({ method: 'POST', url: '/rest/api/3/issue', body: { fields }, signal: request.signal })
    if (response.status === 400) {
      // Projects with a custom priority scheme reject the priority field
      logger.debug({ incidentId: request.incidentId }, 'Jira rejected issue; retrying without priority')
      const { priority: _priority, ...withoutPriority } = fields
      response = await this._send({
        method: 'POST',
        url: '/rest/api/3/issue',
        body: { fields: withoutPriority },
        signal: request.signal,
      })
    }
    raiseForStatus(PROVIDER, 'create issue', response)

    const { key } = parseResponse(PROVIDER, CreatedIssueSchema, response.body, 'create issue')
    return { ticketKey: key, ticketUrl: `${this._baseUrl}/browse/${key}`, status: 'Open' }
  }

  async findTicketByIncident(incidentId: string, options: CallOptions = {}): Promise<TicketRecord | null> {
    const response = await this._send({
      method: 'GET',
      url: '/rest/api/3/search',
      query: {
        jql: `project = "${this._options.projectKey}" AND labels = "${incidentLabel(incidentId)}" ORDER BY created ASC`,
        fields: 'status',
        maxResults: '1',
      },
      signal: options.signal,
    })
    raiseForStatus(PROVIDER, 'search issues', response)

    const [issue] = parseResponse(PROVIDER, SearchResultSchema, response.body, 'search issues').issues
    if (issue === undefined) return null
    return {
      ticketKey: issue.key,
      ticketUrl: `${this._baseUrl}/browse/${issue.key}`,
      status: issue.fields?.status?.name ?? 'Open',
    }
  }

  async transitionTicket(
    ticketKey: string,
    targetStatus: string,
    options: CallOptions = {},
  ): Promise<TicketTransitionResult> {
    const issuePath = `/rest/api/3/issue/${encodeURIComponent(ticketKey)}`

    const current = await this._send({ method: 'GET', url: issuePath, query: { fields: 'status' }, signal: options.signal })
    raiseForStatus(PROVIDER, 'read issue', current)
    const fromStatus = parseResponse(PROVIDER, IssueStatusSchema, current.body, 'read issue').fields.status.name
    if (fromStatus.toLowerCase() === targetStatus.toLowerCase()) {
      return { ticketKey, fromStatus, toStatus: fromStatus }
    }

    const available = await this._send({ method: 'GET', url: `${issuePath}/transitions`, signal: options.signal })
    raiseForStatus(PROVIDER, 'list transitions', available)
    const wanted = targetStatus.toLowerCase()
    const transition = parseResponse(PROVIDER, TransitionsSchema, available.body, 'list transitions').transitions.find(
      (t) => t.to?.name.toLowerCase() === wanted || t.name.toLowerCase() === wanted,
    )
    if (transition === undefined) {
      throw new PermanentIntegrationError(`No Jira transition from "${fromStatus}" to "${targetStatus}" for ${ticketKey}`, {
        provider: PROVIDER,
        ticketKey,
      })
    }

    const applied = await this._send({
      method: 'POST',
      url: `${issuePath}/transitions`,
      body: { transition: { id: transition.id } },
      signal: options.signal,
    })
    raiseForStatus(PROVIDER, 'transition issue', applied)
    return { ticketKey, fromStatus, toStatus: transition.to?.name ?? targetStatus }
  }

  private _send(request: Omit<HttpRequest, 'headers'>): Promise<HttpResponse> {
    const credentials = Buffer.from(`${this._options.username}:${this._options.apiToken}`).toString('base64')
    return sendJson(
      PROVIDER,
      { ...request, url: `${this._baseUrl}${request.url}`, headers: { Authorization: `Basic ${credentials}` } },
      this._options.fetchFn,
    )
  }
}
