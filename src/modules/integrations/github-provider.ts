/**
 * GitHub code provider (REST v3).
 */

import { z } from 'zod'
import type { MergeMethod, ReviewStatus } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { parseResponse, raiseForStatus, sendJson } from './http.js'
import type { FetchFn, HttpRequest, HttpResponse } from './http.js'
import type {
  BranchRef,
  CallOptions,
  CiObservation,
  CiState,
  CodeProvider,
  FileChange,
  MergeOutcome,
  PullRequestRef,
} from './types.js'

const logger = createLogger('integrations:github')

const PROVIDER = 'github'

export interface GithubProviderOptions {
  token: string
  owner: string
  defaultBaseBranch: string
  apiUrl?: string
  fetchFn?: FetchFn
}

const RepoSchema = z.object({ default_branch: z.string().nullish() })
const RefSchema = z.object({ object: z.object({ sha: z.string() }) })
const ContentSchema = z.object({ sha: z.string() })
const PullSchema = z.object({
  number: z.number().int(),
  html_url: z.string(),
  state: z.string().optional(),
  merged: z.boolean().optional(),
  merged_at: z.string().nullish(),
  head: z.object({ ref: z.string(), sha: z.string() }),
})
const PullListSchema = z.array(PullSchema)
const CombinedStatusSchema = z.object({ state: z.string() })
const ReviewListSchema = z.array(z.object({ state: z.string() }))

type Pull = z.infer<typeof PullSchema>

function isMerged(pull: Pull): boolean {
  return pull.merged === true || (pull.merged_at !== undefined && pull.merged_at !== null)
}

function toRef(pull: Pull): PullRequestRef {
  return {
    number: pull.number,
    url: pull.html_url,
    headBranch: pull.head.ref,
    merged: isMerged(pull),
  }
}

export function ciStateFrom(combinedState: string): CiState {
  if (combinedState === 'success') return 'passed'
  if (combinedState === 'failure' || combinedState === 'error') return 'failed'
  return 'pending'
}

export function reviewStatusFrom(states: string[]): ReviewStatus {
  if (states.includes('CHANGES_REQUESTED')) return 'changes_requested'
  if (states.includes('APPROVED')) return 'approved'
  return states.length === 0 ? 'unknown' : 'pending'
}

export class GithubCodeProvider implements CodeProvider {
  readonly name = 'github_api'
  private readonly _options: GithubProviderOptions
  private readonly _apiUrl: string

  constructor(options: GithubProviderOptions) {
    this._options = options
    this._apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '')
  }

  async createBranch(request: { repository: string; branchName: string } & CallOptions): Promise<BranchRef> {
    const repo = this._repoPath(request.repository)

    const repoResponse = await this._send({ method: 'GET', url: repo, signal: request.signal })
    raiseForStatus(PROVIDER, 'read repository', repoResponse)
    const baseBranch =
      parseResponse(PROVIDER, RepoSchema, repoResponse.body, 'read repository').default_branch ??
      this._options.defaultBaseBranch

    const baseRef = await this._send({
      method: 'GET',
      url: `${repo}/git/ref/heads/${encodeURIComponent(baseBranch)}`,
      signal: request.signal,
    })
    raiseForStatus(PROVIDER, 'read base ref', baseRef)
    const { sha } = parseResponse(PROVIDER, RefSchema, baseRef.body, 'read base ref').object

    const created = await this._send({
      method: 'POST',
      url: `${repo}/git/refs`,
      body: { ref: `refs/heads/${request.branchName}`, sha },
      signal: request.signal,
    })
    // 422: reference already exists
    if (created.status !== 422) {
      raiseForStatus(PROVIDER, 'create branch', created)
    }
    return { branchName: request.branchName, baseBranch, created: created.status !== 422 }
  }

  async pushFiles(
    request: { repository: string; branchName: string; files: FileChange[]; message: string } & CallOptions,
  ): Promise<void> {
    const repo = this._repoPath(request.repository)
    for (const file of request.files) {
      const path = file.path.replace(/^\/+/, '')
      const existing = await this._send({
        method: 'GET',
        url: `${repo}/contents/${path}`,
        query: { ref: request.branchName },
        signal: request.signal,
      })
      let sha: string | undefined
      if (existing.status === 200) {
        sha = parseResponse(PROVIDER, ContentSchema, existing.body, 'read file').sha
      } else if (existing.status !== 404) {
        raiseForStatus(PROVIDER, 'read file', existing)
      }

      const put = await this._send({
        method: 'PUT',
        url: `${repo}/contents/${path}`,
        body: {
          message: request.message.slice(0, 72),
          content: Buffer.from(file.content, 'utf8').toString('base64'),
          branch: request.branchName,
          ...(sha !== undefined ? { sha } : {}),
        },
        signal: request.signal,
      })
      raiseForStatus(PROVIDER, 'write file', put)
    }
  }

  async createPullRequest(
    request: { repository: string; branchName: string; baseBranch: string; title: string; body: string } & CallOptions,
  ): Promise<PullRequestRef> {
    const response = await this._send({
      method: 'POST',
      url: `${this._repoPath(request.repository)}/pulls`,
      body: { title: request.title.slice(0, 120), head: request.branchName, base: request.baseBranch, body: request.body },
      signal: request.signal,
    })
    if (response.status === 422) {
      // A PR for this head already exists
      const existing = await this.findPullRequest(request)
      if (existing !== null) {
        logger.debug({ branch: request.branchName, pr: existing.number }, 'Reusing existing pull request')
        return existing
      }
    }
    raiseForStatus(PROVIDER, 'create pull request', response)
    return toRef(parseResponse(PROVIDER, PullSchema, response.body, 'create pull request'))
  }

  async findPullRequest(
    request: { repository: string; branchName: string } & CallOptions,
  ): Promise<PullRequestRef | null> {
    const response = await this._send({
      method: 'GET',
      url: `${this._repoPath(request.repository)}/pulls`,
      query: { head: `${this._options.owner}:${request.branchName}`, state: 'all' },
      signal: request.signal,
    })
    raiseForStatus(PROVIDER, 'list pull requests', response)
    const pulls = parseResponse(PROVIDER, PullListSchema, response.body, 'list pull requests')
    // closed without merging: not reusable
    const usable = pulls.find((pull) => pull.state !== 'closed' || isMerged(pull))
    if (usable === undefined && pulls.length > 0) {
      logger.info({ branch: request.branchName, closed: pulls.map((p) => p.number) }, 'Ignoring closed pull requests')
    }
    return usable === undefined ? null : toRef(usable)
  }

  async getCiStatus(request: { repository: string; prNumber: number } & CallOptions): Promise<CiObservation> {
    const repo = this._repoPath(request.repository)
    const pull = await this._readPull(repo, request.prNumber, request.signal)

    const status = await this._send({ method: 'GET', url: `${repo}/commits/${pull.head.sha}/status`, signal: request.signal })
    raiseForStatus(PROVIDER, 'read commit status', status)
    const combined = parseResponse(PROVIDER, CombinedStatusSchema, status.body, 'read commit status').state

    const reviews = await this._send({
      method: 'GET',
      url: `${repo}/pulls/${String(request.prNumber)}/reviews`,
      signal: request.signal,
    })
    raiseForStatus(PROVIDER, 'list reviews', reviews)
    const states = parseResponse(PROVIDER, ReviewListSchema, reviews.body, 'list reviews').map((r) => r.state)

    return {
      ci: ciStateFrom(combined),
      review: reviewStatusFrom(states),
      details: { combinedState: combined, reviewStates: states, headSha: pull.head.sha },
    }
  }

  async mergePullRequest(
    request: { repository: string; prNumber: number; method: MergeMethod } & CallOptions,
  ): Promise<MergeOutcome> {
    const repo = this._repoPath(request.repository)
    const response = await this._send({
      method: 'PUT',
      url: `${repo}/pulls/${String(request.prNumber)}/merge`,
      body: { merge_method: request.method },
      signal: request.signal,
    })
    if (response.status === 200 || response.status === 201) {
      return { merged: true, alreadyMerged: false, message: 'Pull request merged' }
    }
    if (response.status === 405 || response.status === 409 || response.status === 422) {
      const pull = await this._readPull(repo, request.prNumber, request.signal)
      if (toRef(pull).merged) {
        return { merged: true, alreadyMerged: true, message: 'Pull request already merged' }
      }
      return { merged: false, alreadyMerged: false, message: `Pull request is not mergeable (HTTP ${String(response.status)})` }
    }
    raiseForStatus(PROVIDER, 'merge pull request', response)
    return { merged: false, alreadyMerged: false, message: `Unexpected HTTP ${String(response.status)}` }
  }

  private async _readPull(repo: string, prNumber: number, signal?: AbortSignal): Promise<Pull> {
    const response = await this._send({ method: 'GET', url: `${repo}/pulls/${String(prNumber)}`, signal })
    raiseForStatus(PROVIDER, 'read pull request', response)
    return parseResponse(PROVIDER, PullSchema, response.body, 'read pull request')
  }

  /** "/repos/{owner}/{name}"; an "owner/" prefix on `repository` is replaced by the configured owner */
  private _repoPath(repository: string): string {
    const name = repository.includes('/') ? repository.slice(repository.indexOf('/') + 1) : repository
    return `/repos/${this._options.owner}/${name}`
  }

  private _send(request: Omit<HttpRequest, 'headers'>): Promise<HttpResponse> {
    return sendJson(
      PROVIDER,
      {
        ...request,
        url: `${this._apiUrl}${request.url}`,
        headers: {
          Authorization: `Bearer ${this._options.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
      },
      this._options.fetchFn,
    )
  }
}
