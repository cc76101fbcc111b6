import { describe, it, expect } from 'vitest'
import { MockCodeProvider, MockTicketProvider, stableHash } from '../mock-providers.js'
import { PermanentIntegrationError } from '../../../core/errors.js'

const ticketRequest = {
  incidentId: 'INC-0000abcd',
  summary: 'checkout-api error rate',
  description: 'Error rate above 5%',
  priority: 'High',
}

describe('stableHash', () => {
  it('is deterministic', () => {
    expect(stableHash('INC-0000abcd')).toBe(stableHash('INC-0000abcd'))
    expect(stableHash('INC-0000abcd')).not.toBe(stableHash('INC-0000abce'))
  })
})

describe('MockTicketProvider', () => {
  it('returns the existing ticket when asked twice for one incident', async () => {
    const provider = new MockTicketProvider()
    const first = await provider.createTicket(ticketRequest)
    const second = await provider.createTicket(ticketRequest)

    expect(second).toEqual(first)
    expect(first.ticketKey).toMatch(/^SRE-\d{5}$/)
    expect(first.ticketUrl).toBe(`https://jira.example.test/browse/${first.ticketKey}`)
    expect(provider.size).toBe(1)
    expect(await provider.findTicketByIncident('INC-0000abcd')).toEqual(first)
    expect(await provider.findTicketByIncident('INC-ffffffff')).toBeNull()
  })

  it('transitions a known ticket and rejects unknown keys', async () => {
    const provider = new MockTicketProvider()
    const { ticketKey } = await provider.createTicket(ticketRequest)

    expect(await provider.transitionTicket(ticketKey, 'Done')).toEqual({ ticketKey, fromStatus: 'Open', toStatus: 'Done' })
    expect((await provider.findTicketByIncident('INC-0000abcd'))?.status).toBe('Done')
    await expect(provider.transitionTicket('SRE-99999x', 'Done')).rejects.toThrow(PermanentIntegrationError)
  })
})

describe('MockCodeProvider', () => {
  const repo = { repository: 'acme/checkout', branchName: 'fix/inc-0000abcd' }

  it('creates a branch once and stores pushed files', async () => {
    const provider = new MockCodeProvider()
    expect((await provider.createBranch(repo)).created).toBe(true)
    expect((await provider.createBranch(repo)).created).toBe(false)

    await provider.pushFiles({ ...repo, files: [{ path: 'a.md', content: 'fix' }], message: 'fix' })
    expect(provider.fileContent('acme/checkout', 'fix/inc-0000abcd', 'a.md')).toBe('fix')
  })

  it('refuses to push to a missing branch', async () => {
    const provider = new MockCodeProvider()
    await expect(provider.pushFiles({ ...repo, files: [], message: 'fix' })).rejects.toThrow(/does not exist/)
  })

  it('reuses the pull request for a branch', async () => {
    const provider = new MockCodeProvider()
    await provider.createBranch(repo)
    const request = { ...repo, baseBranch: 'main', title: 'Fix', body: '' }
    const first = await provider.createPullRequest(request)
    const second = await provider.createPullRequest(request)

    expect(second).toEqual(first)
    expect(first.number).toBeGreaterThanOrEqual(1000)
    expect(first.number).toBeLessThan(10000)
    expect(first.url).toBe(`https://github.example.test/acme/checkout/pull/${String(first.number)}`)
  })

  it('merges once and reports repeats as already merged', async () => {
    const provider = new MockCodeProvider()
    const pr = await provider.createPullRequest({ ...repo, baseBranch: 'main', title: 'Fix', body: '' })
    const merge = { repository: 'acme/checkout', prNumber: pr.number, method: 'squash' as const }

    expect(await provider.mergePullRequest(merge)).toEqual({ merged: true, alreadyMerged: false, message: 'Pull request merged' })
    expect((await provider.mergePullRequest(merge)).alreadyMerged).toBe(true)
    expect((await provider.findPullRequest(repo))?.merged).toBe(true)
  })

  it('reports configured CI and mergeability', async () => {
    const provider = new MockCodeProvider({ ci: 'failed', review: 'pending', mergeable: false })
    const pr = await provider.createPullRequest({ ...repo, baseBranch: 'main', title: 'Fix', body: '' })

    const status = await provider.getCiStatus({ repository: 'acme/checkout', prNumber: pr.number })
    expect(status.ci).toBe('failed')
    expect(status.review).toBe('pending')
    expect((await provider.mergePullRequest({ repository: 'acme/checkout', prNumber: pr.number, method: 'merge' })).merged).toBe(false)
  })
})
