import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import { createDeploymentStatus, reportDeployment } from '../deployments'
import { InvalidRepositoryUrlError, ResponseParseError, UnexpectedStatusError } from '../errors'
import type { ReporterConfig } from '../types'

vi.mock('@actions/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@actions/core')>()
  return { ...actual, info: vi.fn() }
})

const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 204 }))

function reply(status: number, statusText: string, body: string): Response {
  return new Response(body, { status, statusText, headers: { 'content-type': 'application/json' } })
}

function sentBody(index: number): unknown {
  return JSON.parse(String(fetchMock.mock.calls[index]?.[1]?.body))
}

const config: ReporterConfig = {
  authToken: 'test-secret',
  repositoryUrl: 'git@github.com:acme/widgets.git',
  commitHash: 'abc123',
  apiBaseUrl: 'https://api.github.com',
  state: 'success',
  buildUrl: 'https://ci.example.com/builds/7',
  verbose: false,
  requestTimeoutMs: 1000,
}

beforeEach(() => {
  fetchMock.mockReset()
  vi.mocked(core.info).mockClear()
  vi.stubGlobal('fetch', fetchMock)
})

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('reportDeployment', () => {
  it('creates the deployment and then its status', async () => {
    fetchMock
      .mockImplementationOnce(async () => reply(201, 'Created', '{"id":42,"url":"https://x/42","sha":"abc123"}'))
      .mockImplementationOnce(async () => reply(201, 'Created', '{"id":1001}'))

    const report = await reportDeployment(config)

    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.github.com/repos/acme/widgets/deployments')
    expect(sentBody(0)).toEqual({
      required_contexts: [],
      ref: 'abc123',
      environment: 'staging',
      description: 'Success',
    })
    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://api.github.com/repos/acme/widgets/deployments/42/statuses')
    expect(sentBody(1)).toEqual({
      environment_url: 'https://ci.example.com/builds/7',
      environment: 'staging',
      state: 'success',
      description: 'Success',
    })
    expect(report).toEqual({
      deploymentId: 42,
      deploymentUrl: 'https://x/42',
      state: 'success',
      description: 'Success',
    })
    expect(core.info).toHaveBeenCalledWith('deployment id 42')
  })

  it('derives state and description from the build status in auto mode', async () => {
    fetchMock
      .mockImplementationOnce(async () => reply(201, 'Created', '{"id":7,"url":"https://x/7"}'))
      .mockImplementationOnce(async () => reply(201, 'Created', '{}'))

    const report = await reportDeployment({ ...config, state: 'auto', buildStatus: '1', description: 'Nightly build' })

    expect(report.state).toBe('failure')
    expect(sentBody(1)).toMatchObject({ state: 'failure', description: 'Nightly build' })
  })

  it('does not send the status when the deployment is rejected', async () => {
    fetchMock.mockImplementationOnce(async () => reply(422, 'Unprocessable Entity', '{"message":"Conflict merging main"}'))

    await expect(reportDeployment(config)).rejects.toBeInstanceOf(UnexpectedStatusError)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('fails when the deployment response is not json', async () => {
    fetchMock.mockImplementationOnce(async () => reply(201, 'Created', 'not json'))

    await expect(reportDeployment(config)).rejects.toBeInstanceOf(ResponseParseError)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('fails when the deployment response has no id', async () => {
    fetchMock.mockImplementationOnce(async () => reply(201, 'Created', '{"url":"https://x/1"}'))

    await expect(reportDeployment(config)).rejects.toThrow('unexpected deployment response: id: Required')
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('propagates a failed status call', async () => {
    fetchMock
      .mockImplementationOnce(async () => reply(201, 'Created', '{"id":42,"url":"https://x/42"}'))
      .mockImplementationOnce(async () => reply(500, 'Internal Server Error', ''))

    await expect(reportDeployment(config)).rejects.toThrow('server error, unexpected status code: 500 Internal Server Error')
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('rejects a malformed repository url before any request', async () => {
    await expect(reportDeployment({ ...config, repositoryUrl: 'widgets' })).rejects.toBeInstanceOf(InvalidRepositoryUrlError)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('joins a base url with a trailing slash', async () => {
    fetchMock
      .mockImplementationOnce(async () => reply(201, 'Created', '{"id":3,"url":"https://x/3"}'))
      .mockImplementationOnce(async () => reply(201, 'Created', '{}'))

    await reportDeployment({ ...config, apiBaseUrl: 'https://ghe.example.com/api/v3/' })

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://ghe.example.com/api/v3/repos/acme/widgets/deployments')
    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://ghe.example.com/api/v3/repos/acme/widgets/deployments/3/statuses')
  })
})

describe('createDeploymentStatus', () => {
  it('sends an empty environment url when no build url is known', async () => {
    fetchMock.mockImplementationOnce(async () => reply(201, 'Created', '{}'))

    await createDeploymentStatus({ ...config, buildUrl: undefined, state: 'pending' }, { owner: 'acme', repo: 'widgets' }, 9)

    expect(sentBody(0)).toEqual({
      environment_url: '',
      environment: 'staging',
      state: 'pending',
      description: 'Pending',
    })
  })
})
