/**
 * Stand-ins for the parts of @actions/github the action uses.
 */
import { jest } from '@jest/globals'

export interface FakeComment {
  node_id: string
  user: { type: string } | null
  body?: string
}

interface IssueParams {
  owner: string
  repo: string
  issue_number: number
}

export const listComments =
  jest.fn<(params: IssueParams) => Promise<{ data: FakeComment[] }>>()
export const createComment =
  jest.fn<(params: IssueParams & { body: string }) => Promise<unknown>>()
export const graphql = jest.fn<(query: string) => Promise<unknown>>()

export const octokit = {
  graphql,
  rest: {
    issues: {
      listComments,
      createComment
    }
  }
}

export const context: {
  repo: { owner: string; repo: string }
  payload: { pull_request?: { number: number } }
} = {
  repo: {
    owner: 'test-owner',
    repo: 'test-repo'
  },
  payload: {
    pull_request: {
      number: 1
    }
  }
}

export const getOctokit = jest.fn((_token: string) => octokit)

/**
 * Restores a pull request context and API calls that succeed.
 */
export function resetGitHub(): void {
  context.payload = { pull_request: { number: 1 } }
  listComments.mockResolvedValue({ data: [] })
  createComment.mockResolvedValue({})
  graphql.mockResolvedValue({})
}
