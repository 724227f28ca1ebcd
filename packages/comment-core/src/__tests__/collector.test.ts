import { describe, expect, it, vi } from 'vitest'
import { FetchError, MalformedInputError, MissingFieldError, type PageRequest } from '@reply-crawler/comment-domain'
import { flattenForest } from '@reply-crawler/comment-tree'
import { collectComments } from '../collector'
import type { CollectProgressEvent } from '../types'
import { EndlessFetcher, FakeFetcher, PUBLISHED, fake } from './fake-fetcher'

function outline(result: { comments: Parameters<typeof flattenForest>[0] }) {
	return flattenForest(result.comments).map((row) => `${row.commentType}:${row.author}`)
}

const sampleThreads = () => [
	fake('a', 'root a', [fake('b', 'b1', [fake('c', 'c1')]), fake('d', 'd1')]),
	fake('e', 'root e'),
]

describe('collectComments', () => {
	it('collects every thread with its full reply tree', async () => {
		const fetcher = new FakeFetcher(sampleThreads())

		const result = await collectComments('vid1', { fetcher, maxResults: 10 })

		expect(result.comments).toEqual([
			{
				author: 'user-a',
				text: 'root a',
				likes: 1,
				published: PUBLISHED,
				replies: [
					{
						author: 'user-b',
						text: 'b1',
						likes: 1,
						published: PUBLISHED,
						replies: [{ author: 'user-c', text: 'c1', likes: 1, published: PUBLISHED, replies: [] }],
					},
					{ author: 'user-d', text: 'd1', likes: 1, published: PUBLISHED, replies: [] },
				],
			},
			{ author: 'user-e', text: 'root e', likes: 1, published: PUBLISHED, replies: [] },
		])
		expect(result.warnings).toEqual([])
		expect(result.stats).toEqual({ roots: 2, replies: 3, total: 5, requested: 10, partial: false })
	})

	it('only asks for replies of threads that have them, depth first', async () => {
		const fetcher = new FakeFetcher(sampleThreads())
		await collectComments('vid1', { fetcher, maxResults: 10 })

		expect(fetcher.requested()).toEqual([
			'threads:vid1',
			'replies:a',
			'replies:b',
			'replies:c',
			'replies:d',
		])
		expect(fetcher.requests[0]).toEqual({ kind: 'threads', parentId: 'vid1', pageSize: 10, pageToken: undefined })
		expect(fetcher.requests[1].pageSize).toBe(100)
	})

	it('sanitizes the text of every node', async () => {
		const fetcher = new FakeFetcher([
			fake('a', '<b>Great</b> video &amp; thanks', [fake('b', '@user-a agreed!')]),
		])
		const { comments } = await collectComments('vid1', { fetcher, maxResults: 1 })

		expect(comments[0].text).toBe('Great video & thanks')
		expect(comments[0].replies[0].text).toBe('agreed!')
	})

	it('follows continuation tokens across pages', async () => {
		const threads = Array.from({ length: 5 }, (_, i) => fake(`t${i}`, `thread ${i}`))
		const fetcher = new FakeFetcher(threads, 2)

		const result = await collectComments('vid1', { fetcher, maxResults: 100 })

		expect(result.comments.map((c) => c.author)).toEqual(['user-t0', 'user-t1', 'user-t2', 'user-t3', 'user-t4'])
		expect(fetcher.requests.map((r) => r.pageToken)).toEqual([undefined, 'offset-2', 'offset-4'])
		expect(result.stats.partial).toBe(false)
	})

	it('stops at exactly maxResults roots regardless of replies', async () => {
		const fetcher = new EndlessFetcher(3)

		const result = await collectComments('vid1', { fetcher, maxResults: 5 })

		expect(result.comments).toHaveLength(5)
		expect(result.stats).toEqual({ roots: 5, replies: 15, total: 20, requested: 5, partial: false })
		const threadRequests = fetcher.requests.filter((r) => r.kind === 'threads')
		expect(threadRequests).toHaveLength(1)
		expect(threadRequests[0].pageSize).toBe(5)
	})

	it('shrinks the page size to what is left of the budget', async () => {
		const fetcher = new EndlessFetcher()

		const result = await collectComments('vid1', { fetcher, maxResults: 250 })

		expect(result.comments).toHaveLength(250)
		expect(fetcher.requests.map((r) => r.pageSize)).toEqual([100, 100, 50])
		expect(fetcher.requests.map((r) => r.pageToken)).toEqual([undefined, 'after-100', 'after-200'])
	})

	it('ignores records beyond the requested page size', async () => {
		const fetcher = new EndlessFetcher(0, 4)

		const result = await collectComments('vid1', { fetcher, maxResults: 3 })

		expect(result.comments.map((c) => c.author)).toEqual(['author-1', 'author-2', 'author-3'])
		expect(fetcher.requests).toHaveLength(1)
	})

	it('returns the first page when the second one fails', async () => {
		const threads = [
			fake('a', 'root a', [fake('b', 'b1', [fake('c', 'c1')])]),
			fake('d', 'root d'),
			fake('e', 'root e'),
			fake('f', 'root f'),
		]
		const fetcher = new FakeFetcher(threads, 2).failOn(
			'threads',
			'vid1',
			2,
			new FetchError('quota', 'quota exceeded', { status: 403, reason: 'quotaExceeded' }),
		)
		const warn = vi.fn()

		const result = await collectComments('vid1', { fetcher, maxResults: 10, logger: { warn } })

		expect(outline(result)).toEqual(['main:user-a', 'reply_level_1:user-b', 'reply_level_2:user-c', 'main:user-d'])
		expect(result.stats).toEqual({ roots: 2, replies: 2, total: 4, requested: 10, partial: true })
		expect(result.warnings).toHaveLength(1)
		expect(result.warnings[0]).toMatchObject({ scope: 'threads', parentId: 'vid1', page: 2 })
		expect(result.warnings[0].error).toBeInstanceOf(FetchError)
		expect(warn).toHaveBeenCalledWith(
			'[comment-core] threads page 2 of vid1 failed, keeping partial results: quota 403 (quotaExceeded): quota exceeded',
		)
	})

	it('returns an empty partial result when the first page fails', async () => {
		const fetcher = new FakeFetcher([fake('a', 'root a')]).failOn(
			'threads',
			'vid1',
			1,
			new Error('connect ECONNREFUSED'),
		)

		const result = await collectComments('vid1', { fetcher, maxResults: 10 })

		expect(result.comments).toEqual([])
		expect(result.stats.partial).toBe(true)
		expect(result.warnings[0].error).toMatchObject({ kind: 'network', message: 'connect ECONNREFUSED' })
	})

	it('keeps sibling threads when one reply subtree fails', async () => {
		const fetcher = new FakeFetcher(sampleThreads()).failOn('replies', 'b', 1, new FetchError('http', 'boom'))

		const result = await collectComments('vid1', { fetcher, maxResults: 10 })

		expect(outline(result)).toEqual(['main:user-a', 'reply_level_1:user-b', 'reply_level_1:user-d', 'main:user-e'])
		expect(result.stats).toMatchObject({ roots: 2, replies: 2, total: 4, partial: true })
		expect(result.warnings).toHaveLength(1)
		expect(result.warnings[0]).toMatchObject({ scope: 'replies', parentId: 'b', page: 1 })
	})

	it('stops at a thread record with a missing field and keeps the earlier ones', async () => {
		const broken = { ...fake('x', 'broken'), text: undefined }
		const fetcher = new FakeFetcher([fake('a', 'root a'), broken, fake('e', 'root e')])

		const result = await collectComments('vid1', { fetcher, maxResults: 10 })

		expect(outline(result)).toEqual(['main:user-a'])
		expect(result.warnings[0].error).toBeInstanceOf(MissingFieldError)
		expect(result.warnings[0].error).toMatchObject({ field: 'text', recordId: 'x' })
	})

	it('keeps a thread whose replies cannot be looked up but stops paging', async () => {
		const anonymous = { ...fake('x', 'no id', [fake('y', 'y1')]), id: undefined }
		const fetcher = new FakeFetcher([fake('a', 'root a'), anonymous, fake('e', 'root e')])

		const result = await collectComments('vid1', { fetcher, maxResults: 10 })

		expect(outline(result)).toEqual(['main:user-a', 'main:user-x'])
		expect(result.stats).toMatchObject({ roots: 2, replies: 0, total: 2, partial: true })
		expect(result.warnings).toHaveLength(1)
		expect(result.warnings[0].error).toMatchObject({ field: 'id' })
	})

	it('stops when the API repeats a continuation token', async () => {
		const fetcher = {
			requests: 0,
			async fetchPage() {
				this.requests++
				return {
					items: [{ id: `t${this.requests}`, author: 'a', text: 't', likes: 0, published: PUBLISHED }],
					nextPageToken: 'same',
				}
			},
		}

		const result = await collectComments('vid1', { fetcher, maxResults: 50 })

		expect(fetcher.requests).toBe(2)
		expect(result.comments).toHaveLength(2)
		expect(result.warnings[0].error).toMatchObject({ kind: 'malformed', message: 'API repeated continuation token same' })
	})

	it('stops when the API cycles back to an earlier continuation token', async () => {
		const fetcher = {
			requests: 0,
			async fetchPage(request: PageRequest) {
				this.requests++
				return {
					items: [{ id: `t${this.requests}`, author: 'a', text: 't', likes: 0, published: PUBLISHED }],
					nextPageToken: request.pageToken === 'A' ? 'B' : 'A',
				}
			},
		}

		const result = await collectComments('vid1', { fetcher, maxResults: 50 })

		expect(fetcher.requests).toBe(3)
		expect(result.comments).toHaveLength(3)
		expect(result.warnings).toHaveLength(1)
		expect(result.warnings[0]).toMatchObject({ scope: 'threads', page: 3 })
		expect(result.warnings[0].error).toMatchObject({ kind: 'malformed', message: 'API repeated continuation token A' })
	})

	it('rejects invalid budgets before fetching', async () => {
		const fetcher = new FakeFetcher([fake('a', 'root a')])

		await expect(collectComments('vid1', { fetcher, maxResults: 0 })).rejects.toBeInstanceOf(MalformedInputError)
		await expect(collectComments('vid1', { fetcher, maxResults: 2.5 })).rejects.toThrow(
			'maxResults must be a positive integer, got 2.5',
		)
		await expect(collectComments('', { fetcher, maxResults: 1 })).rejects.toBeInstanceOf(MalformedInputError)
		expect(fetcher.requests).toHaveLength(0)
	})

	it('reports progress per page and survives a throwing listener', async () => {
		const events: CollectProgressEvent[] = []
		const fetcher = new FakeFetcher(sampleThreads(), 1)

		const result = await collectComments('vid1', {
			fetcher,
			maxResults: 10,
			onProgress: (event) => {
				events.push(event)
				throw new Error('listener failed')
			},
		})

		expect(result.stats.partial).toBe(false)
		expect(events).toEqual([
			{ stage: 'threads', page: 1, roots: 1, total: 4 },
			{ stage: 'threads', page: 2, roots: 2, total: 5 },
			{ stage: 'completed', page: 2, roots: 2, total: 5 },
		])
	})
})
