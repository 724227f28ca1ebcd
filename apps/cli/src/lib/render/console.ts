import type { CrawlStats, Forest } from '@reply-crawler/comment-domain'
import { renderCommentTree } from '@reply-crawler/comment-tree'

const SEPARATOR = '-'.repeat(80)

export function* renderForest(forest: Forest): Generator<string> {
	for (const [index, comment] of forest.entries()) {
		yield `\n${index + 1}.`
		yield* renderCommentTree(comment)
		yield SEPARATOR
	}
}

export function summaryLines(stats: CrawlStats, warningCount: number): string[] {
	const lines = [
		`Total comments retrieved: ${stats.roots} main comments and ${stats.replies} replies`,
		`Total including replies: ${stats.total}`,
	]
	if (stats.partial) lines.push(`Partial result: ${warningCount} warning(s) during crawl`)
	return lines
}
