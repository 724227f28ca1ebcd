import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { Forest } from '@reply-crawler/comment-domain'
import { flattenForest, serializeForest, toCsv } from '@reply-crawler/comment-tree'

export type ExportFormat = 'csv' | 'json'

export type FileWriter = (filePath: string, contents: string) => Promise<void>

export const writeTextFile: FileWriter = async (filePath, contents) => {
	await mkdir(path.dirname(path.resolve(filePath)), { recursive: true })
	await writeFile(filePath, contents, 'utf-8')
}

export function exportFormatFor(filePath: string): ExportFormat {
	return path.extname(filePath).toLowerCase() === '.csv' ? 'csv' : 'json'
}

export function renderExport(forest: Forest, format: ExportFormat): string {
	return format === 'csv' ? toCsv(flattenForest(forest)) : serializeForest(forest)
}

/** Writes the forest as a flat table (`.csv`) or nested JSON (anything else). */
export async function exportComments(
	forest: Forest,
	filePath: string,
	write: FileWriter = writeTextFile,
): Promise<ExportFormat> {
	const format = exportFormatFor(filePath)
	await write(filePath, renderExport(forest, format))
	return format
}
