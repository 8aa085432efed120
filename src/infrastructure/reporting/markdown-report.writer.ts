import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ReportWriter } from '../../application/ports/report-writer';
import type { AttributeValue } from '../../domain/entities/case';
import type { MovieMatch, MovieQuery } from '../../domain/entities/movie';
import { labelFor } from '../../domain/movies/movie-schema';
import { ErrorHandler, ErrorType } from '../error/error-handler';
import type { ILogger } from '../logging/logger';

interface MarkdownReportWriterOptions {
	readonly outputDir: string;
	readonly filePrefix: string;
	readonly logger: ILogger;
	readonly now?: () => Date;
}

export function formatValue(value: AttributeValue | undefined): string {
	if (value === undefined) {
		return '-';
	}
	return typeof value === 'string' || typeof value === 'number' ? String(value) : value.join(', ');
}

export function formatPercent(score: number): string {
	return `${(score * 100).toFixed(2)}%`;
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
	const pad = (value: number) => String(value).padStart(2, '0');
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	);
}

export function renderMarkdownReport(query: MovieQuery, matches: readonly MovieMatch[]): string {
	const lines: string[] = ['# Movie Search Results', '', '## Query', ''];

	const criteria = Object.entries(query).filter(([, value]) => value !== undefined);
	if (criteria.length === 0) {
		lines.push('- No search criteria provided.');
	} else {
		for (const [attribute, value] of criteria) {
			lines.push(`- **${labelFor(attribute)}**: ${formatValue(value)}`);
		}
	}
	lines.push('', '## Movies Found (ordered by similarity)');

	if (matches.length === 0) {
		lines.push('', '- No movies matched the given criteria.');
		return `${lines.join('\n')}\n`;
	}

	for (const match of matches) {
		lines.push('', '---', '', `### ${match.movie.title}`, '');
		lines.push(`- **Similarity**: ${formatPercent(match.score)}`);
		for (const [attribute, value] of Object.entries(match.movie)) {
			if (attribute === 'title' || value === undefined) {
				continue;
			}
			lines.push(`  - **${labelFor(attribute)}**: ${formatValue(value)}`);
		}
	}

	return `${lines.join('\n')}\n`;
}

export class MarkdownReportWriter implements ReportWriter {
	private readonly outputDir: string;
	private readonly filePrefix: string;
	private readonly logger: ILogger;
	private readonly errorHandler: ErrorHandler;
	private readonly now: () => Date;

	constructor({ outputDir, filePrefix, logger, now = () => new Date() }: MarkdownReportWriterOptions) {
		this.outputDir = outputDir;
		this.filePrefix = filePrefix;
		this.logger = logger;
		this.errorHandler = new ErrorHandler(logger);
		this.now = now;
	}

	async write(query: MovieQuery, matches: readonly MovieMatch[]): Promise<string> {
		const filePath = path.join(this.outputDir, `${this.filePrefix}_${formatTimestamp(this.now())}.md`);

		const saved = await this.errorHandler.safeExecute(
			async () => {
				await mkdir(this.outputDir, { recursive: true });
				await writeFile(filePath, renderMarkdownReport(query, matches), 'utf-8');
				return filePath;
			},
			ErrorType.REPORT,
			'save search report',
			{ path: filePath },
		);

		if (!saved.success || saved.data === undefined) {
			throw new Error(`Could not save the report to '${filePath}'.`);
		}

		this.logger.info(`Report saved to '${saved.data}'.`);
		return saved.data;
	}
}
