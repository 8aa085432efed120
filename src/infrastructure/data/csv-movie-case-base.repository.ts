import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CaseBaseRepository } from '../../application/ports/case-base-repository';
import type { MovieCase } from '../../domain/entities/movie';
import { CONTENT_RATINGS, KNOWN_GENRES } from '../../domain/movies/movie-schema';
import {
	canonicalFlag,
	canonicalRating,
	canonicalizeAgainst,
	isBlank,
	parseDecimal,
	parseDuration,
	parseInteger,
	splitList,
} from '../../domain/services/field-normalizer';
import { ErrorHandler, ErrorType } from '../error/error-handler';
import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';
import { SAMPLE_MOVIES } from './sample-movies';

export const MOVIE_CSV_COLUMNS = [
	'title',
	'genre',
	'year',
	'rating',
	'duration',
	'criticScore',
	'hasSequel',
] as const;

const rowsSchema = z.array(
	z.object({
		record: z.record(z.string(), z.string()),
		info: z.object({ lines: z.number().int() }),
	}),
);

type CsvRow = z.infer<typeof rowsSchema>[number];

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

interface CsvMovieCaseBaseRepositoryOptions {
	readonly filePath: string;
	readonly logger: ILogger;
	/** Serve the built-in sample movies when nothing could be loaded */
	readonly fallbackToSamples?: boolean;
}

/**
 * Loads movie cases from a CSV file with a header row. Rows that cannot be
 * converted are skipped with a warning; the rest of the file still loads.
 */
export class CsvMovieCaseBaseRepository implements CaseBaseRepository<MovieCase> {
	private readonly filePath: string;
	private readonly logger: ILogger;
	private readonly errorHandler: ErrorHandler;
	private readonly fallbackToSamples: boolean;
	private cached?: readonly MovieCase[];

	constructor({ filePath, logger, fallbackToSamples = true }: CsvMovieCaseBaseRepositoryOptions) {
		this.filePath = filePath;
		this.logger = logger;
		this.errorHandler = new ErrorHandler(logger);
		this.fallbackToSamples = fallbackToSamples;
	}

	async load(): Promise<readonly MovieCase[]> {
		if (this.cached) {
			return this.cached;
		}

		const content = await this.errorHandler.safeExecute(
			() => readFile(this.filePath, 'utf-8'),
			ErrorType.DATA_SOURCE,
			'read movie case file',
			{ path: this.filePath },
		);

		let movies = content.map((text) => this.parseMovies(text)).getOrElse([]);

		if (movies.length === 0) {
			this.logger.warn(`No movies loaded from '${this.filePath}'.`);
			if (this.fallbackToSamples) {
				this.logger.warn('Using the built-in sample movies instead.', { count: SAMPLE_MOVIES.length });
				movies = [...SAMPLE_MOVIES];
			}
		} else {
			this.logger.info(`${movies.length} movies loaded from '${this.filePath}'.`);
		}

		this.cached = Object.freeze(movies.map((movie) => Object.freeze(movie)));
		return this.cached;
	}

	/**
	 * Converts CSV text into movie cases. Exposed for tests and tooling.
	 */
	parseMovies(content: string): MovieCase[] {
		const movies: MovieCase[] = [];
		for (const { record, info } of this.parseRows(content)) {
			this.toMovie(record, info.lines).onSuccess((movie) => movies.push(movie));
		}
		return movies;
	}

	private parseRows(content: string): CsvRow[] {
		try {
			const records: unknown = parse(content, {
				columns: (header: string[]) => {
					this.warnAboutMissingColumns(header);
					return header;
				},
				info: true,
				skip_empty_lines: true,
				trim: true,
				bom: true,
				relax_column_count_less: true,
				skip_records_with_error: true,
				on_skip: (error) => {
					this.errorHandler.handleError(
						error ?? new Error('Malformed record'),
						ErrorType.VALIDATION,
						'MALFORMED_RECORD',
						`Skipped a malformed CSV record in '${this.filePath}'.`,
						{ path: this.filePath, csvCode: error?.code, reason: error?.message },
					);
					return undefined;
				},
			});
			return rowsSchema.parse(records);
		} catch (error) {
			this.errorHandler.handleError(
				error,
				ErrorType.DATA_SOURCE,
				'CSV_PARSE_FAILED',
				`Could not parse '${this.filePath}' as CSV.`,
				{ path: this.filePath },
			);
			return [];
		}
	}

	private warnAboutMissingColumns(header: readonly string[]): void {
		const missing = MOVIE_CSV_COLUMNS.filter((column) => !header.includes(column));
		if (missing.length > 0) {
			this.logger.warn(`Columns missing from '${this.filePath}': ${missing.join(', ')}. Those attributes stay unknown.`);
		}
	}

	private toMovie(row: Record<string, string>, line: number): Result<MovieCase> {
		const title = row.title?.trim();
		if (!title) {
			return this.errorHandler.handleError(
				new Error('Missing title'),
				ErrorType.VALIDATION,
				'MISSING_TITLE',
				`Row ${line} has no title. Skipping it.`,
				{ line },
			);
		}

		const movie: Mutable<MovieCase> = { title };
		const invalid = (column: string, value: string): Result<MovieCase> =>
			this.errorHandler.handleError(
				new Error(`Invalid value for ${column}`),
				ErrorType.VALIDATION,
				'INVALID_FIELD',
				`Could not convert ${column} for movie '${title}'. Skipping this movie.`,
				{ line, column, value },
			);

		const genre = row.genre ?? '';
		if (!isBlank(genre)) {
			movie.genre = canonicalizeAgainst(splitList(genre), KNOWN_GENRES);
			const unknown = movie.genre.filter((entry) => !includes(KNOWN_GENRES, entry));
			if (unknown.length > 0) {
				this.logger.warn(`Genre ${unknown.join(', ')} of '${title}' is not a known genre. Keeping it as is.`);
			}
		}

		const year = row.year ?? '';
		if (!isBlank(year)) {
			const parsed = parseInteger(year);
			if (parsed === undefined) return invalid('year', year);
			movie.year = parsed;
		}

		const rating = row.rating ?? '';
		if (!isBlank(rating)) {
			const parsed = canonicalRating(rating);
			if (parsed === undefined) return invalid('rating', rating);
			if (!includes(CONTENT_RATINGS, parsed)) {
				this.logger.warn(`Rating '${rating}' of '${title}' is not a standard rating. Keeping it as is.`);
			}
			movie.rating = parsed;
		}

		const duration = row.duration ?? '';
		if (!isBlank(duration)) {
			const parsed = parseDuration(duration);
			if (parsed === undefined) return invalid('duration', duration);
			movie.duration = parsed;
		}

		const criticScore = row.criticScore ?? '';
		if (!isBlank(criticScore)) {
			const parsed = parseDecimal(criticScore);
			if (parsed === undefined) return invalid('criticScore', criticScore);
			movie.criticScore = parsed;
		}

		const hasSequel = row.hasSequel ?? '';
		if (!isBlank(hasSequel)) {
			const parsed = canonicalFlag(hasSequel);
			if (parsed === undefined) return invalid('hasSequel', hasSequel);
			movie.hasSequel = parsed;
		}

		return Result.success(movie);
	}
}

function includes(list: readonly string[], value: string): boolean {
	return list.includes(value);
}
